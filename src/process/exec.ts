import { spawn } from "node:child_process";

export type CommandOptions = {
  cwd?: string;
  timeoutMs?: number;
  env?: Record<string, string | undefined>;
  signal?: AbortSignal;
};

export type SpawnResult = {
  code: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  killed: boolean;
};

export type RunCommand = (argv: string[], options: CommandOptions) => Promise<SpawnResult>;

const KILL_GRACE_MS = 5_000;

/** Largest delay `setTimeout` accepts; longer ones fire after 1 ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export async function runCommandWithTimeout(
  argv: string[],
  options: CommandOptions,
): Promise<SpawnResult> {
  const [command, ...args] = argv;
  if (!command) {
    throw new Error("runCommandWithTimeout: empty argv");
  }

  return await new Promise<SpawnResult>((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      env: options.env ? { ...process.env, ...options.env } : process.env,
      stdio: ["ignore", "pipe", "pipe"],
    });

    let stdout = "";
    let stderr = "";
    let killed = false;
    let settled = false;
    let timer: ReturnType<typeof setTimeout> | null = null;
    let forceTimer: ReturnType<typeof setTimeout> | null = null;

    const terminate = () => {
      if (killed || child.exitCode !== null) {
        return;
      }
      killed = true;
      child.kill("SIGTERM");
      forceTimer = setTimeout(() => {
        if (child.exitCode === null) {
          child.kill("SIGKILL");
        }
      }, KILL_GRACE_MS);
      forceTimer.unref();
    };

    const onAbort = () => terminate();

    const cleanup = () => {
      if (timer) {
        clearTimeout(timer);
      }
      if (forceTimer) {
        clearTimeout(forceTimer);
      }
      options.signal?.removeEventListener("abort", onAbort);
    };

    const armTimer = (remainingMs: number) => {
      const delay = Math.min(remainingMs, MAX_TIMER_DELAY_MS);
      timer = setTimeout(() => {
        if (remainingMs > delay) {
          armTimer(remainingMs - delay);
          return;
        }
        terminate();
      }, delay);
    };
    if (options.timeoutMs && options.timeoutMs > 0) {
      armTimer(options.timeoutMs);
    }
    if (options.signal) {
      if (options.signal.aborted) {
        terminate();
      } else {
        options.signal.addEventListener("abort", onAbort, { once: true });
      }
    }

    child.stdout.setEncoding("utf-8");
    child.stderr.setEncoding("utf-8");
    child.stdout.on("data", (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on("data", (chunk: string) => {
      stderr += chunk;
    });

    child.on("error", (err) => {
      if (settled) {
        return;
      }
      settled = true;
      cleanup();
      reject(err);
    });

    child.on("close", (code, signal) => {
      if (settled) {
        return;
      }
      settled = true;
      cleanup();
      resolve({ code, signal, stdout, stderr, killed });
    });
  });
}

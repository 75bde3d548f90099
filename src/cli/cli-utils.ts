import type { RuntimeEnv } from "../runtime.js";
import { isSweepError } from "../sweep/errors.js";

export async function runCommandWithRuntime(
  runtime: RuntimeEnv,
  action: () => Promise<void>,
  onError?: (err: unknown) => void,
): Promise<void> {
  try {
    await action();
  } catch (err) {
    if (onError) {
      onError(err);
      return;
    }
    runtime.error(isSweepError(err) ? `error: ${err.message}` : `error: ${String(err)}`);
    runtime.exit(1);
  }
}

export function parseNonNegativeInt(raw: string | undefined, fallback: number): number {
  const value = Math.floor(Number(raw));
  return Number.isFinite(value) && value >= 0 ? value : fallback;
}

export function parseList(raw: string | undefined): string[] | undefined {
  const items = (raw ?? "")
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
  return items.length > 0 ? items : undefined;
}

/** Aborts the returned signal on the first SIGINT until `release` is called. */
export function interruptSignal(runtime: RuntimeEnv): { signal: AbortSignal; release: () => void } {
  const controller = new AbortController();
  const onSigint = () => {
    runtime.error("interrupt: stopping in-flight jobs");
    controller.abort("SIGINT");
  };
  process.once("SIGINT", onSigint);
  return {
    signal: controller.signal,
    release: () => {
      process.removeListener("SIGINT", onSigint);
    },
  };
}

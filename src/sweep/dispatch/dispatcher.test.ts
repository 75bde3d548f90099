import { describe, expect, it, vi } from "vitest";
import { createSubsystemLogger } from "../../logging/subsystem.js";
import type { RunCommand, SpawnResult } from "../../process/exec.js";
import { createLocalBackend } from "./backends.js";
import { JobDispatcher } from "./dispatcher.js";
import type { JobRequest } from "./types.js";

const log = createSubsystemLogger("test/dispatch");

function request(id: string): JobRequest {
  return {
    id,
    kind: "train",
    command: ["trainer", id],
    resourceSpec: { cpus: 1, memory: "1G", wallTimeSeconds: 60 },
    bindMounts: [],
    workDir: `/w/${id}`,
    setup: [],
    cleanup: [],
  };
}

function result(code: number | null, killed = false): SpawnResult {
  return { code, signal: killed ? "SIGTERM" : null, stdout: "out", stderr: "", killed };
}

describe("sweep/dispatch/dispatcher", () => {
  it("keeps a failing job from affecting its siblings", async () => {
    const runCommand = vi.fn<RunCommand>(async (argv) => result(argv[1] === "b" ? 1 : 0));
    const dispatcher = new JobDispatcher({ backend: createLocalBackend(), log, runCommand });

    const outcomes = await dispatcher.dispatchAll([request("a"), request("b"), request("c")]);

    expect(outcomes.map((o) => `${o.requestId}:${o.status}`)).toEqual([
      "a:completed",
      "b:failed",
      "c:completed",
    ]);
    expect(outcomes[1]?.exitCode).toBe(1);
    expect(runCommand).toHaveBeenCalledWith(["trainer", "a"], {
      cwd: "/w/a",
      timeoutMs: 60_000,
      signal: expect.any(AbortSignal),
    });
  });

  it("reports a timeout separately from a stop", async () => {
    const runCommand = vi.fn<RunCommand>(async () => result(null, true));
    const dispatcher = new JobDispatcher({ backend: createLocalBackend(), log, runCommand });
    const [outcome] = await dispatcher.dispatchAll([request("slow")]);
    expect(outcome?.status).toBe("failed");
    expect(outcome?.timedOut).toBe(true);
  });

  it("turns a spawn error into a failed outcome", async () => {
    const runCommand = vi.fn<RunCommand>(async () => {
      throw new Error("spawn srun ENOENT");
    });
    const dispatcher = new JobDispatcher({ backend: createLocalBackend(), log, runCommand });
    const [outcome] = await dispatcher.dispatchAll([request("x")]);
    expect(outcome?.status).toBe("failed");
    expect(outcome?.error).toBe("Error: spawn srun ENOENT");
  });

  it("does not run anything in dry-run mode", async () => {
    const runCommand = vi.fn<RunCommand>(async () => result(0));
    const dispatcher = new JobDispatcher({
      backend: createLocalBackend(),
      log,
      runCommand,
      config: { dryRun: true },
    });
    const outcomes = await dispatcher.dispatchAll([request("a"), request("b")]);
    expect(outcomes.map((o) => o.status)).toEqual(["dry_run", "dry_run"]);
    expect(outcomes[0]?.argv).toEqual(["trainer", "a"]);
    expect(runCommand).not.toHaveBeenCalled();
  });

  it("forwards a stop to the running job and skips queued ones", async () => {
    const runCommand = vi.fn<RunCommand>(
      (_argv, opts) =>
        new Promise<SpawnResult>((resolve) => {
          if (opts.signal?.aborted) {
            resolve(result(null, true));
            return;
          }
          opts.signal?.addEventListener("abort", () => resolve(result(null, true)), { once: true });
        }),
    );
    const dispatcher = new JobDispatcher({
      backend: createLocalBackend(),
      log,
      runCommand,
      config: { maxInFlight: 1 },
    });
    const started: string[] = [];

    const outcomes = await dispatcher.dispatchAll([request("a"), request("b"), request("c")], {
      onStart: (req) => {
        started.push(req.id);
        expect(dispatcher.inFlightIds()).toEqual([req.id]);
        dispatcher.stop("test stop");
      },
    });

    expect(started).toEqual(["a"]);
    expect(outcomes.map((o) => o.status)).toEqual(["stopped", "skipped", "skipped"]);
    expect(outcomes[0]?.timedOut).toBe(false);
    expect(runCommand).toHaveBeenCalledTimes(1);
    expect(dispatcher.inFlightIds()).toEqual([]);
  });

  it("runs at most maxInFlight jobs at once", async () => {
    let active = 0;
    let peak = 0;
    const runCommand = vi.fn<RunCommand>(async () => {
      active += 1;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 5));
      active -= 1;
      return result(0);
    });
    const dispatcher = new JobDispatcher({
      backend: createLocalBackend(),
      log,
      runCommand,
      config: { maxInFlight: 2 },
    });
    await dispatcher.dispatchAll(["a", "b", "c", "d", "e"].map(request));
    expect(peak).toBe(2);
    expect(runCommand).toHaveBeenCalledTimes(5);
  });
});

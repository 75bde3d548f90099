import type { SubsystemLogger } from "../../logging/subsystem.js";
import { runCommandWithTimeout, type RunCommand } from "../../process/exec.js";
import type { JobOutcome, JobRequest, SchedulerBackend } from "./types.js";
import { tail } from "./utils.js";

export type JobDispatcherConfig = {
  /** Requests handed to the scheduler at once; queuing beyond that is the scheduler's job. */
  maxInFlight: number;
  dryRun: boolean;
};

const DEFAULT_CONFIG: JobDispatcherConfig = {
  maxInFlight: 8,
  dryRun: false,
};

type OutcomeFields = Omit<
  JobOutcome,
  "requestId" | "kind" | "argv" | "startedAt" | "finishedAt" | "durationMs"
>;

export type DispatchHooks = {
  onStart?: (request: JobRequest) => void;
  onFinish?: (outcome: JobOutcome, request: JobRequest) => Promise<void> | void;
};

async function mapWithConcurrency<T, R>(
  items: T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const out = new Array<R>(items.length);
  const concurrency = Math.max(1, Math.floor(limit));
  let next = 0;

  const workers = Array.from({ length: Math.min(concurrency, items.length) }, async () => {
    while (true) {
      const idx = next;
      next += 1;
      if (idx >= items.length) {
        return;
      }
      out[idx] = await fn(items[idx] as T, idx);
    }
  });

  await Promise.all(workers);
  return out;
}

/**
 * Hands job requests to a scheduler backend and reports one outcome per
 * request. Failures stay scoped to their request; nothing is retried.
 */
export class JobDispatcher {
  private backend: SchedulerBackend;
  private runCommand: RunCommand;
  private log: SubsystemLogger;
  private cfg: JobDispatcherConfig;

  private controller = new AbortController();
  private inFlight = new Map<string, JobRequest>();

  constructor(params: {
    backend: SchedulerBackend;
    log: SubsystemLogger;
    runCommand?: RunCommand;
    config?: Partial<JobDispatcherConfig>;
  }) {
    this.backend = params.backend;
    this.log = params.log;
    this.runCommand = params.runCommand ?? runCommandWithTimeout;
    this.cfg = { ...DEFAULT_CONFIG, ...params.config };
  }

  get stopped(): boolean {
    return this.controller.signal.aborted;
  }

  inFlightIds(): string[] {
    return [...this.inFlight.keys()].toSorted();
  }

  /**
   * Forwards a stop to every in-flight job and keeps queued ones from
   * starting. Remote termination is up to the scheduler.
   */
  stop(reason = "stop requested"): void {
    if (this.stopped) {
      return;
    }
    this.log.warn(`${reason}; forwarding stop to ${this.inFlight.size} in-flight job(s)`);
    this.controller.abort(reason);
  }

  async dispatchAll(requests: JobRequest[], hooks?: DispatchHooks): Promise<JobOutcome[]> {
    return await mapWithConcurrency(requests, this.cfg.maxInFlight, async (request) => {
      const outcome = await this.run(request, hooks);
      await hooks?.onFinish?.(outcome, request);
      return outcome;
    });
  }

  async run(request: JobRequest, hooks?: Pick<DispatchHooks, "onStart">): Promise<JobOutcome> {
    const argv = this.backend.renderArgv(request);
    const startedAt = new Date().toISOString();
    const started = Date.now();
    const finish = (fields: OutcomeFields): JobOutcome => ({
      requestId: request.id,
      kind: request.kind,
      argv,
      startedAt,
      finishedAt: new Date().toISOString(),
      durationMs: Date.now() - started,
      ...fields,
    });

    if (this.stopped) {
      return finish({ status: "skipped" });
    }
    if (this.cfg.dryRun) {
      this.log.info(`[dry-run] ${request.id}: ${argv.join(" ")}`);
      return finish({ status: "dry_run" });
    }

    this.inFlight.set(request.id, request);
    hooks?.onStart?.(request);
    this.log.info(`dispatch ${request.kind} ${request.id} via ${this.backend.name}`);

    try {
      const result = await this.runCommand(argv, {
        cwd: request.workDir,
        timeoutMs: this.backend.timeoutMs(request),
        signal: this.controller.signal,
      });
      const ok = result.code === 0 && !result.killed;
      const outcome = finish({
        status: ok ? "completed" : this.stopped ? "stopped" : "failed",
        exitCode: result.code,
        timedOut: result.killed && !this.stopped,
        stdoutTail: tail(result.stdout) || undefined,
        stderrTail: tail(result.stderr) || undefined,
      });
      if (outcome.status !== "completed") {
        this.log.warn(
          `${request.kind} ${request.id} ${outcome.status}: exit=${String(result.code)}${
            outcome.timedOut ? " (timed out)" : ""
          }`,
        );
      }
      return outcome;
    } catch (err) {
      this.log.warn(`${request.kind} ${request.id} failed to start: ${String(err)}`);
      return finish({ status: "failed", error: String(err) });
    } finally {
      this.inFlight.delete(request.id);
    }
  }
}

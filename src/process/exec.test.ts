import { describe, expect, it } from "vitest";
import { runCommandWithTimeout } from "./exec.js";

const node = process.execPath;

describe("process/exec", () => {
  it("captures output and the exit code", async () => {
    const res = await runCommandWithTimeout(
      [node, "-e", "process.stdout.write('hi'); process.exit(3)"],
      { timeoutMs: 10_000 },
    );
    expect(res).toEqual({ code: 3, signal: null, stdout: "hi", stderr: "", killed: false });
  });

  it("kills a command that outlives its timeout", async () => {
    const res = await runCommandWithTimeout([node, "-e", "setTimeout(() => {}, 10000)"], {
      timeoutMs: 100,
    });
    expect(res.killed).toBe(true);
    expect(res.signal).toBe("SIGTERM");
  });

  it("does not fire early for timeouts beyond the timer range", async () => {
    const thirtyDaysMs = (30 * 86_400 + 1_800) * 1000;
    const res = await runCommandWithTimeout([node, "-e", "setTimeout(() => {}, 300)"], {
      timeoutMs: thirtyDaysMs,
    });
    expect(res.killed).toBe(false);
    expect(res.code).toBe(0);
  });

  it("stops the command when the signal aborts", async () => {
    const controller = new AbortController();
    const pending = runCommandWithTimeout([node, "-e", "setTimeout(() => {}, 10000)"], {
      signal: controller.signal,
    });
    setTimeout(() => controller.abort(), 100);
    const res = await pending;
    expect(res.killed).toBe(true);
  });
});

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { runDemoSession, scriptedInput } from "./runDemo.js";

beforeEach(() => {
  vi.useFakeTimers();
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.useRealTimers();
  vi.restoreAllMocks();
});

describe("scriptedInput", () => {
  it("flips direction every 90 ticks", () => {
    expect(scriptedInput(0)).toEqual({ moveX: 1, moveY: 0 });
    expect(scriptedInput(89)).toEqual({ moveX: 1, moveY: 0 });
    expect(scriptedInput(90)).toEqual({ moveX: -1, moveY: 0 });
    expect(scriptedInput(180)).toEqual({ moveX: 1, moveY: 0 });
  });
});

describe("runDemoSession", () => {
  it("keeps the client in line with a server that has hidden walls", async () => {
    const pending = runDemoSession({
      durationMs: 3000,
      wall: 1,
      cvars: {
        sv_minbuffer: "2",
        cl_netem: "1",
        cl_netem_tx_latency_ms: "30",
        cl_netem_rx_latency_ms: "30",
      },
    });
    await vi.advanceTimersByTimeAsync(3100);
    const report = await pending;

    expect(report.ticks.server).toBeGreaterThan(100);
    expect(report.ticks.client).toBeGreaterThan(100);
    expect(Math.abs(report.cube.server.x)).toBeLessThanOrEqual(1);
    expect(report.stats.cubeServer.divergencesSent).toBeGreaterThan(0);
    expect(report.stats.cubeClient.reconciliations).toBeGreaterThan(0);
    expect(report.stats.cubeClient.replayedTicks).toBeGreaterThan(0);
    expect(report.stats.obstacleServer.divergencesSent).toBe(0);
    expect(report.dropped).toEqual({ tx: 0, rx: 0 });
  });

  it("rejects unknown cvars", async () => {
    await expect(runDemoSession({ durationMs: 10, cvars: { sv_nope: "1" } })).rejects.toThrow(
      "unknown cvar: sv_nope",
    );
  });
});

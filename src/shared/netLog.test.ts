import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { closeNetLog, getNetLogPath, initNetLog, netLog, netLogError } from "./netLog.js";

describe("netLog", () => {
  afterEach(() => {
    closeNetLog();
    vi.restoreAllMocks();
  });

  it("writes timestamped, tagged lines to stderr", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    netLog("[p1] waiting for missing tick 12");

    expect(spy).toHaveBeenCalledOnce();
    expect(spy.mock.calls[0]?.[0]).toMatch(
      /^\d{4}-\d{2}-\d{2}T[\d:.]+Z \[tickwarp\] \[p1\] waiting for missing tick 12$/,
    );
  });

  it("includes the message of logged errors", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    netLogError("tick error", new Error("boom"));

    const line = String(spy.mock.calls[0]?.[0]);
    expect(line).toContain("[tickwarp] tick error: boom\n");
  });

  it("stringifies non-Error values", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    netLogError("rejection", 42);

    expect(String(spy.mock.calls[0]?.[0])).toMatch(/\[tickwarp\] rejection: 42$/);
  });

  it("appends lines to the log file once initialized", () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const dir = mkdtempSync(join(tmpdir(), "tickwarp-log-"));
    try {
      initNetLog(dir);
      expect(getNetLogPath()).toBe(join(dir, "tickwarp.log"));

      netLog("first");
      netLog("second");

      const lines = readFileSync(join(dir, "tickwarp.log"), "utf8").trimEnd().split("\n");
      expect(lines).toHaveLength(2);
      expect(lines[0]).toMatch(/\[tickwarp\] first$/);
      expect(lines[1]).toMatch(/\[tickwarp\] second$/);
    } finally {
      closeNetLog();
      rmSync(dir, { recursive: true, force: true });
    }
  });
});

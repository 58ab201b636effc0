import { describe, expect, it } from "vitest";
import { History } from "../history/History.js";
import { applyCatchUp, bufferedAhead, validateCatchUpSettings } from "./CatchUpPolicy.js";

function historyOf(ticks: number[]): History<number> {
  const history = new History<number>();
  for (const t of ticks) history.write(t, t);
  return history;
}

function range(from: number, to: number): number[] {
  const out: number[] = [];
  for (let t = from; t <= to; t++) out.push(t);
  return out;
}

describe("bufferedAhead", () => {
  it("counts entries at or after the cursor", () => {
    const history = historyOf(range(0, 9));
    expect(bufferedAhead(history, 4)).toBe(6);
    expect(bufferedAhead(history, 0)).toBe(10);
    expect(bufferedAhead(history, 20)).toBe(0);
  });

  it("counts from the insertion point when the cursor tick is absent", () => {
    const history = historyOf([2, 4, 6, 8]);
    expect(bufferedAhead(history, 5)).toBe(2);
  });
});

describe("applyCatchUp", () => {
  const settings = { minBuffer: 5, maxBuffer: 10 };

  it("leaves the cursor alone within maxBuffer", () => {
    const history = historyOf(range(0, 9));
    expect(applyCatchUp(history, 0, settings)).toEqual({ cursor: 0, skipped: 0 });
  });

  it("jumps so that minBuffer entries remain", () => {
    const history = historyOf(range(0, 19));
    expect(applyCatchUp(history, 0, settings)).toEqual({ cursor: 15, skipped: 15 });
  });

  it("uses the insertion index when the cursor tick is missing", () => {
    expect(applyCatchUp(historyOf(range(10, 19)), 3, settings)).toEqual({ cursor: 3, skipped: 0 });
    expect(applyCatchUp(historyOf(range(10, 20)), 3, settings)).toEqual({
      cursor: 16,
      skipped: 13,
    });
  });

  it("lands on the newest entry when minBuffer is 0", () => {
    const history = historyOf(range(0, 5));
    expect(applyCatchUp(history, 0, { minBuffer: 0, maxBuffer: 2 })).toEqual({
      cursor: 5,
      skipped: 5,
    });
  });

  it("never moves the cursor backwards", () => {
    const history = historyOf([0, 1, 2, 50, 51, 52]);
    expect(applyCatchUp(history, 1, { minBuffer: 5, maxBuffer: 4 })).toEqual({
      cursor: 1,
      skipped: 0,
    });
  });
});

describe("validateCatchUpSettings", () => {
  it("accepts sane values", () => {
    expect(validateCatchUpSettings({ minBuffer: 0, maxBuffer: 0 })).toEqual({
      minBuffer: 0,
      maxBuffer: 0,
    });
  });

  it("rejects negative, fractional or inverted bounds", () => {
    expect(() => validateCatchUpSettings({ minBuffer: -1, maxBuffer: 10 })).toThrow(RangeError);
    expect(() => validateCatchUpSettings({ minBuffer: 2.5, maxBuffer: 10 })).toThrow(RangeError);
    expect(() => validateCatchUpSettings({ minBuffer: 5, maxBuffer: 3 })).toThrow(
      "maxBuffer must be an integer >= minBuffer (5), got 3",
    );
  });
});

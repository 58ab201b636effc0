import { describe, expect, it } from "vitest";
import { History } from "./History.js";

interface Keys {
  w: boolean;
  a: boolean;
  s: boolean;
  d: boolean;
}

const inputA: Keys = { w: false, a: true, s: false, d: false };
const inputB: Keys = { w: true, a: false, s: false, d: false };
const inputC: Keys = { w: true, a: true, s: true, d: true };

function ticksOf<T>(history: History<T>): number[] {
  return [...history].map((e) => e.tick);
}

describe("History ordering and lookup", () => {
  it("finds out-of-order writes at their sorted indices", () => {
    const history = new History<Keys>(3);
    history.write(100, inputB);
    history.write(0, inputA);
    history.write(69, inputC);

    expect(history.find(0)).toEqual({ found: true, index: 0 });
    expect(history.find(69)).toEqual({ found: true, index: 1 });
    expect(history.find(100)).toEqual({ found: true, index: 2 });
  });

  it("gives direct index access in tick order", () => {
    const history = new History<Keys>(3);
    history.write(100, inputB);
    history.write(0, inputA);
    history.write(69, inputC);

    expect(history.at(0)).toBe(inputA);
    expect(history.at(1)).toBe(inputC);
    expect(history.at(2)).toBe(inputB);
  });

  it("setAt replaces data without moving the entry", () => {
    const history = new History<Keys>();
    history.write(5, inputA);
    history.write(9, inputB);

    const { index } = history.find(9);
    history.setAt(index, inputC);

    expect(history.read(9)).toEqual({ found: true, data: inputC });
    expect(ticksOf(history)).toEqual([5, 9]);
  });

  it("overwrites the same tick and keeps only the last value", () => {
    const history = new History<Keys>(3);
    history.write(0, inputB);
    history.write(0, inputA);
    history.write(0, inputC);

    expect(history.count).toBe(1);
    expect(history.find(0)).toEqual({ found: true, index: 0 });
    expect(history.at(0)).toBe(inputC);
  });

  it("reads back values written in any order", () => {
    const history = new History<Keys>(3);
    history.write(0, inputA);
    history.write(2, inputB);
    history.write(1, inputC);

    expect(history.read(0)).toEqual({ found: true, data: inputA });
    expect(history.read(1)).toEqual({ found: true, data: inputC });
    expect(history.read(2)).toEqual({ found: true, data: inputB });
  });

  it("reports a miss with the insertion index", () => {
    const history = new History<string>();
    history.write(10, "a");
    history.write(20, "b");
    history.write(30, "c");

    expect(history.find(5)).toEqual({ found: false, index: 0 });
    expect(history.find(25)).toEqual({ found: false, index: 2 });
    expect(history.find(31)).toEqual({ found: false, index: 3 });
    expect(history.read(25)).toEqual({ found: false, data: undefined });
  });

  it("stays sorted and unique under a scrambled write sequence", () => {
    const history = new History<number>();
    const ticks = [7, 3, 11, 3, 0, 42, 7, 19, 1, 11, 5];
    for (const [i, t] of ticks.entries()) history.write(t, i);

    expect(ticksOf(history)).toEqual([0, 1, 3, 5, 7, 11, 19, 42]);
    // last write wins
    expect(history.read(3)).toEqual({ found: true, data: 3 });
    expect(history.read(7)).toEqual({ found: true, data: 6 });
    expect(history.read(11)).toEqual({ found: true, data: 9 });
  });

  it("reports 0 for most recent and oldest tick when empty", () => {
    const history = new History<string>();
    expect(history.mostRecentTick).toBe(0);
    expect(history.oldestTick).toBe(0);

    history.write(12, "x");
    history.write(4, "y");
    expect(history.mostRecentTick).toBe(12);
    expect(history.oldestTick).toBe(4);
    expect(history.getEntryTick(1)).toBe(12);
  });

  it("throws on an out-of-range index", () => {
    const history = new History<string>();
    history.write(1, "x");
    expect(() => history.at(1)).toThrow(RangeError);
    expect(() => history.getEntryTick(-1)).toThrow(RangeError);
  });
});

describe("History capacity", () => {
  it("computes the cut threshold from capacity", () => {
    expect(new History<number>(3).cutThreshold).toBe(13);
    expect(new History<number>(100).cutThreshold).toBe(150);
    expect(new History<number>(0).cutThreshold).toBe(Number.POSITIVE_INFINITY);
    expect(new History<number>(-1).capacity).toBe(0);
  });

  it("prunes old ticks and keeps the newest write", () => {
    const history = new History<Keys>(3);
    for (let i = 0; i < 100; i++) history.write(i, inputA);
    history.write(101, inputB);

    expect(history.read(101)).toEqual({ found: true, data: inputB });
    expect(history.find(0).found).toBe(false);
  });

  it("never exceeds the cut threshold and trims to exactly capacity", () => {
    const history = new History<number>(20);
    let max = 0;
    for (let i = 0; i < 500; i++) {
      history.write(i, i);
      max = Math.max(max, history.count);
      if (history.count === 20 && i >= 29) {
        expect(history.oldestTick).toBe(i - 19);
        expect(history.mostRecentTick).toBe(i);
      }
    }
    expect(max).toBeLessThan(history.cutThreshold);
  });

  it("prunes to capacity right when the threshold is reached", () => {
    const history = new History<number>(4);
    // threshold = max(14, 6) = 14
    for (let i = 0; i < 13; i++) history.write(i, i);
    expect(history.count).toBe(13);

    history.write(13, 13);
    expect(history.count).toBe(4);
    expect(ticksOf(history)).toEqual([10, 11, 12, 13]);
  });

  it("treats a fractional capacity below 1 as unbounded", () => {
    const history = new History<number>(0.5);
    for (let i = 0; i < 10; i++) history.write(i, i);

    expect(history.capacity).toBe(0);
    expect(history.cutThreshold).toBe(Number.POSITIVE_INFINITY);
    expect(history.count).toBe(10);
    expect(history.read(9)).toEqual({ found: true, data: 9 });
  });

  it("rounds a fractional capacity down", () => {
    const history = new History<number>(4.7);
    expect(history.capacity).toBe(4);
    expect(history.cutThreshold).toBe(14);
  });

  it("never prunes in unbounded mode", () => {
    const history = new History<number>();
    for (let i = 0; i < 5000; i++) history.write(i, i);
    expect(history.count).toBe(5000);
    expect(history.oldestTick).toBe(0);
  });
});

describe("History clearing", () => {
  function filled(): History<string> {
    const history = new History<string>();
    for (const t of [2, 4, 6, 8, 10]) history.write(t, `t${t}`);
    return history;
  }

  it("clearPast keeps the boundary tick unless inclusive", () => {
    const exclusive = filled();
    exclusive.clearPast(6);
    expect(ticksOf(exclusive)).toEqual([6, 8, 10]);

    const inclusive = filled();
    inclusive.clearPast(6, true);
    expect(ticksOf(inclusive)).toEqual([8, 10]);
  });

  it("clearPast on an absent tick removes everything before where it would sit", () => {
    const exclusive = filled();
    exclusive.clearPast(7);
    expect(ticksOf(exclusive)).toEqual([8, 10]);

    const inclusive = filled();
    inclusive.clearPast(7, true);
    expect(ticksOf(inclusive)).toEqual([8, 10]);
  });

  it("clearFuture keeps the boundary tick unless inclusive", () => {
    const exclusive = filled();
    exclusive.clearFuture(6);
    expect(ticksOf(exclusive)).toEqual([2, 4, 6]);

    const inclusive = filled();
    inclusive.clearFuture(6, true);
    expect(ticksOf(inclusive)).toEqual([2, 4]);
  });

  it("clearFuture on an absent tick removes everything after where it would sit", () => {
    const exclusive = filled();
    exclusive.clearFuture(5);
    expect(ticksOf(exclusive)).toEqual([2, 4]);

    const inclusive = filled();
    inclusive.clearFuture(5, true);
    expect(ticksOf(inclusive)).toEqual([2, 4]);
  });

  it("clearing past either end is a no-op or empties the history", () => {
    const before = filled();
    before.clearPast(0);
    expect(before.count).toBe(5);
    before.clearFuture(0);
    expect(before.count).toBe(0);

    const after = filled();
    after.clearFuture(99);
    expect(after.count).toBe(5);
    after.clearPast(99);
    expect(after.count).toBe(0);
  });
});

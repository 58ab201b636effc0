import { describe, expect, it, vi } from "vitest";
import { NetworkedScene, type RollbackTarget } from "./NetworkedScene.js";

function target(id: string, recorded: number[]): RollbackTarget & { applied: number[] } {
  const applied: number[] = [];
  return {
    id,
    applied,
    rollbackTo(tick) {
      if (!recorded.includes(tick)) return false;
      applied.push(tick);
      return true;
    },
    resetState() {
      const last = recorded.at(-1);
      if (last === undefined) return false;
      applied.push(last);
      return true;
    },
  };
}

describe("NetworkedScene", () => {
  it("rejects duplicate ids", () => {
    const scene = new NetworkedScene();
    scene.register(target("cube", []));
    expect(() => scene.register(target("cube", []))).toThrow(
      "[scene] duplicate controller id: cube",
    );
    expect(scene.size).toBe(1);
  });

  it("only unregisters the instance that was registered", () => {
    const scene = new NetworkedScene();
    const original = target("cube", []);
    scene.register(original);

    expect(scene.unregister(target("cube", []))).toBe(false);
    expect(scene.get("cube")).toBe(original);
    expect(scene.unregister(original)).toBe(true);
    expect(scene.size).toBe(0);
  });

  it("rolls back every controller that recorded the tick", () => {
    const scene = new NetworkedScene();
    const a = target("a", [1, 2, 3]);
    const b = target("b", [3, 4]);
    scene.register(a);
    scene.register(b);

    expect(scene.rollbackAll(2)).toBe(1);
    expect(scene.rollbackAll(3)).toBe(2);
    expect(a.applied).toEqual([2, 3]);
    expect(b.applied).toEqual([3]);
  });

  it("resets each controller to its latest state", () => {
    const scene = new NetworkedScene();
    const a = target("a", [1, 2]);
    const empty = target("empty", []);
    const reset = vi.spyOn(empty, "resetState");
    scene.register(a);
    scene.register(empty);

    expect(scene.resetAll()).toBe(1);
    expect(a.applied).toEqual([2]);
    expect(reset).toHaveBeenCalledOnce();
  });

  it("clear drops everything", () => {
    const scene = new NetworkedScene();
    scene.register(target("a", []));
    scene.clear();
    expect(scene.getAll()).toEqual([]);
  });
});

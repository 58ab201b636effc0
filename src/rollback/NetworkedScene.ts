import type { Tick } from "../history/History.js";

/** What the scene needs from a controller to rewind it. */
export interface RollbackTarget {
  readonly id: string;
  rollbackTo(tick: Tick): boolean;
  resetState(): boolean;
}

/**
 * Registry of the networked controllers in one session.
 *
 * Controllers register on creation and unregister on dispose; the session
 * clears the scene at teardown.
 */
export class NetworkedScene {
  private readonly targets = new Map<string, RollbackTarget>();

  get size(): number {
    return this.targets.size;
  }

  register(target: RollbackTarget): void {
    if (this.targets.has(target.id)) {
      throw new Error(`[scene] duplicate controller id: ${target.id}`);
    }
    this.targets.set(target.id, target);
  }

  /** Remove `target` if it is the one registered under its id. */
  unregister(target: RollbackTarget): boolean {
    if (this.targets.get(target.id) !== target) return false;
    return this.targets.delete(target.id);
  }

  get(id: string): RollbackTarget | undefined {
    return this.targets.get(id);
  }

  getAll(): RollbackTarget[] {
    return [...this.targets.values()];
  }

  /** Rewind every controller to `tick`. Returns how many had a state recorded there. */
  rollbackAll(tick: Tick): number {
    let applied = 0;
    for (const target of this.targets.values()) {
      if (target.rollbackTo(tick)) applied++;
    }
    return applied;
  }

  /** Snap every controller back to its most recent recorded state. */
  resetAll(): number {
    let applied = 0;
    for (const target of this.targets.values()) {
      if (target.resetState()) applied++;
    }
    return applied;
  }

  clear(): void {
    this.targets.clear();
  }
}

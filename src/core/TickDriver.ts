import { TICK_RATE } from "../config/constants.js";
import type { Tick } from "../history/History.js";
import { netLogError } from "../shared/netLog.js";

/** A participant in the fixed-tick schedule. */
export interface TickPhases {
  preTick?(tick: Tick): void;
  tick?(tick: Tick): void;
  postTick?(tick: Tick): void;
}

/**
 * Fixed-tick scheduler.
 *
 * Each step runs preTick for every participant, then tick, then postTick,
 * in registration order, then advances the tick counter. Steps never
 * overlap: calling step() from inside a phase throws.
 */
export class TickDriver {
  private readonly participants: TickPhases[] = [];
  private intervalId: ReturnType<typeof setInterval> | null = null;
  private fixedDt: number;
  private nextTick: Tick;
  private stepping = false;

  constructor(tickRate = TICK_RATE, firstTick: Tick = 0) {
    if (!(tickRate > 0)) throw new RangeError(`tick rate must be positive, got ${tickRate}`);
    this.fixedDt = 1 / tickRate;
    this.nextTick = firstTick;
  }

  /** Tick the next step() will run. */
  get currentTick(): Tick {
    return this.nextTick;
  }

  /** Seconds per tick. */
  get dt(): number {
    return this.fixedDt;
  }

  get running(): boolean {
    return this.intervalId !== null;
  }

  /** Add a participant; returns a function that removes it. */
  add(participant: TickPhases): () => void {
    this.participants.push(participant);
    return () => {
      const idx = this.participants.indexOf(participant);
      if (idx >= 0) this.participants.splice(idx, 1);
    };
  }

  step(): Tick {
    if (this.stepping) {
      throw new Error(`TickDriver: nested step during tick ${this.nextTick}`);
    }
    this.stepping = true;
    const tick = this.nextTick;
    try {
      // Snapshot so removal during a phase doesn't skip anyone.
      const participants = [...this.participants];
      for (const p of participants) p.preTick?.(tick);
      for (const p of participants) p.tick?.(tick);
      for (const p of participants) p.postTick?.(tick);
    } finally {
      this.nextTick = tick + 1;
      this.stepping = false;
    }
    return tick;
  }

  start(): void {
    if (this.intervalId !== null) return;
    this.intervalId = setInterval(() => {
      try {
        this.step();
      } catch (err) {
        netLogError("tick error", err);
      }
    }, this.fixedDt * 1000);
  }

  stop(): void {
    if (this.intervalId !== null) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }
  }

  setTickRate(hz: number): void {
    if (hz <= 0) return;
    this.fixedDt = 1 / hz;
    // Restart interval at new rate if currently running
    if (this.intervalId !== null) {
      this.stop();
      this.start();
    }
  }
}

import type { ServerDriven } from "../rollback/Authoritative.js";
import type { PayloadCodec } from "../shared/payloadCodec.js";

const POSITION_TOLERANCE = 0.02;
const ANGLE_TOLERANCE_DEG = 0.5;

export interface OscillatorState {
  y: number;
  /** Degrees in [0, 360). */
  angle: number;
  /** Seconds simulated so far. */
  time: number;
}

export interface OscillatorOptions {
  baseY?: number;
  /** Peak distance from baseY. */
  range?: number;
  /** Degrees per second. */
  rotationSpeed?: number;
}

/** A spinning obstacle bobbing on a sine wave. Nobody sends it input. */
export class Oscillator implements ServerDriven<OscillatorState> {
  y: number;
  angle = 0;
  time = 0;

  private readonly baseY: number;
  private readonly range: number;
  private readonly rotationSpeed: number;

  constructor(options: OscillatorOptions = {}) {
    this.baseY = options.baseY ?? 0;
    this.range = options.range ?? 1;
    this.rotationSpeed = options.rotationSpeed ?? 45;
    this.y = this.baseY;
  }

  gatherState(): OscillatorState {
    return { y: this.y, angle: this.angle, time: this.time };
  }

  simulate(_input: null, dt: number): void {
    this.angle = (this.angle + this.rotationSpeed * dt) % 360;
    this.time += dt;
    this.y = this.baseY + Math.sin(this.time) * this.range;
  }

  statesMatch(a: OscillatorState, b: OscillatorState): boolean {
    if (Math.abs(a.y - b.y) > POSITION_TOLERANCE) return false;
    const diff = Math.abs(a.angle - b.angle) % 360;
    return Math.min(diff, 360 - diff) <= ANGLE_TOLERANCE_DEG;
  }

  applyState(state: OscillatorState): void {
    this.y = state.y;
    this.angle = state.angle;
    this.time = state.time;
  }
}

export const oscillatorStateCodec: PayloadCodec<OscillatorState> = {
  encode(state, w) {
    w.writeF64(state.y);
    w.writeF64(state.angle);
    w.writeF64(state.time);
  },
  decode(r) {
    return { y: r.readF64(), angle: r.readF64(), time: r.readF64() };
  },
};

import type { Authoritative } from "../rollback/Authoritative.js";
import type { PayloadCodec } from "../shared/payloadCodec.js";

/** Units per second along the input direction. */
export const CUBE_SPEED = 10;

/** Positions closer than this count as the same. */
const POSITION_TOLERANCE = 0.001;

export interface CubeInput {
  /** -1, 0 or 1 */
  moveX: number;
  /** -1, 0 or 1 */
  moveY: number;
}

export interface CubeState {
  x: number;
  y: number;
}

/** Axis-aligned walls the cube can't leave. */
export interface CubeBounds {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

export const IDLE_INPUT: CubeInput = { moveX: 0, moveY: 0 };

/**
 * A cube moved at constant speed along its normalized input direction, with
 * position clamped per axis.
 * Bounds are optional so the server can know about walls a client doesn't.
 */
export class CubeMover implements Authoritative<CubeInput, CubeState> {
  x: number;
  y: number;
  /** Input sampled by gatherInput(). */
  held: CubeInput = IDLE_INPUT;
  replayedSteps = 0;

  constructor(
    private readonly bounds: CubeBounds | null = null,
    start: CubeState = { x: 0, y: 0 },
  ) {
    this.x = start.x;
    this.y = start.y;
  }

  gatherInput(): CubeInput {
    return { ...this.held };
  }

  gatherState(): CubeState {
    return { x: this.x, y: this.y };
  }

  simulate(input: CubeInput | null, dt: number, replay: boolean): void {
    if (replay) this.replayedSteps++;
    if (!input) return;
    const len = Math.hypot(input.moveX, input.moveY);
    if (len === 0) return;

    const dist = (dt * CUBE_SPEED) / len;
    this.x = this.clamp(this.x + input.moveX * dist, this.bounds?.minX, this.bounds?.maxX);
    this.y = this.clamp(this.y + input.moveY * dist, this.bounds?.minY, this.bounds?.maxY);
  }

  statesMatch(a: CubeState, b: CubeState): boolean {
    return Math.hypot(a.x - b.x, a.y - b.y) <= POSITION_TOLERANCE;
  }

  applyState(state: CubeState): void {
    this.x = state.x;
    this.y = state.y;
  }

  private clamp(v: number, min = Number.NEGATIVE_INFINITY, max = Number.POSITIVE_INFINITY): number {
    return Math.min(Math.max(v, min), max);
  }
}

export const cubeInputCodec: PayloadCodec<CubeInput> = {
  encode(input, w) {
    w.writeI8(input.moveX);
    w.writeI8(input.moveY);
  },
  decode(r) {
    return { moveX: r.readI8(), moveY: r.readI8() };
  },
};

export const cubeStateCodec: PayloadCodec<CubeState> = {
  encode(state, w) {
    w.writeF64(state.x);
    w.writeF64(state.y);
  },
  decode(r) {
    return { x: r.readF64(), y: r.readF64() };
  },
};

import {
  HISTORY_BUFFER_SIZE,
  MAX_SERVER_BUFFER,
  MIN_SERVER_BUFFER,
  TICK_RATE,
} from "../config/constants.js";
import type { TickPhases } from "../core/TickDriver.js";
import { History, type Tick } from "../history/History.js";
import { netLog, netLogError } from "../shared/netLog.js";
import { type PayloadCodec, PayloadWriter, encodePayload } from "../shared/payloadCodec.js";
import type { Simulation } from "./Authoritative.js";
import { type CatchUpSettings, validateCatchUpSettings } from "./CatchUpPolicy.js";
import type { NetworkedScene, RollbackTarget } from "./NetworkedScene.js";
import { ReconciliationEngine } from "./ReconciliationEngine.js";
import { type RollbackStats, createRollbackStats } from "./RollbackStats.js";

export type ControllerRole = "owner" | "authority" | "observer";

export interface ControllerSettings extends CatchUpSettings {
  /** Capacity of each history. */
  historySize: number;
  /** Seconds per tick passed to simulate(). */
  tickDelta: number;
}

export const DEFAULT_CONTROLLER_SETTINGS: Readonly<ControllerSettings> = {
  minBuffer: MIN_SERVER_BUFFER,
  maxBuffer: MAX_SERVER_BUFFER,
  historySize: HISTORY_BUFFER_SIZE,
  tickDelta: 1 / TICK_RATE,
};

export interface ControllerBaseOptions {
  id: string;
  settings?: Partial<ControllerSettings>;
  /** Registers the controller for scene-wide rollback until dispose(). */
  scene?: NetworkedScene;
  payloadCapacity?: number;
}

/** State history, engine, scratch writer and scene membership shared by every controller. */
export abstract class RollbackController<I, S> implements RollbackTarget, TickPhases {
  readonly id: string;
  abstract readonly role: ControllerRole;

  protected settings: ControllerSettings;
  protected readonly states: History<S>;
  protected readonly stats: RollbackStats = createRollbackStats();
  protected readonly engine: ReconciliationEngine<I, S>;
  protected readonly writer: PayloadWriter;
  private scene: NetworkedScene | null;

  protected constructor(
    options: ControllerBaseOptions,
    simulation: Simulation<I, S>,
    protected readonly stateCodec: PayloadCodec<S>,
    inputs: History<I> | null,
  ) {
    this.id = options.id;
    const merged = { ...DEFAULT_CONTROLLER_SETTINGS, ...options.settings };
    this.settings = { ...merged, ...validateCatchUpSettings(merged) };
    if (!(this.settings.tickDelta > 0)) {
      throw new RangeError(`tickDelta must be positive, got ${this.settings.tickDelta}`);
    }
    this.states = new History<S>(this.settings.historySize);
    this.engine = new ReconciliationEngine(this.id, simulation, this.states, inputs, this.stats);
    this.writer = new PayloadWriter(options.payloadCapacity);
    this.scene = options.scene ?? null;
    this.scene?.register(this);
  }

  abstract tick(tick: Tick): void;

  /** Handle a payload addressed to this controller. */
  abstract receive(tick: Tick, payload: Uint8Array, connectionId?: string): void;

  /** Latest recorded (or authoritative) state, if any. */
  latestState(): S | undefined {
    return this.states.count > 0 ? this.states.at(this.states.count - 1) : undefined;
  }

  readState(tick: Tick): S | undefined {
    return this.states.read(tick).data;
  }

  getStats(): Readonly<RollbackStats> {
    return { ...this.stats };
  }

  getSettings(): Readonly<ControllerSettings> {
    return { ...this.settings };
  }

  /** Change the catch-up bounds of a live controller. */
  updateSettings(settings: Partial<CatchUpSettings>): void {
    const next = validateCatchUpSettings({ ...this.settings, ...settings });
    this.settings = { ...this.settings, ...next };
  }

  rollbackTo(tick: Tick): boolean {
    return this.engine.rollbackTo(tick);
  }

  resetState(): boolean {
    return this.engine.resetToLatest();
  }

  dispose(): void {
    this.scene?.unregister(this);
    this.scene = null;
  }

  protected encodeState(state: S): Uint8Array {
    return encodePayload(this.stateCodec, state, this.writer);
  }

  /** Run a decode, counting and logging failures instead of throwing. */
  protected decodeOrDrop<T>(tick: Tick, decode: () => T): { ok: true; value: T } | { ok: false } {
    try {
      return { ok: true, value: decode() };
    } catch (err) {
      this.stats.malformedPayloads++;
      netLogError(`[${this.id}] malformed payload for tick ${tick}`, err);
      return { ok: false };
    }
  }

  protected log(msg: string): void {
    netLog(`[${this.id}] ${msg}`);
  }
}

import { History, type Tick } from "../history/History.js";
import {
  type PayloadCodec,
  decodePairPayload,
  decodePayload,
  encodePairPayload,
} from "../shared/payloadCodec.js";
import type { Authoritative } from "./Authoritative.js";
import type { AuthorityStep, ReconcileOutcome } from "./ReconciliationEngine.js";
import {
  type ControllerBaseOptions,
  DEFAULT_CONTROLLER_SETTINGS,
  RollbackController,
} from "./RollbackController.js";

export type Transmit = (tick: Tick, payload: Uint8Array) => void;

export interface PredictedControllerOptions<I, S> extends ControllerBaseOptions {
  role: "owner" | "authority";
  contract: Authoritative<I, S>;
  inputCodec: PayloadCodec<I>;
  stateCodec: PayloadCodec<S>;
  /**
   * Owner: sends the encoded (input, state) pair to the server.
   * Authority: sends an encoded authoritative state back to the owner.
   */
  transmit: Transmit;
}

/**
 * Controller for an entity driven by its owning client's input.
 *
 * The owner predicts every tick and submits what it did; the authority
 * re-simulates those inputs behind a small buffer and sends its own state
 * back whenever the owner's claim was wrong.
 */
export class PredictedController<I, S> extends RollbackController<I, S> {
  readonly role: "owner" | "authority";

  private readonly contract: Authoritative<I, S>;
  private readonly inputCodec: PayloadCodec<I>;
  private readonly transmit: Transmit;
  private readonly inputs: History<I>;
  /** Owner: last local tick. Authority: server cursor, null until the first input. */
  private cursor: Tick | null = null;
  private lastStep: AuthorityStep | null = null;
  private lastReconcile: ReconcileOutcome | null = null;

  constructor(options: PredictedControllerOptions<I, S>) {
    const inputs = new History<I>(
      options.settings?.historySize ?? DEFAULT_CONTROLLER_SETTINGS.historySize,
    );
    super(options, options.contract, options.stateCodec, inputs);
    this.role = options.role;
    this.contract = options.contract;
    this.inputCodec = options.inputCodec;
    this.transmit = options.transmit;
    this.inputs = inputs;
  }

  /** Owner: the local tick. Authority: the server cursor (null until an input arrives). */
  get controllerTick(): Tick | null {
    return this.cursor;
  }

  get lastAuthorityStep(): AuthorityStep | null {
    return this.lastStep;
  }

  get lastReconciliation(): ReconcileOutcome | null {
    return this.lastReconcile;
  }

  tick(localTick: Tick): void {
    if (this.role === "owner") {
      this.cursor = localTick;
      const input = this.contract.gatherInput();
      this.contract.simulate(input, this.settings.tickDelta, false);
      this.inputs.write(localTick, input);
      return;
    }

    if (this.cursor === null) return;
    const step = this.engine.stepAuthority(
      this.cursor,
      this.settings.tickDelta,
      this.settings,
      (tick, state) => this.transmit(tick, this.encodeState(state)),
    );
    this.cursor = step.cursor;
    this.lastStep = step;
  }

  postTick(localTick: Tick): void {
    if (this.role !== "owner") return;
    const input = this.inputs.read(localTick);
    if (!input.found) return;

    const state = this.contract.gatherState();
    this.states.write(localTick, state);
    this.transmit(
      localTick,
      encodePairPayload(this.inputCodec, input.data, this.stateCodec, state, this.writer),
    );
  }

  receive(tick: Tick, payload: Uint8Array): void {
    if (this.role === "authority") {
      const decoded = this.decodeOrDrop(tick, () =>
        decodePairPayload(this.inputCodec, this.stateCodec, payload),
      );
      if (!decoded.ok) return;
      const [input, claim] = decoded.value;
      const outcome = this.engine.acceptSubmission(tick, input, claim);
      if (outcome.accepted && outcome.first) {
        this.cursor = tick;
        this.log(`first input at tick ${tick}, server cursor initialised`);
      }
      return;
    }

    const decoded = this.decodeOrDrop(tick, () => decodePayload(this.stateCodec, payload));
    if (!decoded.ok) return;
    this.lastReconcile = this.engine.reconcile(tick, decoded.value, this.settings.tickDelta);
  }

  /** Buffered input for `tick`, if still held. */
  readInput(tick: Tick): I | undefined {
    return this.inputs.read(tick).data;
  }
}

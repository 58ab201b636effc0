import { History, type Tick } from "../history/History.js";
import { type PayloadCodec, decodePayload } from "../shared/payloadCodec.js";
import type { ServerDriven } from "./Authoritative.js";
import type { ReconcileOutcome } from "./ReconciliationEngine.js";
import { type ControllerBaseOptions, RollbackController } from "./RollbackController.js";

/**
 * Authority: sends an authoritative state to `connectionId`.
 * Observer: sends its predicted state to the server (no connection id).
 */
export type ConnectionTransmit = (tick: Tick, payload: Uint8Array, connectionId?: string) => void;

export interface ServerDrivenControllerOptions<S> extends ControllerBaseOptions {
  role: "authority" | "observer";
  contract: ServerDriven<S>;
  stateCodec: PayloadCodec<S>;
  transmit: ConnectionTransmit;
}

/**
 * Controller for an entity only the server drives (no input stream).
 *
 * Every client runs a replica that predicts by simulating with no input and
 * reports its state each tick. The authority keeps one claim history per
 * connection and corrects each replica separately.
 */
export class ServerDrivenController<S> extends RollbackController<null, S> {
  readonly role: "authority" | "observer";

  private readonly contract: ServerDriven<S>;
  private readonly transmit: ConnectionTransmit;
  private readonly claims = new Map<string, History<S>>();
  private lastReconcile: ReconcileOutcome | null = null;

  constructor(options: ServerDrivenControllerOptions<S>) {
    super(options, options.contract, options.stateCodec, null);
    this.role = options.role;
    this.contract = options.contract;
    this.transmit = options.transmit;
  }

  get lastReconciliation(): ReconcileOutcome | null {
    return this.lastReconcile;
  }

  /** Connections with a claim history. */
  get connections(): string[] {
    return [...this.claims.keys()];
  }

  tick(localTick: Tick): void {
    this.contract.simulate(null, this.settings.tickDelta, false);
    if (this.role === "observer") return;

    const state = this.contract.gatherState();
    this.states.write(localTick, state);
    for (const [connectionId, claims] of this.claims) {
      const claim = claims.read(localTick);
      if (claim.found) this.compare(localTick, state, claim.data, connectionId);
    }
  }

  postTick(localTick: Tick): void {
    if (this.role !== "observer") return;
    const state = this.contract.gatherState();
    this.states.write(localTick, state);
    this.transmit(localTick, this.encodeState(state));
  }

  receive(tick: Tick, payload: Uint8Array, connectionId?: string): void {
    const decoded = this.decodeOrDrop(tick, () => decodePayload(this.stateCodec, payload));
    if (!decoded.ok) return;

    if (this.role === "observer") {
      this.lastReconcile = this.engine.reconcile(tick, decoded.value, this.settings.tickDelta);
      return;
    }

    if (connectionId === undefined) {
      this.log(`claim for tick ${tick} without a connection id dropped`);
      return;
    }
    this.claimsFor(connectionId).write(tick, decoded.value);

    // Already simulated: compare now, the tick loop won't revisit it.
    const authoritative = this.states.read(tick);
    if (authoritative.found) this.compare(tick, authoritative.data, decoded.value, connectionId);
  }

  /** Drop a disconnected client's claim history. */
  forgetConnection(connectionId: string): boolean {
    return this.claims.delete(connectionId);
  }

  private claimsFor(connectionId: string): History<S> {
    let claims = this.claims.get(connectionId);
    if (!claims) {
      claims = new History<S>(this.settings.historySize);
      this.claims.set(connectionId, claims);
    }
    return claims;
  }

  private compare(tick: Tick, authoritative: S, claim: S, connectionId: string): void {
    if (this.contract.statesMatch(authoritative, claim)) return;
    this.stats.divergencesSent++;
    this.transmit(tick, this.encodeState(authoritative), connectionId);
  }
}

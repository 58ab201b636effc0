import type { History, HistoryRead, Tick } from "../history/History.js";
import { netLog } from "../shared/netLog.js";
import type { Simulation } from "./Authoritative.js";
import { applyCatchUp, bufferedAhead, type CatchUpSettings } from "./CatchUpPolicy.js";
import type { RollbackStats } from "./RollbackStats.js";

export type AuthorityStep =
  /** Not enough inputs buffered ahead of the cursor yet. */
  | { kind: "buffering"; cursor: Tick; buffered: number }
  /** The cursor tick is newer than anything received; try again next tick. */
  | { kind: "waiting"; cursor: Tick }
  | {
      kind: "simulated";
      tick: Tick;
      /** Cursor for the next step. */
      cursor: Tick;
      /** Ticks jumped over by catch-up before simulating. */
      skipped: number;
      /** Simulated with no input because the input for `tick` never arrived. */
      droppedInput: boolean;
      /** Authoritative state was sent back to the owner. */
      diverged: boolean;
    };

export type ReconcileOutcome =
  | { kind: "reconciled"; tick: Tick; replayed: number; gaps: number }
  | { kind: "ignored"; tick: Tick; reason: "unknown-tick" | "in-sync" }
  /** Arrived while a replay was running. */
  | { kind: "refused"; tick: Tick };

export type SubmitOutcome =
  | { accepted: true; first: boolean }
  | { accepted: false; mostRecentTick: Tick };

const NO_INPUT: HistoryRead<null> = { found: true, data: null };

/**
 * Divergence detection and replay over one entity's input/state histories.
 *
 * Without an input history (server-driven entities) every replayed tick is
 * simulated with a null input instead of skipping it.
 */
export class ReconciliationEngine<I, S> {
  private replaying = false;

  constructor(
    private readonly label: string,
    private readonly simulation: Simulation<I, S>,
    private readonly states: History<S>,
    private readonly inputs: History<I> | null,
    private readonly stats: RollbackStats,
  ) {}

  get isReplaying(): boolean {
    return this.replaying;
  }

  /**
   * Buffer an owner's (input, claimed state) on the server. Only the first
   * submission or one newer than everything buffered is kept, so the input
   * stream stays monotonic (gaps allowed).
   */
  acceptSubmission(tick: Tick, input: I, state: S): SubmitOutcome {
    const inputs = this.requireInputs();
    const first = inputs.count === 0;
    if (!first && tick <= inputs.mostRecentTick) {
      this.stats.rejectedInputs++;
      this.log(`illegal input received for tick ${tick} (most recent ${inputs.mostRecentTick})`);
      return { accepted: false, mostRecentTick: inputs.mostRecentTick };
    }

    inputs.write(tick, input);
    this.states.write(tick, state);
    this.stats.acceptedInputs++;
    return { accepted: true, first };
  }

  /**
   * One authoritative server tick at `cursor`: catch up if lagging, simulate
   * the buffered input, overwrite the client's claim with the server state,
   * and call `sendCorrection` when the claim is missing or diverges.
   */
  stepAuthority(
    cursor: Tick,
    dt: number,
    settings: CatchUpSettings,
    sendCorrection: (tick: Tick, state: S) => void,
  ): AuthorityStep {
    const inputs = this.requireInputs();
    const buffered = bufferedAhead(inputs, cursor);
    if (inputs.count === 0 || buffered < settings.minBuffer) {
      return { kind: "buffering", cursor, buffered };
    }

    const { cursor: tick, skipped } = applyCatchUp(inputs, cursor, settings);
    if (skipped > 0) {
      this.stats.catchUps++;
      this.stats.skippedTicks += skipped;
      this.log(`too many inputs behind, catching up: skipped ${skipped} ticks (${cursor} -> ${tick})`);
    }

    const input = inputs.read(tick);
    if (!input.found) {
      if (inputs.mostRecentTick < tick) {
        this.stats.stalls++;
        this.log(`waiting for missing tick ${tick}`);
        return { kind: "waiting", cursor: tick };
      }
      this.stats.droppedInputs++;
      this.log(`packet dropped, skipped input frame ${tick}`);
    }

    this.simulation.simulate(input.found ? input.data : null, dt, false);
    const serverState = this.simulation.gatherState();

    const claim = this.states.read(tick);
    this.states.write(tick, serverState);

    const diverged = !claim.found || !this.simulation.statesMatch(serverState, claim.data);
    if (diverged) {
      this.stats.divergencesSent++;
      sendCorrection(tick, serverState);
    }

    return {
      kind: "simulated",
      tick,
      cursor: tick + 1,
      skipped,
      droppedInput: !input.found,
      diverged,
    };
  }

  /**
   * Apply an authoritative state for `tick` on the predicting side.
   *
   * The local prediction is re-checked first: history may have been rewritten
   * since the server compared it, so a correction that no longer applies is a
   * no-op. Otherwise everything from `tick` on is discarded, the live state
   * snaps to the authoritative one, and the ticks up to the previous present
   * are re-simulated from buffered inputs.
   */
  reconcile(tick: Tick, authoritative: S, dt: number): ReconcileOutcome {
    if (this.replaying) {
      this.stats.refusedReconciliations++;
      this.log(`reconciliation for tick ${tick} refused: replay in progress`);
      return { kind: "refused", tick };
    }

    const local = this.states.read(tick);
    if (!local.found) {
      this.stats.ignoredReconciliations++;
      return { kind: "ignored", tick, reason: "unknown-tick" };
    }
    if (this.simulation.statesMatch(local.data, authoritative)) {
      this.stats.ignoredReconciliations++;
      return { kind: "ignored", tick, reason: "in-sync" };
    }

    const presentTick = this.states.mostRecentTick;
    this.states.clearFuture(tick, true);
    this.states.write(tick, authoritative);

    let replayed = 0;
    let gaps = 0;
    this.replaying = true;
    try {
      this.simulation.applyState(authoritative);

      for (let t = tick + 1; t <= presentTick; t++) {
        const input: HistoryRead<I | null> = this.inputs ? this.inputs.read(t) : NO_INPUT;
        if (!input.found) {
          gaps++;
          this.log(`skipping missing input at tick ${t} during replay`);
          continue;
        }
        this.simulation.simulate(input.data, dt, true);
        this.states.write(t, this.simulation.gatherState());
        replayed++;
      }
    } finally {
      this.replaying = false;
    }

    this.stats.reconciliations++;
    this.stats.replayedTicks += replayed;
    this.stats.replayGaps += gaps;
    this.stats.maxReplayDepth = Math.max(this.stats.maxReplayDepth, presentTick - tick);
    return { kind: "reconciled", tick, replayed, gaps };
  }

  /** Snap the live state to the one recorded at `tick`. History is left as is. */
  rollbackTo(tick: Tick): boolean {
    if (this.replaying) return false;
    const recorded = this.states.read(tick);
    if (!recorded.found) return false;
    this.simulation.applyState(recorded.data);
    return true;
  }

  /** Snap the live state to the most recent recorded state. */
  resetToLatest(): boolean {
    if (this.replaying || this.states.count === 0) return false;
    this.simulation.applyState(this.states.at(this.states.count - 1));
    return true;
  }

  private requireInputs(): History<I> {
    if (!this.inputs) {
      throw new Error(`[${this.label}] authority stepping needs an input history`);
    }
    return this.inputs;
  }

  private log(msg: string): void {
    netLog(`[${this.label}] ${msg}`);
  }
}

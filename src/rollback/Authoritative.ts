/**
 * Capabilities a simulated entity hands to its controller. Controllers never
 * touch entity state directly; everything goes through these calls.
 */
export interface Simulation<I, S> {
  /** Snapshot the live state. Called after every simulate(). */
  gatherState(): S;
  /**
   * Advance the live state by one tick. `input` is null when the tick has no
   * input (dropped packet, or an entity that takes none). Must be
   * deterministic for the same starting state, input and dt. `replay` is
   * true while re-simulating after a correction, so one-shot effects can be
   * skipped.
   */
  simulate(input: I | null, dt: number, replay: boolean): void;
  /** True when the two states are close enough to count as the same. */
  statesMatch(a: S, b: S): boolean;
  /** Hard-overwrite the live state (teleport). */
  applyState(state: S): void;
}

/** An entity driven by its owning client's input and checked by the server. */
export interface Authoritative<I, S> extends Simulation<I, S> {
  /** Sample this tick's input. Owner only, once per tick. */
  gatherInput(): I;
}

/** An entity only the server drives (no input stream). */
export type ServerDriven<S> = Simulation<null, S>;

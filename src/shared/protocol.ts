import type { Tick } from "../history/History.js";

// ---- Client → Server messages ----

/**
 * Per-tick submission for one controller: encoded (input, state) from an
 * owner, or an encoded state claim from a server-driven replica.
 */
export interface SubmitMessage {
  type: "submit";
  controllerId: string;
  tick: Tick;
  payload: Uint8Array;
}

export type ClientMessage = SubmitMessage;

// ---- Server → Client messages ----

/** Authoritative state for a tick the server found to diverge. */
export interface ReconcileMessage {
  type: "reconcile";
  controllerId: string;
  tick: Tick;
  payload: Uint8Array;
}

export type ServerMessage = ReconcileMessage;

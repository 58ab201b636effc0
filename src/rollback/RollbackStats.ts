/** Running counters for one controller. */
export interface RollbackStats {
  /** Corrections applied (owner/replica). */
  reconciliations: number;
  /** Corrections that turned out to be unknown ticks or already in sync. */
  ignoredReconciliations: number;
  /** Corrections refused because a replay was already running. */
  refusedReconciliations: number;
  replayedTicks: number;
  /** Replay ticks skipped for lack of a buffered input. */
  replayGaps: number;
  maxReplayDepth: number;
  acceptedInputs: number;
  rejectedInputs: number;
  /** Server ticks simulated with no input because the packet never came. */
  droppedInputs: number;
  /** Server ticks spent waiting for an input newer than anything buffered. */
  stalls: number;
  catchUps: number;
  skippedTicks: number;
  divergencesSent: number;
  malformedPayloads: number;
}

export function createRollbackStats(): RollbackStats {
  return {
    reconciliations: 0,
    ignoredReconciliations: 0,
    refusedReconciliations: 0,
    replayedTicks: 0,
    replayGaps: 0,
    maxReplayDepth: 0,
    acceptedInputs: 0,
    rejectedInputs: 0,
    droppedInputs: 0,
    stalls: 0,
    catchUps: 0,
    skippedTicks: 0,
    divergencesSent: 0,
    malformedPayloads: 0,
  };
}

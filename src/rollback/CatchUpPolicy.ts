import type { History, Tick } from "../history/History.js";

export interface CatchUpSettings {
  /** Inputs that must be buffered at or ahead of the cursor before it steps. */
  minBuffer: number;
  /** More than this many inputs ahead of the cursor triggers a jump. */
  maxBuffer: number;
}

export interface CatchUpResult {
  cursor: Tick;
  /** Ticks jumped over; they are never simulated by the server. */
  skipped: number;
}

export function validateCatchUpSettings(settings: CatchUpSettings): CatchUpSettings {
  const { minBuffer, maxBuffer } = settings;
  if (!Number.isInteger(minBuffer) || minBuffer < 0) {
    throw new RangeError(`minBuffer must be a non-negative integer, got ${minBuffer}`);
  }
  if (!Number.isInteger(maxBuffer) || maxBuffer < minBuffer) {
    throw new RangeError(`maxBuffer must be an integer >= minBuffer (${minBuffer}), got ${maxBuffer}`);
  }
  return { minBuffer, maxBuffer };
}

/** Buffered entries at or after `cursor`. */
export function bufferedAhead<T>(history: History<T>, cursor: Tick): number {
  return history.count - history.find(cursor).index;
}

/**
 * Jump the cursor forward when the backlog ahead of it exceeds `maxBuffer`,
 * landing so that `minBuffer` entries remain buffered (the newest entry when
 * `minBuffer` is 0). Otherwise the cursor is returned unchanged.
 */
export function applyCatchUp<T>(
  history: History<T>,
  cursor: Tick,
  settings: CatchUpSettings,
): CatchUpResult {
  const { index } = history.find(cursor);
  if (history.count - index <= settings.maxBuffer) {
    return { cursor, skipped: 0 };
  }

  const targetIndex = history.count - Math.max(settings.minBuffer, 1);
  const target = history.getEntryTick(targetIndex);
  if (target <= cursor) return { cursor, skipped: 0 };
  return { cursor: target, skipped: target - cursor };
}

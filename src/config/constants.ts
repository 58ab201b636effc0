/** Fixed simulation tick rate in Hz. */
export const TICK_RATE = 60;

/** Server waits for this many buffered inputs ahead of its cursor before stepping. */
export const MIN_SERVER_BUFFER = 5;

/** Server cursor jumps forward once more than this many inputs are queued ahead of it. */
export const MAX_SERVER_BUFFER = 10;

/** Entries each input/state history keeps reliably before pruning. */
export const HISTORY_BUFFER_SIZE = 1024;

/** Scratch buffer size (bytes) for one encoded payload. */
export const PAYLOAD_CAPACITY = 1024;

/** Client ID used by LocalTransport when none is given. */
export const LOCAL_CLIENT_ID = "local";

// Terminal defaults
export const DEFAULT_TERMINAL_COLS = 80;
export const DEFAULT_TERMINAL_ROWS = 24;

// Capture playback
export const DEFAULT_FRAME_INTERVAL_MS = 500;

// Transport
export const DEFAULT_MAX_QUEUED_BYTES = 512 * 1024;

// ANSI utilities
export { ANSIBuilder } from './ansi/builder.js';
export * from './ansi/codes.js';
export * from './ansi/colors.js';

// Glyphs
export {
  encodeGlyph,
  remapCodePoint,
  isScalarValue,
  REPLACEMENT_GLYPH,
} from './glyph/glyph-encoder.js';

// Encoder
export { CursorTracker } from './terminal/cursor-tracker.js';
export {
  TerminalEncoder,
  type TerminalEncoderOptions,
  type EncoderState,
} from './terminal/terminal-encoder.js';

// Buffer system
export { ScreenBuffer } from './buffer/screen-buffer.js';
export { createCell, cellsEqual, cloneCell, cellsFromText } from './buffer/cell.js';

// Redraw cycles
export { RedrawDriver, type RedrawOptions, type RedrawResult } from './renderer/redraw-driver.js';

// Transport (backpressure handling)
export {
  OutputPump,
  type OutputPumpMetrics,
  type WritableTarget,
  type ByteSink,
} from './transport/index.js';

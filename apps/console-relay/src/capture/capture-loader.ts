import * as fs from 'fs';
import {
  DEFAULT_CONSOLE_ATTRIBUTES,
  ScreenCaptureSchema,
  cellFromConsole,
  type CaptureFrame,
  type ScreenCapture,
} from '@gridrelay/protocol';
import { createCell, type ScreenBuffer } from '@gridrelay/render';

export class CaptureError extends Error {
  constructor(readonly file: string, message: string, options?: { cause?: unknown }) {
    super(`${file}: ${message}`, options);
    this.name = 'CaptureError';
  }
}

/**
 * Parse and validate a capture document
 */
export function parseCapture(json: string, file: string): ScreenCapture {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (error) {
    throw new CaptureError(file, 'not valid JSON', { cause: error });
  }

  const result = ScreenCaptureSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new CaptureError(file, `${where}${issue?.message ?? 'invalid capture'}`);
  }
  return result.data;
}

export function loadCapture(file: string): ScreenCapture {
  let json: string;
  try {
    json = fs.readFileSync(file, 'utf-8');
  } catch (error) {
    throw new CaptureError(file, 'cannot be read', { cause: error });
  }
  return parseCapture(json, file);
}

/**
 * Copy a frame into the buffer. Cells outside the frame's rows or the
 * capture's width are blank.
 */
export function applyFrame(buffer: ScreenBuffer, frame: CaptureFrame, captureWidth: number): void {
  const blank = createCell();
  for (let y = 0; y < buffer.height; y++) {
    const text = Array.from(frame.rows[y] ?? '');
    const attributes = frame.attributes?.[y];
    for (let x = 0; x < buffer.width; x++) {
      const char = x < captureWidth ? text[x] : undefined;
      const codePoint = char?.codePointAt(0);
      if (codePoint === undefined) {
        buffer.setCell(x, y, blank);
        continue;
      }
      buffer.setCell(x, y, cellFromConsole(codePoint, attributes?.[x] ?? DEFAULT_CONSOLE_ATTRIBUTES));
    }
  }
}

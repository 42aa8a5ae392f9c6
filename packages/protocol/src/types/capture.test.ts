import { describe, it, expect } from 'vitest';
import { ScreenCaptureSchema } from './capture.js';

describe('ScreenCaptureSchema', () => {
  it('accepts a minimal capture', () => {
    const capture = ScreenCaptureSchema.parse({
      width: 4,
      height: 2,
      frames: [{ rows: ['ab'], cursor: [2, 0] }],
    });
    expect(capture.frames[0]?.cursor).toEqual([2, 0]);
  });

  it('rejects a capture without frames', () => {
    const result = ScreenCaptureSchema.safeParse({ width: 4, height: 2, frames: [] });
    expect(result.success).toBe(false);
  });

  it('rejects frames taller than the capture', () => {
    const result = ScreenCaptureSchema.safeParse({
      width: 4,
      height: 1,
      frames: [{ rows: ['a', 'b'], cursor: [0, 0] }],
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe('frame has 2 rows, capture height is 1');
      expect(result.error.issues[0]?.path).toEqual(['frames', 0, 'rows']);
    }
  });

  it('rejects attributes outside 16 bits', () => {
    const result = ScreenCaptureSchema.safeParse({
      width: 1,
      height: 1,
      frames: [{ rows: ['a'], attributes: [[0x10000]], cursor: [0, 0] }],
    });
    expect(result.success).toBe(false);
  });
});

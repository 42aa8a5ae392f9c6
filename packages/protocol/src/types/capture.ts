import { z } from 'zod';

/**
 * One recorded console screen
 */
export const CaptureFrameSchema = z.object({
  rows: z.array(z.string()).describe('Row text, one code point per cell'),
  attributes: z
    .array(z.array(z.number().int().min(0).max(0xffff)))
    .optional()
    .describe('Packed console attributes per cell, defaults to light gray on black'),
  cursor: z.tuple([z.number().int().min(0), z.number().int().min(0)]).describe('[column, row]'),
  delayMs: z.number().int().min(0).optional().describe('Time to show this frame before the next'),
});

/**
 * A recorded sequence of console screens
 */
export const ScreenCaptureSchema = z
  .object({
    width: z.number().int().min(1).max(1000),
    height: z.number().int().min(1).max(1000),
    frames: z.array(CaptureFrameSchema).min(1),
  })
  .superRefine((capture, ctx) => {
    capture.frames.forEach((frame, index) => {
      if (frame.rows.length > capture.height) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `frame has ${frame.rows.length} rows, capture height is ${capture.height}`,
          path: ['frames', index, 'rows'],
        });
      }
    });
  });

export type CaptureFrame = z.infer<typeof CaptureFrameSchema>;
export type ScreenCapture = z.infer<typeof ScreenCaptureSchema>;

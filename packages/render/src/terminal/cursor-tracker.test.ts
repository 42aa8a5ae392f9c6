import { describe, it, expect, beforeEach } from 'vitest';
import { ANSIBuilder } from '../ansi/builder.js';
import { CursorTracker } from './cursor-tracker.js';

describe('CursorTracker', () => {
  let bypass: boolean;
  let tracker: CursorTracker;
  let out: ANSIBuilder;

  beforeEach(() => {
    bypass = false;
    tracker = new CursorTracker(() => bypass);
    out = new ANSIBuilder();
  });

  describe('moveToRow', () => {
    it('moves up with one cursor-up sequence', () => {
      tracker.reset(5);
      tracker.moveToRow(2, out);
      expect(out.build()).toBe('\r\x1b[3A');
      expect(tracker.row).toBe(2);
    });

    it('moves down with one CRLF per row', () => {
      tracker.reset(2);
      tracker.moveToRow(5, out);
      expect(out.build()).toBe('\r\n\r\n\r\n');
      expect(tracker.row).toBe(5);
    });

    it('returns to column 0 when already on the row', () => {
      tracker.reset(3);
      tracker.moveToRow(3, out);
      expect(out.build()).toBe('\r');
      expect(tracker.row).toBe(3);
    });

    it('emits nothing in bypass mode but still tracks the row', () => {
      bypass = true;
      tracker.reset(1);
      tracker.moveToRow(4, out);
      tracker.moveToRow(0, out);
      tracker.moveToRow(0, out);
      expect(out.build()).toBe('');
      expect(tracker.row).toBe(0);
    });

    it('withholds the carriage return for the same row in bypass mode', () => {
      bypass = true;
      tracker.reset(3);
      tracker.moveToRow(3, out);
      expect(out.build()).toBe('');
      expect(tracker.row).toBe(3);
    });

    it('rejects negative and fractional rows', () => {
      expect(() => tracker.moveToRow(-1, out)).toThrow(RangeError);
      expect(() => tracker.moveToRow(1.5, out)).toThrow(RangeError);
    });
  });

  describe('hideCursor', () => {
    it('hides once', () => {
      tracker.hideCursor(out);
      tracker.hideCursor(out);
      expect(out.build()).toBe('\x1b[?25l');
      expect(tracker.hidden).toBe(true);
    });

    it('marks the cursor hidden without output in bypass mode', () => {
      bypass = true;
      tracker.hideCursor(out);
      expect(out.build()).toBe('');
      expect(tracker.hidden).toBe(true);
    });
  });

  describe('finish', () => {
    it('does nothing when the position is unchanged and the cursor is visible', () => {
      tracker.reset(4);
      tracker.finish([0, 4], out);
      expect(out.build()).toBe('');
      expect(tracker.hidden).toBe(false);
    });

    it('hides, moves and reveals the cursor when the position changes', () => {
      tracker.reset(0);
      tracker.finish([9, 2], out);
      expect(out.build()).toBe('\x1b[?25l\r\n\r\n\x1b[10G\x1b[?25h');
      expect(tracker.hidden).toBe(false);
      expect(tracker.position).toEqual([9, 2]);
    });

    it('reveals a hidden cursor at the same position', () => {
      tracker.reset(0);
      tracker.finish([3, 1], out);
      out.clear();
      tracker.hideCursor(out);
      tracker.moveToRow(0, out);
      out.clear();

      tracker.finish([3, 1], out);
      expect(out.build()).toBe('\r\n\x1b[4G\x1b[?25h');
    });

    it('stores the position in bypass mode without output', () => {
      bypass = true;
      tracker.reset(0);
      tracker.finish([7, 3], out);
      expect(out.build()).toBe('');
      expect(tracker.position).toEqual([7, 3]);
      expect(tracker.row).toBe(3);
      expect(tracker.hidden).toBe(false);
    });
  });
});

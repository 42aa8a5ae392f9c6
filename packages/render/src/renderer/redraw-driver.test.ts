import { describe, it, expect, beforeEach } from 'vitest';
import { ScreenBuffer } from '../buffer/screen-buffer.js';
import { TerminalEncoder } from '../terminal/terminal-encoder.js';
import type { ByteSink } from '../transport/byte-sink.js';
import { RedrawDriver } from './redraw-driver.js';

class RecordingSink implements ByteSink {
  writes: string[] = [];

  write(chunk: string): void {
    this.writes.push(chunk);
  }
}

describe('RedrawDriver', () => {
  let sink: RecordingSink;
  let driver: RedrawDriver;
  let buffer: ScreenBuffer;

  beforeEach(() => {
    sink = new RecordingSink();
    driver = new RedrawDriver(new TerminalEncoder(sink));
    buffer = new ScreenBuffer(4, 2);
    buffer.writeText(0, 1, 'ok');
  });

  it('clears and sends every row on the first cycle', () => {
    const result = driver.redraw(buffer, [2, 1]);

    expect(result).toEqual({ full: true, rowsSent: 2 });
    expect(sink.writes).toEqual([
      '\x1b[0m\x1b[1;1H\x1b[2J',
      '\x1b[?25l\r\x1b[2K',
      '\r\n\x1b[2K\x1b[0mok',
      '\r\x1b[3G\x1b[?25h',
    ]);
    expect(buffer.getDirtyRows()).toEqual([]);
  });

  it('sends nothing when nothing changed', () => {
    driver.redraw(buffer, [2, 1]);
    const count = sink.writes.length;

    expect(driver.redraw(buffer, [2, 1])).toEqual({ full: false, rowsSent: 0 });
    expect(sink.writes.length).toBe(count);
  });

  it('sends only changed rows afterwards', () => {
    driver.redraw(buffer, [2, 1]);
    sink.writes = [];

    buffer.writeText(0, 0, 'hey');
    driver.redraw(buffer, [2, 1]);

    expect(sink.writes).toEqual([
      '\x1b[?25l\r\x1b[1A\x1b[2K\x1b[0mhey',
      '\r\n\x1b[3G\x1b[?25h',
    ]);
  });

  it('redraws everything after invalidate', () => {
    driver.redraw(buffer, [0, 0]);
    driver.invalidate();
    sink.writes = [];

    expect(driver.redraw(buffer, [0, 0]).full).toBe(true);
    expect(sink.writes[0]).toBe('\x1b[0m\x1b[1;1H\x1b[2J');
    expect(sink.writes.length).toBe(4);
  });

  it('honours the full option', () => {
    driver.redraw(buffer, [0, 0]);
    expect(driver.redraw(buffer, [0, 0], { full: true })).toEqual({ full: true, rowsSent: 2 });
  });
});

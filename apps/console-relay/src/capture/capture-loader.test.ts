import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { describe, it, expect } from 'vitest';
import { BLACK, LIGHT_GRAY, WHITE } from '@gridrelay/protocol';
import { ScreenBuffer } from '@gridrelay/render';
import { CaptureError, applyFrame, loadCapture, parseCapture } from './capture-loader.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

function rowText(buffer: ScreenBuffer, y: number): string {
  return buffer.getRow(y).map(cell => String.fromCodePoint(cell.codePoint)).join('');
}

describe('parseCapture', () => {
  it('names the file on invalid JSON', () => {
    expect(() => parseCapture('{', 'broken.json')).toThrow('broken.json: not valid JSON');
  });

  it('names the failing field', () => {
    expect(() => parseCapture('{"width":0,"height":1,"frames":[]}', 'bad.json')).toThrow(
      /^bad\.json: width: /
    );
  });

  it('throws a CaptureError', () => {
    expect(() => parseCapture('[]', 'list.json')).toThrow(CaptureError);
  });
});

describe('loadCapture', () => {
  it('loads the bundled demo', () => {
    const capture = loadCapture(path.join(__dirname, '../../captures/demo.json'));
    expect(capture.width).toBe(40);
    expect(capture.height).toBe(10);
    expect(capture.frames).toHaveLength(3);
  });

  it('reads a capture from disk', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'gridrelay-'));
    const file = path.join(dir, 'one.json');
    fs.writeFileSync(file, JSON.stringify({ width: 2, height: 1, frames: [{ rows: ['ok'], cursor: [0, 0] }] }));
    try {
      expect(loadCapture(file).frames[0]?.rows).toEqual(['ok']);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('reports a missing file', () => {
    expect(() => loadCapture('/nonexistent/capture.json')).toThrow(
      '/nonexistent/capture.json: cannot be read'
    );
  });
});

describe('applyFrame', () => {
  it('copies text and decodes attributes', () => {
    const buffer = new ScreenBuffer(3, 2);
    applyFrame(buffer, { rows: ['ab'], attributes: [[0x0f, 0x70]], cursor: [0, 0] }, 3);

    expect(rowText(buffer, 0)).toBe('ab ');
    expect(rowText(buffer, 1)).toBe('   ');
    expect(buffer.getCell(0, 0)).toEqual({ codePoint: 0x61, fg: WHITE, bg: BLACK, wide: 'normal' });
    expect(buffer.getCell(1, 0)).toEqual({ codePoint: 0x62, fg: BLACK, bg: LIGHT_GRAY, wide: 'normal' });
    expect(buffer.getCell(2, 0)?.fg).toBe(LIGHT_GRAY);
  });

  it('blanks cells past the capture width', () => {
    const buffer = new ScreenBuffer(4, 1);
    applyFrame(buffer, { rows: ['abcd'], cursor: [0, 0] }, 2);
    expect(rowText(buffer, 0)).toBe('ab  ');
  });

  it('clips to a smaller buffer', () => {
    const buffer = new ScreenBuffer(2, 1);
    applyFrame(buffer, { rows: ['wxyz', 'next'], cursor: [0, 0] }, 4);
    expect(rowText(buffer, 0)).toBe('wx');
  });

  it('marks wide character halves', () => {
    const buffer = new ScreenBuffer(2, 1);
    applyFrame(buffer, { rows: ['中中'], attributes: [[0x107, 0x207]], cursor: [0, 0] }, 2);
    expect(buffer.getRow(0).map(cell => cell.wide)).toEqual(['leading', 'trailing']);
  });
});

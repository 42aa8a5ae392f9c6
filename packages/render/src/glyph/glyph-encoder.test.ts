import { describe, it, expect } from 'vitest';
import type { Cell } from '@gridrelay/protocol';
import { createCell } from '../buffer/cell.js';
import { encodeGlyph, isScalarValue, remapCodePoint } from './glyph-encoder.js';

function cell(codePoint: number, wide: Cell['wide'] = 'normal'): Cell {
  return createCell({ codePoint, wide });
}

describe('encodeGlyph', () => {
  it('maps popup border code points to double box-drawing characters', () => {
    const glyphs = [1, 2, 3, 4, 5, 6].map(cp => encodeGlyph(cell(cp)));
    expect(glyphs).toEqual(['╔', '╗', '╚', '╝', '║', '═']);
  });

  it('passes other code points through', () => {
    expect(encodeGlyph(cell(0x41))).toBe('A');
    expect(encodeGlyph(cell(0x7))).toBe('\x07');
    expect(encodeGlyph(cell(0x2500))).toBe('─');
    expect(encodeGlyph(cell(0x1f600))).toBe('😀');
  });

  it('encodes a wide leading cell and drops its trailing cell', () => {
    expect(encodeGlyph(cell(0x4e2d, 'leading'))).toBe('中');
    expect(encodeGlyph(cell(0x4e2d, 'trailing'))).toBe('');
    expect(encodeGlyph(cell(1, 'trailing'))).toBe('');
  });

  it('substitutes ? for values that are not scalar values', () => {
    expect(encodeGlyph(cell(0xd800))).toBe('?');
    expect(encodeGlyph(cell(0xdfff))).toBe('?');
    expect(encodeGlyph(cell(0x110000))).toBe('?');
    expect(encodeGlyph(cell(-1))).toBe('?');
    expect(encodeGlyph(cell(65.5))).toBe('?');
  });

  it('encodes a space as a single space', () => {
    expect(encodeGlyph(cell(0x20))).toBe(' ');
  });

  it('produces the UTF-8 bytes of the character on the wire', () => {
    expect(Buffer.from(encodeGlyph(cell(5)), 'utf8')).toEqual(Buffer.from([0xe2, 0x95, 0x91]));
  });
});

describe('remapCodePoint', () => {
  it('leaves 0 and 7 alone', () => {
    expect(remapCodePoint(0)).toBe(0);
    expect(remapCodePoint(7)).toBe(7);
  });
});

describe('isScalarValue', () => {
  it('accepts the edges of the valid ranges', () => {
    expect(isScalarValue(0)).toBe(true);
    expect(isScalarValue(0xd7ff)).toBe(true);
    expect(isScalarValue(0xe000)).toBe(true);
    expect(isScalarValue(0x10ffff)).toBe(true);
  });
});

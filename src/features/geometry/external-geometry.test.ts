import { describe, expect, it } from 'vitest';
import { formatExternalGeometry, parseExternalGeometry } from './external-geometry';

describe('parseExternalGeometry', () => {
  it('parses width and height', () => {
    expect(parseExternalGeometry('1280x720')).toEqual({
      width: { value: 1280, isPercentage: false },
      height: { value: 720, isPercentage: false },
    });
  });

  it('parses a height on its own', () => {
    expect(parseExternalGeometry('x50%')).toEqual({
      height: { value: 50, isPercentage: true },
    });
  });

  it('parses signed offsets', () => {
    expect(parseExternalGeometry('50%-10+25%')).toEqual({
      width: { value: 50, isPercentage: true },
      x: { value: 10, isPercentage: false, sign: '-' },
      y: { value: 25, isPercentage: true, sign: '+' },
    });
  });

  it('parses offsets without a size', () => {
    expect(parseExternalGeometry('+0-0')).toEqual({
      x: { value: 0, isPercentage: false, sign: '+' },
      y: { value: 0, isPercentage: false, sign: '-' },
    });
  });

  it('rejects empty and malformed directives', () => {
    expect(parseExternalGeometry('')).toBeUndefined();
    expect(parseExternalGeometry('   ')).toBeUndefined();
    expect(parseExternalGeometry('wide')).toBeUndefined();
    expect(parseExternalGeometry('100+10')).toBeUndefined();
    expect(parseExternalGeometry('1.5x2')).toBeUndefined();
  });

  it('formats a parsed directive back to text', () => {
    const parsed = parseExternalGeometry('800x600+10%-20');
    expect(parsed).toBeDefined();
    expect(formatExternalGeometry(parsed ?? {})).toBe('800x600+10%-20');
  });
});

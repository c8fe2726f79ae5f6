import { describe, expect, it } from 'vitest';
import { clampDimension, clampMines, isDigitCharacter, isNameCharacter, normalizeParameters } from './settings';

describe('clampDimension', () => {
  it('treats empty or non-numeric input as 1', () => {
    expect(clampDimension('')).toBe(1);
    expect(clampDimension('abc')).toBe(1);
  });

  it('clamps to the board limits', () => {
    expect(clampDimension('0')).toBe(1);
    expect(clampDimension('12')).toBe(12);
    expect(clampDimension('75')).toBe(50);
    expect(clampDimension(7.9)).toBe(7);
  });
});

describe('clampMines', () => {
  it('leaves at least one safe cell', () => {
    expect(clampMines('500', 10, 10)).toBe(99);
    expect(clampMines('', 10, 10)).toBe(1);
    expect(clampMines(0, 10, 10)).toBe(1);
    expect(clampMines(40, 16, 16)).toBe(40);
  });

  it('allows no mines on a single cell', () => {
    expect(clampMines(5, 1, 1)).toBe(0);
  });
});

describe('normalizeParameters', () => {
  it('shrinks the mine count to the clamped grid', () => {
    expect(normalizeParameters({ rows: 60, cols: 2, mines: 500 })).toEqual({ rows: 50, cols: 2, mines: 99 });
  });
});

describe('input characters', () => {
  it('accepts letters, digits, dash and underscore in names', () => {
    for (const key of ['a', 'Z', '7', '-', '_']) expect(isNameCharacter(key)).toBe(true);
    for (const key of [' ', '!', 'ab', '']) expect(isNameCharacter(key)).toBe(false);
  });

  it('accepts single digits for board parameters', () => {
    expect(isDigitCharacter('4')).toBe(true);
    expect(isDigitCharacter('x')).toBe(false);
    expect(isDigitCharacter('12')).toBe(false);
  });
});

import { MAX_BOARD_DIMENSION, MIN_BOARD_DIMENSION } from './constants';

export type BoardParameters = { rows: number; cols: number; mines: number };

const toInt = (value: string | number): number => {
  const parsed = typeof value === 'number' ? Math.trunc(value) : parseInt(value.trim(), 10);
  return Number.isFinite(parsed) ? parsed : 1;
};

const clamp = (value: number, min: number, max: number) => Math.min(Math.max(value, min), max);

export const clampDimension = (value: string | number): number =>
  clamp(toInt(value), MIN_BOARD_DIMENSION, MAX_BOARD_DIMENSION);

/** A single-cell board is the only one allowed to have no mines. */
export const clampMines = (value: string | number, rows: number, cols: number): number => {
  const max = rows * cols - 1;
  return clamp(toInt(value), Math.min(1, max), max);
};

/** Applies the custom-board limits, shrinking the mine count to fit the grid. */
export const normalizeParameters = (params: BoardParameters): BoardParameters => {
  const rows = clampDimension(params.rows);
  const cols = clampDimension(params.cols);
  return { rows, cols, mines: clampMines(params.mines, rows, cols) };
};

/** Accepts a single letter, digit, dash or underscore. */
export const isNameCharacter = (key: string): boolean => /^[\p{L}\p{N}_-]$/u.test(key);

export const isDigitCharacter = (key: string): boolean => /^[0-9]$/.test(key);

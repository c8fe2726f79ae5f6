import { describe, expect, it } from 'vitest';
import { computeAdjacents, createEmptyBoard, getNeighbors, isInside, pickMinePositions } from './logic';
import { createRandom, shuffleInPlace } from './random';

const noShuffle = () => 0.999999;

describe('getNeighbors', () => {
  it('clips to the board edges', () => {
    expect(getNeighbors(3, 3, { row: 0, col: 0 })).toHaveLength(3);
    expect(getNeighbors(3, 3, { row: 0, col: 1 })).toHaveLength(5);
    expect(getNeighbors(3, 3, { row: 1, col: 1 })).toHaveLength(8);
    expect(getNeighbors(1, 1, { row: 0, col: 0 })).toEqual([]);
  });
});

describe('isInside', () => {
  it('rejects negative, overflowing and fractional points', () => {
    expect(isInside(2, 3, { row: 1, col: 2 })).toBe(true);
    expect(isInside(2, 3, { row: 2, col: 0 })).toBe(false);
    expect(isInside(2, 3, { row: -1, col: 0 })).toBe(false);
    expect(isInside(2, 3, { row: 0.5, col: 0 })).toBe(false);
  });
});

describe('pickMinePositions', () => {
  it('keeps the 3x3 zone around the safe point clear', () => {
    const mines = pickMinePositions(3, 3, 2, { row: 2, col: 2 }, noShuffle);
    expect(mines).toEqual([
      { row: 0, col: 0 },
      { row: 0, col: 1 }
    ]);
  });

  it('falls back to excluding only the safe point on dense boards', () => {
    const mines = pickMinePositions(2, 2, 3, { row: 0, col: 0 }, noShuffle);
    expect(mines).toEqual([
      { row: 0, col: 1 },
      { row: 1, col: 0 },
      { row: 1, col: 1 }
    ]);
  });

  it('returns distinct positions for random sources', () => {
    const mines = pickMinePositions(9, 9, 10, { row: 4, col: 4 }, createRandom(7));
    const keys = new Set(mines.map((p) => `${p.row},${p.col}`));
    expect(keys.size).toBe(10);
    for (const p of mines) {
      expect(Math.abs(p.row - 4) > 1 || Math.abs(p.col - 4) > 1).toBe(true);
    }
  });
});

describe('computeAdjacents', () => {
  it('counts mines around each safe cell and marks mines with -1', () => {
    const board = createEmptyBoard(2, 3);
    board[0][0].isMine = true;
    board[1][2].isMine = true;
    computeAdjacents(board);
    expect(board.map((row) => row.map((c) => c.adjacent))).toEqual([
      [-1, 2, 1],
      [1, 2, -1]
    ]);
  });
});


describe('random', () => {
  it('repeats the same sequence for the same seed', () => {
    const a = createRandom('seed');
    const b = createRandom('seed');
    expect([a(), a(), a()]).toEqual([b(), b(), b()]);
  });

  it('shuffles into a permutation', () => {
    const items = shuffleInPlace([1, 2, 3, 4, 5, 6], createRandom(3));
    expect([...items].sort()).toEqual([1, 2, 3, 4, 5, 6]);
  });
});

import { Cell, Point } from './types';
import { RandomSource, shuffleInPlace } from './random';

const directions = [
  [-1, -1],
  [-1, 0],
  [-1, 1],
  [0, -1],
  [0, 1],
  [1, -1],
  [1, 0],
  [1, 1]
];

export const createEmptyBoard = (rows: number, cols: number): Cell[][] =>
  Array.from({ length: rows }, (_, row) =>
    Array.from({ length: cols }, (_, col) => ({
      row,
      col,
      isMine: false,
      isRevealed: false,
      isFlagged: false,
      adjacent: 0
    }))
  );

export const cloneBoard = (board: Cell[][]): Cell[][] =>
  board.map((row) => row.map((cell) => ({ ...cell })));

export const isInside = (rows: number, cols: number, point: Point): boolean =>
  Number.isInteger(point.row) &&
  Number.isInteger(point.col) &&
  point.row >= 0 &&
  point.col >= 0 &&
  point.row < rows &&
  point.col < cols;

export const getNeighbors = (rows: number, cols: number, point: Point): Point[] => {
  const neighbors: Point[] = [];
  for (const [dr, dc] of directions) {
    const nr = point.row + dr;
    const nc = point.col + dc;
    if (nr < 0 || nc < 0 || nr >= rows || nc >= cols) continue;
    neighbors.push({ row: nr, col: nc });
  }
  return neighbors;
};

/**
 * Picks `mines` distinct positions, keeping `safe` and its neighbours clear.
 * When the board is too dense for a 3x3 safe zone only `safe` itself is kept clear.
 */
export const pickMinePositions = (
  rows: number,
  cols: number,
  mines: number,
  safe: Point,
  random: RandomSource
): Point[] => {
  const zone = new Set<string>([`${safe.row},${safe.col}`]);
  const wideZone = new Set(zone);
  for (const n of getNeighbors(rows, cols, safe)) {
    wideZone.add(`${n.row},${n.col}`);
  }
  const exclude = rows * cols - wideZone.size >= mines ? wideZone : zone;

  const candidates: Point[] = [];
  for (let r = 0; r < rows; r++) {
    for (let c = 0; c < cols; c++) {
      if (!exclude.has(`${r},${c}`)) candidates.push({ row: r, col: c });
    }
  }

  return shuffleInPlace(candidates, random).slice(0, Math.min(mines, candidates.length));
};

export const computeAdjacents = (board: Cell[][]): void => {
  const rows = board.length;
  const cols = board[0]?.length ?? 0;
  for (let r = 0; r < rows; r++) {
    for (let c = 0; c < cols; c++) {
      if (board[r][c].isMine) {
        board[r][c].adjacent = -1;
        continue;
      }
      board[r][c].adjacent = getNeighbors(rows, cols, { row: r, col: c }).reduce(
        (acc, n) => acc + (board[n.row][n.col].isMine ? 1 : 0),
        0
      );
    }
  }
};

import { Cell, GameStatus, Point } from './types';
import {
  cloneBoard,
  computeAdjacents,
  createEmptyBoard,
  getNeighbors,
  isInside,
  pickMinePositions
} from './logic';
import { RandomSource } from './random';

export type BoardOptions = {
  rows: number;
  cols: number;
  mines: number;
  random?: RandomSource;
  now?: () => number;
};

/**
 * Mutable minesweeper grid with lazy mine placement.
 *
 * ready -> playing on the first reveal, playing -> won | lost.
 * Terminal boards ignore every mutation.
 */
export class Board {
  readonly rows: number;
  readonly cols: number;
  readonly mineCount: number;
  private cells: Cell[][];
  private random: RandomSource;
  private now: () => number;
  private _status: GameStatus = 'ready';
  private _revealedCount = 0;
  private _flagCount = 0;
  private _explodedAt: Point | null = null;
  private minesPlaced = false;
  private startedAt: number | null = null;
  private endedAt: number | null = null;

  constructor({ rows, cols, mines, random = Math.random, now = Date.now }: BoardOptions) {
    if (rows < 1 || cols < 1) {
      throw new Error(`Board must have at least one cell, got ${rows}x${cols}`);
    }
    if (!Number.isInteger(mines) || mines < 0 || mines > rows * cols - 1) {
      throw new Error(`Mine count ${mines} out of range for a ${rows}x${cols} board`);
    }
    this.rows = rows;
    this.cols = cols;
    this.mineCount = mines;
    this.random = random;
    this.now = now;
    this.cells = createEmptyBoard(rows, cols);
  }

  get status(): GameStatus {
    return this._status;
  }

  get revealedCount(): number {
    return this._revealedCount;
  }

  get flagCount(): number {
    return this._flagCount;
  }

  get minesLeft(): number {
    return this.mineCount - this._flagCount;
  }

  get explodedAt(): Point | null {
    return this._explodedAt;
  }

  get isTerminal(): boolean {
    return this._status === 'won' || this._status === 'lost';
  }

  cellAt(point: Point): Cell | undefined {
    return isInside(this.rows, this.cols, point) ? this.cells[point.row][point.col] : undefined;
  }

  snapshot(): Cell[][] {
    return cloneBoard(this.cells);
  }

  elapsedSeconds(at: number = this.now()): number {
    if (this.startedAt === null) return 0;
    const end = this.endedAt ?? at;
    return Math.max(0, Math.floor((end - this.startedAt) / 1000));
  }

  /** Places the mines once, before the first reveal; later calls are ignored. */
  placeMines(exclude: Point): void {
    if (this._status !== 'ready' || this.minesPlaced) return;
    this.minesPlaced = true;
    const positions = pickMinePositions(this.rows, this.cols, this.mineCount, exclude, this.random);
    for (const p of positions) {
      this.cells[p.row][p.col].isMine = true;
    }
    computeAdjacents(this.cells);
  }

  reveal(point: Point): void {
    if (this.isTerminal) return;
    const target = this.cellAt(point);
    if (!target || target.isRevealed || target.isFlagged) return;

    if (this._status === 'ready') {
      if (!this.minesPlaced) this.placeMines(point);
      this.startedAt = this.now();
      this._status = 'playing';
    }

    if (target.isMine) {
      this.explode(target);
      return;
    }
    this.floodFill(target);
    this.checkVictory();
  }

  toggleFlag(point: Point): void {
    if (this.isTerminal) return;
    const cell = this.cellAt(point);
    if (!cell || cell.isRevealed) return;
    cell.isFlagged = !cell.isFlagged;
    this._flagCount += cell.isFlagged ? 1 : -1;
  }

  /** Opens the hidden neighbours of a number whose flags are all placed. */
  chord(point: Point): void {
    if (this._status !== 'playing') return;
    const cell = this.cellAt(point);
    if (!cell || !cell.isRevealed || cell.adjacent <= 0) return;

    const neighbors = getNeighbors(this.rows, this.cols, point).map((n) => this.cells[n.row][n.col]);
    const flagged = neighbors.filter((n) => n.isFlagged).length;
    if (flagged !== cell.adjacent) return;

    for (const neighbor of neighbors) {
      if (neighbor.isRevealed || neighbor.isFlagged) continue;
      if (neighbor.isMine) {
        this.explode(neighbor);
        return;
      }
      this.floodFill(neighbor);
    }
    this.checkVictory();
  }

  checkWin(): boolean {
    return this._status !== 'lost' && this._revealedCount === this.rows * this.cols - this.mineCount;
  }

  /** Cells drawn as pressed while the primary button is held over `point`. */
  pressedTiles(point: Point): Point[] {
    if (this.isTerminal) return [];
    const cell = this.cellAt(point);
    if (!cell || cell.isFlagged) return [];
    if (!cell.isRevealed) return [{ row: cell.row, col: cell.col }];
    if (cell.adjacent <= 0) return [];
    return getNeighbors(this.rows, this.cols, point).filter((n) => {
      const neighbor = this.cells[n.row][n.col];
      return !neighbor.isRevealed && !neighbor.isFlagged;
    });
  }

  private floodFill(start: Cell): void {
    // each cell is marked revealed when enqueued, so it is visited at most once
    const queue: Cell[] = [start];
    start.isRevealed = true;
    this._revealedCount++;

    for (let head = 0; head < queue.length; head++) {
      const current = queue[head];
      if (current.adjacent !== 0) continue;
      for (const n of getNeighbors(this.rows, this.cols, current)) {
        const neighbor = this.cells[n.row][n.col];
        if (neighbor.isRevealed || neighbor.isFlagged || neighbor.isMine) continue;
        neighbor.isRevealed = true;
        this._revealedCount++;
        queue.push(neighbor);
      }
    }
  }

  private explode(cell: Cell): void {
    this._explodedAt = { row: cell.row, col: cell.col };
    for (const row of this.cells) {
      for (const c of row) {
        if (c.isMine && !c.isFlagged) c.isRevealed = true;
      }
    }
    this.finish('lost');
  }

  private checkVictory(): void {
    if (!this.checkWin()) return;
    for (const row of this.cells) {
      for (const c of row) {
        if (c.isMine) c.isFlagged = true;
      }
    }
    this._flagCount = this.mineCount;
    this.finish('won');
  }

  private finish(status: 'won' | 'lost'): void {
    this._status = status;
    this.endedAt = this.now();
  }
}

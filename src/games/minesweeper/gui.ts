import type { BoardCommand, Cell, GameStatus, Point } from './types';

export type SpriteKey =
  | 'tile'
  | 'flag'
  | 'mine'
  | 'mine-exploded'
  | 'mine-wrong'
  | `count-${0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8}`;

export const COUNT_SPRITES = [
  'count-0',
  'count-1',
  'count-2',
  'count-3',
  'count-4',
  'count-5',
  'count-6',
  'count-7',
  'count-8'
] as const satisfies readonly SpriteKey[];

export const SPRITE_KEYS: readonly SpriteKey[] = ['tile', 'flag', 'mine', 'mine-exploded', 'mine-wrong', ...COUNT_SPRITES];

export type PointerButton = 'primary' | 'secondary';

export type BoardPointerEvent = {
  kind: 'down' | 'up';
  button: PointerButton;
  x: number;
  y: number;
};

export type BoardLayout = {
  originX: number;
  originY: number;
  tileSize: number;
  rows: number;
  cols: number;
};

export type BoardViewState = {
  cells: Cell[][];
  status: GameStatus;
  explodedAt: Point | null;
  pressed: Point[];
};

/** Everything drawn on the board surface exposes the same two capabilities. */
export interface GuiElement<TState, TView> {
  render(state: TState): TView;
  handleEvent(event: BoardPointerEvent): BoardCommand | null;
}

export type Shortcut = 'restart' | 'leave-leaderboard';

const TEXT_ENTRY_TAGS = new Set(['INPUT', 'TEXTAREA', 'SELECT']);

export const isTextEntryTarget = (target: EventTarget | null): boolean =>
  target instanceof HTMLElement && (TEXT_ENTRY_TAGS.has(target.tagName) || target.isContentEditable === true);

/** Page-level keys; letters typed into a form field never trigger a shortcut. */
export function keyToShortcut(event: Pick<KeyboardEvent, 'key' | 'target'>): Shortcut | null {
  if (event.key === 'Escape') return 'leave-leaderboard';
  if (isTextEntryTarget(event.target)) return null;
  if (event.key === 'r' || event.key === 'R') return 'restart';
  return null;
}

export function pointerToCell(x: number, y: number, layout: BoardLayout): Point | null {
  const col = Math.floor((x - layout.originX) / layout.tileSize);
  const row = Math.floor((y - layout.originY) / layout.tileSize);
  if (row < 0 || col < 0 || row >= layout.rows || col >= layout.cols) return null;
  return { row, col };
}

const samePoint = (a: Point | null, b: Point) => a !== null && a.row === b.row && a.col === b.col;

export function tileSprite(cell: Cell, status: GameStatus, explodedAt: Point | null, pressed = false): SpriteKey {
  if (status === 'lost') {
    if (cell.isMine && samePoint(explodedAt, cell)) return 'mine-exploded';
    if (cell.isFlagged) return cell.isMine ? 'flag' : 'mine-wrong';
    if (cell.isMine) return 'mine';
  }
  if (cell.isFlagged) return 'flag';
  if (!cell.isRevealed) return pressed ? 'count-0' : 'tile';
  if (cell.isMine) return 'mine';
  return COUNT_SPRITES[Math.max(0, Math.min(8, cell.adjacent))];
}

/**
 * The mine field: sprites per cell, pointer routing to board commands.
 * Reveal fires on release like a desktop button; flags toggle on press.
 */
export class BoardView implements GuiElement<BoardViewState, SpriteKey[][]> {
  private layout: BoardLayout;
  private cells: Cell[][] = [];

  constructor(layout: BoardLayout) {
    this.layout = layout;
  }

  setLayout(layout: BoardLayout) {
    this.layout = layout;
  }

  getLayout(): BoardLayout {
    return this.layout;
  }

  render(state: BoardViewState): SpriteKey[][] {
    this.cells = state.cells;
    const pressed = new Set(state.pressed.map((p) => `${p.row},${p.col}`));
    return state.cells.map((row) =>
      row.map((cell) => tileSprite(cell, state.status, state.explodedAt, pressed.has(`${cell.row},${cell.col}`)))
    );
  }

  handleEvent(event: BoardPointerEvent): BoardCommand | null {
    const point = pointerToCell(event.x, event.y, this.layout);
    if (!point) return null;
    if (event.button === 'secondary') {
      return event.kind === 'down' ? { type: 'flag', point } : null;
    }
    if (event.kind !== 'up') return null;
    const cell = this.cells[point.row]?.[point.col];
    if (cell?.isRevealed && cell.adjacent > 0) return { type: 'chord', point };
    return { type: 'reveal', point };
  }
}

import { create, type StoreApi, type UseBoundStore } from 'zustand';
import { Board } from './board';
import { MAX_NAME_LENGTH, getDifficulty, isRanked } from './constants';
import { Leaderboard, type LeaderboardRow } from './leaderboard';
import { createRandom, type RandomSource } from './random';
import { clampDimension, clampMines, isNameCharacter } from './settings';
import { loadState, saveState, type StorageLike } from './storage';
import type {
  BoardCommand,
  Cell,
  DifficultyKey,
  GameResult,
  GameStatus,
  Point,
  ScreenMode
} from './types';

export type MinesweeperDeps = {
  storage: StorageLike;
  now: () => number;
  createRandom: () => RandomSource;
};

export type MinesweeperState = {
  board: Board;
  cells: Cell[][];
  status: GameStatus;
  explodedAt: Point | null;
  pressed: Point[];
  seconds: number;
  minesLeft: number;
  difficulty: DifficultyKey;
  rows: number;
  cols: number;
  mines: number;
  leaderboard: Leaderboard;
  leaderboardRows: LeaderboardRow[];
  mode: ScreenMode;
  lastResult: GameResult | null;
  awaitingName: boolean;
  fatalError: string | null;
  dispatch: (command: BoardCommand) => void;
  reveal: (point: Point) => void;
  toggleFlag: (point: Point) => void;
  chord: (point: Point) => void;
  setPressed: (point: Point | null) => void;
  restart: () => void;
  tick: () => void;
  setDifficulty: (difficulty: DifficultyKey) => void;
  setRows: (value: string | number) => number;
  setCols: (value: string | number) => number;
  setMines: (value: string | number) => number;
  showLeaderboard: () => void;
  hideLeaderboard: () => void;
  openNameInput: () => void;
  submitName: (name: string) => boolean;
  reportFatal: (message: string) => void;
};

export type MinesweeperStore = UseBoundStore<StoreApi<MinesweeperState>>;

export function createMemoryStorage(): StorageLike {
  const items = new Map<string, string>();
  return {
    getItem: (key) => items.get(key) ?? null,
    setItem: (key, value) => {
      items.set(key, value);
    }
  };
}

const browserDeps = (): MinesweeperDeps => ({
  storage: typeof window !== 'undefined' && window.localStorage ? window.localStorage : createMemoryStorage(),
  now: () => Date.now(),
  createRandom: () => createRandom()
});

const boardView = (board: Board, now: number) => ({
  board,
  cells: board.snapshot(),
  status: board.status,
  explodedAt: board.explodedAt,
  minesLeft: board.minesLeft,
  seconds: board.elapsedSeconds(now),
  pressed: []
});

export function createMinesweeperStore(overrides: Partial<MinesweeperDeps> = {}): MinesweeperStore {
  const deps: MinesweeperDeps = { ...browserDeps(), ...overrides };
  const saved = loadState(deps.storage);

  const newBoard = (rows: number, cols: number, mines: number) =>
    new Board({ rows, cols, mines, random: deps.createRandom(), now: deps.now });

  return create<MinesweeperState>()((set, get) => {
    const persist = () => {
      const { difficulty, rows, cols, mines, leaderboard } = get();
      saveState(deps.storage, { difficulty, rows, cols, mines, leaderboard });
    };

    const resetBoard = (rows: number, cols: number, mines: number) => {
      set({
        ...boardView(newBoard(rows, cols, mines), deps.now()),
        rows,
        cols,
        mines,
        mode: 'game',
        lastResult: null,
        awaitingName: false
      });
    };

    const apply = (mutate: (board: Board) => void) => {
      const { board, mode, difficulty, leaderboard } = get();
      if (mode !== 'game') return;
      const before = board.status;
      mutate(board);
      const view = boardView(board, deps.now());
      if (before === board.status || !board.isTerminal) {
        set(view);
        return;
      }
      const result: GameResult = {
        outcome: board.status === 'won' ? 'won' : 'lost',
        time: board.elapsedSeconds(),
        difficulty
      };
      console.info('[Minesweeper] game finished', result);
      set({
        ...view,
        lastResult: result,
        awaitingName: result.outcome === 'won' && leaderboard.needsUpdate(difficulty, result.time)
      });
    };

    const board = newBoard(saved.rows, saved.cols, saved.mines);

    return {
      ...boardView(board, deps.now()),
      difficulty: saved.difficulty,
      rows: saved.rows,
      cols: saved.cols,
      mines: saved.mines,
      leaderboard: saved.leaderboard,
      leaderboardRows: saved.leaderboard.render(),
      mode: 'game',
      lastResult: null,
      awaitingName: false,
      fatalError: null,

      dispatch: (command) => {
        switch (command.type) {
          case 'reveal':
            get().reveal(command.point);
            break;
          case 'flag':
            get().toggleFlag(command.point);
            break;
          case 'chord':
            get().chord(command.point);
            break;
        }
      },
      reveal: (point) => apply((b) => b.reveal(point)),
      toggleFlag: (point) => apply((b) => b.toggleFlag(point)),
      chord: (point) => apply((b) => b.chord(point)),
      setPressed: (point) => {
        const { board, mode } = get();
        set({ pressed: point && mode === 'game' ? board.pressedTiles(point) : [] });
      },
      restart: () => {
        const { rows, cols, mines } = get();
        resetBoard(rows, cols, mines);
      },
      tick: () => {
        const seconds = get().board.elapsedSeconds(deps.now());
        if (seconds !== get().seconds) set({ seconds });
      },
      setDifficulty: (difficulty) => {
        const current = get();
        const preset = difficulty === 'CUSTOM' ? current : getDifficulty(difficulty);
        set({ difficulty });
        resetBoard(preset.rows, preset.cols, preset.mines);
        persist();
      },
      setRows: (value) => {
        const { difficulty, cols, mines, rows } = get();
        if (difficulty !== 'CUSTOM') return rows;
        const next = clampDimension(value);
        resetBoard(next, cols, clampMines(mines, next, cols));
        persist();
        return next;
      },
      setCols: (value) => {
        const { difficulty, rows, mines, cols } = get();
        if (difficulty !== 'CUSTOM') return cols;
        const next = clampDimension(value);
        resetBoard(rows, next, clampMines(mines, rows, next));
        persist();
        return next;
      },
      setMines: (value) => {
        const { difficulty, rows, cols, mines } = get();
        if (difficulty !== 'CUSTOM') return mines;
        const next = clampMines(value, rows, cols);
        resetBoard(rows, cols, next);
        persist();
        return next;
      },
      showLeaderboard: () => set({ mode: 'leaderboard', pressed: [] }),
      hideLeaderboard: () => {
        if (get().mode === 'leaderboard') set({ mode: 'game' });
      },
      openNameInput: () => {
        const { awaitingName, status } = get();
        if (awaitingName && status === 'won') set({ mode: 'name_input' });
      },
      submitName: (name) => {
        const { lastResult, leaderboard, awaitingName } = get();
        const trimmed = name.trim();
        const valid = trimmed.length <= MAX_NAME_LENGTH && [...trimmed].every(isNameCharacter);
        if (!trimmed || !valid || !awaitingName || !lastResult || !isRanked(lastResult.difficulty)) return false;
        leaderboard.record(lastResult.difficulty, trimmed, lastResult.time, deps.now());
        set({ leaderboardRows: leaderboard.render(), awaitingName: false, mode: 'leaderboard' });
        persist();
        return true;
      },
      reportFatal: (message) => {
        console.error('[Minesweeper] fatal:', message);
        set({ fatalError: message });
      }
    };
  });
}

export const useMinesweeperStore = createMinesweeperStore();

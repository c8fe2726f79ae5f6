import { DEFAULT_DIFFICULTY, DIFFICULTY_KEYS, getDifficulty } from './constants';
import { Leaderboard, isRecord } from './leaderboard';
import { normalizeParameters } from './settings';
import type { DifficultyKey } from './types';

export const STORAGE_KEY = 'minesweeper_state_v1';
export const STATE_VERSION = 1;

export type StorageLike = Pick<Storage, 'getItem' | 'setItem'>;

export interface SavedState {
  difficulty: DifficultyKey;
  rows: number;
  cols: number;
  mines: number;
  leaderboard: Leaderboard;
}

export const defaultState = (): SavedState => {
  const preset = getDifficulty(DEFAULT_DIFFICULTY);
  return {
    difficulty: preset.key,
    rows: preset.rows,
    cols: preset.cols,
    mines: preset.mines,
    leaderboard: new Leaderboard()
  };
};

const isDifficultyKey = (value: unknown): value is DifficultyKey =>
  typeof value === 'string' && DIFFICULTY_KEYS.some((key) => key === value);

const readNumber = (value: unknown, fallback: number): number =>
  typeof value === 'number' && Number.isFinite(value) ? value : fallback;

export function parseState(raw: string): SavedState {
  const fallback = defaultState();
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    console.warn('[Storage] saved state is not valid JSON, starting fresh', err);
    return fallback;
  }
  if (!isRecord(parsed)) {
    console.warn('[Storage] saved state has an unexpected shape, starting fresh');
    return fallback;
  }
  const data = parsed;
  if (data.version !== STATE_VERSION) {
    console.warn('[Storage] ignoring saved state with version', data.version);
    return fallback;
  }

  const difficulty = isDifficultyKey(data.difficulty) ? data.difficulty : fallback.difficulty;
  const params =
    difficulty === 'CUSTOM'
      ? normalizeParameters({
          rows: readNumber(data.rows, fallback.rows),
          cols: readNumber(data.cols, fallback.cols),
          mines: readNumber(data.mines, fallback.mines)
        })
      : getDifficulty(difficulty);

  return {
    difficulty,
    rows: params.rows,
    cols: params.cols,
    mines: params.mines,
    leaderboard: Leaderboard.fromJSON(data.leaderboard)
  };
}

export function loadState(storage: StorageLike): SavedState {
  let raw: string | null;
  try {
    raw = storage.getItem(STORAGE_KEY);
  } catch (err) {
    console.warn('[Storage] cannot read saved state', err);
    return defaultState();
  }
  if (!raw) return defaultState();
  return parseState(raw);
}

export function serializeState(state: SavedState): string {
  return JSON.stringify({
    version: STATE_VERSION,
    difficulty: state.difficulty,
    rows: state.rows,
    cols: state.cols,
    mines: state.mines,
    leaderboard: state.leaderboard.toJSON()
  });
}

export function saveState(storage: StorageLike, state: SavedState): void {
  try {
    storage.setItem(STORAGE_KEY, serializeState(state));
  } catch (err) {
    console.error('[Storage] failed to save state', err);
  }
}

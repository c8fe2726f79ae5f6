import type { Difficulty, DifficultyKey, RankedDifficulty } from './types';

export const difficulties: Difficulty[] = [
  { key: 'EASY', label: 'Easy', rows: 10, cols: 10, mines: 10 },
  { key: 'NORMAL', label: 'Normal', rows: 16, cols: 16, mines: 40 },
  { key: 'HARD', label: 'Hard', rows: 16, cols: 30, mines: 99 },
  { key: 'CUSTOM', label: 'Custom', rows: 10, cols: 10, mines: 10 }
];

export const DIFFICULTY_KEYS: DifficultyKey[] = difficulties.map((d) => d.key);
export const RANKED_DIFFICULTIES: RankedDifficulty[] = ['EASY', 'NORMAL', 'HARD'];
export const DEFAULT_DIFFICULTY: DifficultyKey = 'EASY';

// Board limits for custom games
export const MIN_BOARD_DIMENSION = 1;
export const MAX_BOARD_DIMENSION = 50;
export const MAX_PARAMETER_LENGTH = 3;

// Leaderboard
export const LEADERBOARD_SIZE = 5;
export const MAX_NAME_LENGTH = 8;
export const DELAY_BEFORE_NAME_INPUT_MS = 1000;

// Rendering
export const TILE_SIZE = 24;

export const STATUS_TEXT = {
  ready: 'READY TO GO!',
  playing: 'GOOD LUCK!',
  won: 'VICTORY!',
  lost: 'GAME OVER!'
} as const;

export const getDifficulty = (key: DifficultyKey): Difficulty =>
  difficulties.find((d) => d.key === key) ?? difficulties[0];

export const isRanked = (key: DifficultyKey): key is RankedDifficulty => key !== 'CUSTOM';

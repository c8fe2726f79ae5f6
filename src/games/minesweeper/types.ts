export type Point = { row: number; col: number };

export type Cell = {
  row: number;
  col: number;
  isMine: boolean;
  isRevealed: boolean;
  isFlagged: boolean;
  /** Mines among the up-to-8 neighbours; -1 for a mine. */
  adjacent: number;
};

export type GameStatus = 'ready' | 'playing' | 'won' | 'lost';

export type DifficultyKey = 'EASY' | 'NORMAL' | 'HARD' | 'CUSTOM';

export type RankedDifficulty = Exclude<DifficultyKey, 'CUSTOM'>;

export type Difficulty = {
  key: DifficultyKey;
  label: string;
  rows: number;
  cols: number;
  mines: number;
};

export type BoardCommand = {
  type: 'reveal' | 'flag' | 'chord';
  point: Point;
};

export type GameResult = {
  outcome: 'won' | 'lost';
  time: number;
  difficulty: DifficultyKey;
};

export type LeaderboardEntry = {
  name: string;
  time: number;
  timestamp: number;
};

export type LeaderboardData = Record<RankedDifficulty, LeaderboardEntry[]>;

export type ScreenMode = 'game' | 'leaderboard' | 'name_input';

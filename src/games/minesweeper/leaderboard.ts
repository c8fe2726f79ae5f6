import { LEADERBOARD_SIZE, MAX_NAME_LENGTH, RANKED_DIFFICULTIES, isRanked } from './constants';
import type { DifficultyKey, LeaderboardData, LeaderboardEntry, RankedDifficulty } from './types';

export type LeaderboardRow = {
  difficulty: RankedDifficulty;
  rank: number;
  name: string;
  time: number;
};

const emptyData = (): LeaderboardData => ({ EASY: [], NORMAL: [], HARD: [] });

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const isLeaderboardEntry = (value: unknown): value is LeaderboardEntry =>
  isRecord(value) &&
  typeof value.name === 'string' &&
  value.name.length > 0 &&
  value.name.length <= MAX_NAME_LENGTH &&
  typeof value.time === 'number' &&
  Number.isInteger(value.time) &&
  value.time >= 0 &&
  typeof value.timestamp === 'number' &&
  Number.isFinite(value.timestamp);

/** Ranked top-N lists of winning times, one list per preset difficulty. */
export class Leaderboard {
  readonly maxItems: number;
  private data: LeaderboardData;

  constructor(data: LeaderboardData = emptyData(), maxItems = LEADERBOARD_SIZE) {
    this.maxItems = maxItems;
    this.data = emptyData();
    for (const difficulty of RANKED_DIFFICULTIES) {
      this.data[difficulty] = [...data[difficulty]]
        .sort((a, b) => a.time - b.time)
        .slice(0, maxItems);
    }
  }

  /** Keeps only well-formed entries; anything else yields an empty board. */
  static fromJSON(raw: unknown, maxItems = LEADERBOARD_SIZE): Leaderboard {
    const data = emptyData();
    if (isRecord(raw)) {
      for (const difficulty of RANKED_DIFFICULTIES) {
        const list = raw[difficulty];
        if (Array.isArray(list)) {
          const valid = list.filter(isLeaderboardEntry);
          if (valid.length !== list.length) {
            console.warn(`[Leaderboard] dropped ${list.length - valid.length} malformed ${difficulty} entries`);
          }
          data[difficulty] = valid.map((e) => ({
            name: e.name,
            time: e.time,
            timestamp: e.timestamp
          }));
        }
      }
    }
    return new Leaderboard(data, maxItems);
  }

  toJSON(): LeaderboardData {
    return {
      EASY: this.entries('EASY'),
      NORMAL: this.entries('NORMAL'),
      HARD: this.entries('HARD')
    };
  }

  entries(difficulty: RankedDifficulty): LeaderboardEntry[] {
    return this.data[difficulty].map((e) => ({ ...e }));
  }

  needsUpdate(difficulty: DifficultyKey, time: number): boolean {
    if (!isRanked(difficulty)) return false;
    const list = this.data[difficulty];
    if (list.length < this.maxItems) return true;
    return list[list.length - 1].time > time;
  }

  /** Inserts after every entry with an equal or better time. Returns whether it stayed in the top list. */
  record(difficulty: DifficultyKey, name: string, time: number, timestamp = Date.now()): boolean {
    if (!isRanked(difficulty)) return false;
    const list = this.data[difficulty];
    let i = 0;
    while (i < list.length && time >= list[i].time) i++;
    if (i >= this.maxItems) return false;
    list.splice(i, 0, { name, time, timestamp });
    if (list.length > this.maxItems) list.pop();
    return true;
  }

  render(): LeaderboardRow[] {
    return RANKED_DIFFICULTIES.flatMap((difficulty) =>
      this.data[difficulty].map((entry, index) => ({
        difficulty,
        rank: index + 1,
        name: entry.name,
        time: entry.time
      }))
    );
  }
}

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Leaderboard, isLeaderboardEntry } from './leaderboard';

const fill = (board: Leaderboard, times: number[]) => {
  times.forEach((time, i) => board.record('EASY', `p${i}`, time, 1000 + i));
};

describe('Leaderboard', () => {
  let board: Leaderboard;

  beforeEach(() => {
    board = new Leaderboard();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('keeps entries sorted by time', () => {
    board.record('EASY', 'slow', 30, 1);
    board.record('EASY', 'fast', 10, 2);
    board.record('EASY', 'mid', 20, 3);
    expect(board.entries('EASY').map((e) => e.name)).toEqual(['fast', 'mid', 'slow']);
  });

  it('places an equal time after the existing entry', () => {
    board.record('NORMAL', 'first', 42, 1);
    board.record('NORMAL', 'second', 42, 2);
    expect(board.entries('NORMAL').map((e) => e.name)).toEqual(['first', 'second']);
  });

  it('truncates to five entries', () => {
    fill(board, [10, 20, 30, 40, 50]);
    expect(board.record('EASY', 'late', 60, 9)).toBe(false);
    expect(board.record('EASY', 'tie', 50, 9)).toBe(false);
    expect(board.record('EASY', 'quick', 5, 9)).toBe(true);
    const entries = board.entries('EASY');
    expect(entries).toHaveLength(5);
    expect(entries[0]).toEqual({ name: 'quick', time: 5, timestamp: 9 });
    expect(entries[4].time).toBe(40);
  });

  it('decides whether a time would make the list', () => {
    expect(board.needsUpdate('HARD', 999)).toBe(true);
    fill(board, [10, 20, 30, 40, 50]);
    expect(board.needsUpdate('EASY', 50)).toBe(false);
    expect(board.needsUpdate('EASY', 49)).toBe(true);
    expect(board.needsUpdate('CUSTOM', 1)).toBe(false);
  });

  it('never ranks custom games', () => {
    expect(board.record('CUSTOM', 'nobody', 1, 1)).toBe(false);
    expect(board.render()).toEqual([]);
  });

  it('renders ranked rows for every difficulty', () => {
    board.record('HARD', 'h', 300, 1);
    board.record('EASY', 'e2', 12, 2);
    board.record('EASY', 'e1', 8, 3);
    expect(board.render()).toEqual([
      { difficulty: 'EASY', rank: 1, name: 'e1', time: 8 },
      { difficulty: 'EASY', rank: 2, name: 'e2', time: 12 },
      { difficulty: 'HARD', rank: 1, name: 'h', time: 300 }
    ]);
  });

  it('hands out copies from entries()', () => {
    board.record('EASY', 'a', 1, 1);
    board.entries('EASY')[0].time = 99;
    expect(board.entries('EASY')[0].time).toBe(1);
  });

  it('sorts and truncates data passed to the constructor', () => {
    const restored = new Leaderboard(
      {
        EASY: [
          { name: 'c', time: 3, timestamp: 0 },
          { name: 'a', time: 1, timestamp: 0 },
          { name: 'b', time: 2, timestamp: 0 }
        ],
        NORMAL: [],
        HARD: []
      },
      2
    );
    expect(restored.entries('EASY').map((e) => e.name)).toEqual(['a', 'b']);
  });

  describe('fromJSON', () => {
    it('restores what toJSON wrote', () => {
      board.record('EASY', 'a', 11, 100);
      board.record('HARD', 'b', 222, 200);
      expect(Leaderboard.fromJSON(board.toJSON()).toJSON()).toEqual(board.toJSON());
    });

    it('drops malformed entries', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const restored = Leaderboard.fromJSON({
        EASY: [
          { name: 'ok', time: 30, timestamp: 1 },
          { name: 'waytoolongname', time: 5, timestamp: 1 },
          { name: 'neg', time: -1, timestamp: 1 },
          { name: 'frac', time: 1.5, timestamp: 1 },
          { name: 'nostamp', time: 4 },
          'junk',
          { name: 'best', time: 10, timestamp: 2 }
        ],
        NORMAL: 'not a list'
      });
      expect(restored.entries('EASY').map((e) => e.name)).toEqual(['best', 'ok']);
      expect(restored.entries('NORMAL')).toEqual([]);
      expect(warn).toHaveBeenCalledTimes(1);
    });

    it('returns an empty board for anything that is not an object', () => {
      expect(Leaderboard.fromJSON(null).render()).toEqual([]);
      expect(Leaderboard.fromJSON([1, 2]).render()).toEqual([]);
    });
  });
});

describe('isLeaderboardEntry', () => {
  it('requires a short name, whole-second time and a timestamp', () => {
    expect(isLeaderboardEntry({ name: 'ace', time: 0, timestamp: 0 })).toBe(true);
    expect(isLeaderboardEntry({ name: '', time: 0, timestamp: 0 })).toBe(false);
    expect(isLeaderboardEntry({ name: 'ace', time: '5', timestamp: 0 })).toBe(false);
  });
});

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Leaderboard } from './leaderboard';
import { STORAGE_KEY, defaultState, loadState, parseState, saveState, serializeState, type StorageLike } from './storage';
import { createMemoryStorage } from './useMinesweeperStore';

describe('storage', () => {
  let storage: StorageLike;

  beforeEach(() => {
    storage = createMemoryStorage();
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('starts from defaults when nothing is saved', () => {
    const state = loadState(storage);
    expect(state.difficulty).toBe('EASY');
    expect([state.rows, state.cols, state.mines]).toEqual([10, 10, 10]);
    expect(state.leaderboard.render()).toEqual([]);
  });

  it('reads back what it saved', () => {
    const leaderboard = new Leaderboard();
    leaderboard.record('NORMAL', 'ace', 77, 1234);
    saveState(storage, { difficulty: 'CUSTOM', rows: 20, cols: 30, mines: 100, leaderboard });
    const state = loadState(storage);
    expect(state.difficulty).toBe('CUSTOM');
    expect([state.rows, state.cols, state.mines]).toEqual([20, 30, 100]);
    expect(state.leaderboard.entries('NORMAL')).toEqual([{ name: 'ace', time: 77, timestamp: 1234 }]);
  });

  it('writes a versioned document', () => {
    const raw = serializeState(defaultState());
    expect(JSON.parse(raw)).toEqual({
      version: 1,
      difficulty: 'EASY',
      rows: 10,
      cols: 10,
      mines: 10,
      leaderboard: { EASY: [], NORMAL: [], HARD: [] }
    });
  });

  it('falls back to defaults on corrupt JSON', () => {
    storage.setItem(STORAGE_KEY, '{"version": 1,');
    expect(loadState(storage).difficulty).toBe('EASY');
    expect(console.warn).toHaveBeenCalled();
  });

  it('ignores other versions and non-object documents', () => {
    expect(parseState(JSON.stringify({ version: 2, difficulty: 'HARD' })).difficulty).toBe('EASY');
    expect(parseState('[1, 2, 3]').difficulty).toBe('EASY');
    expect(parseState('null').difficulty).toBe('EASY');
  });

  it('replaces an unknown difficulty but keeps the leaderboard', () => {
    const state = parseState(
      JSON.stringify({
        version: 1,
        difficulty: 'INSANE',
        rows: 3,
        cols: 3,
        mines: 1,
        leaderboard: { EASY: [{ name: 'kept', time: 9, timestamp: 5 }] }
      })
    );
    expect(state.difficulty).toBe('EASY');
    expect([state.rows, state.cols, state.mines]).toEqual([10, 10, 10]);
    expect(state.leaderboard.entries('EASY')).toEqual([{ name: 'kept', time: 9, timestamp: 5 }]);
  });

  it('uses preset dimensions for preset difficulties', () => {
    const state = parseState(JSON.stringify({ version: 1, difficulty: 'NORMAL', rows: 3, cols: 3, mines: 1 }));
    expect([state.rows, state.cols, state.mines]).toEqual([16, 16, 40]);
  });

  it('clamps stored custom parameters', () => {
    const state = parseState(JSON.stringify({ version: 1, difficulty: 'CUSTOM', rows: 80, cols: 0, mines: 5000 }));
    expect([state.rows, state.cols, state.mines]).toEqual([50, 1, 49]);
  });

  it('survives a storage that cannot be read', () => {
    const broken: StorageLike = {
      getItem: () => {
        throw new Error('denied');
      },
      setItem: () => undefined
    };
    expect(loadState(broken).difficulty).toBe('EASY');
  });

  it('logs and swallows write failures', () => {
    const full: StorageLike = {
      getItem: () => null,
      setItem: () => {
        throw new Error('quota');
      }
    };
    expect(() => saveState(full, defaultState())).not.toThrow();
    expect(console.error).toHaveBeenCalledWith('[Storage] failed to save state', expect.any(Error));
  });
});

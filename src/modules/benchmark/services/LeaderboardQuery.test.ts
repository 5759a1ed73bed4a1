import { describe, it, expect } from 'vitest';
import { LeaderboardQuery } from './LeaderboardQuery.js';
import type { ScoreSnapshot } from '../types.js';

function queryOver(table: Record<string, Record<string, number>>): LeaderboardQuery {
  const snapshot: ScoreSnapshot = new Map(
    Object.entries(table).map(([category, users]) => [category, new Map(Object.entries(users))])
  );
  return new LeaderboardQuery({ snapshot: () => snapshot });
}

describe('LeaderboardQuery', () => {
  const query = queryOver({
    gpu: { '1': 40, '2': 70 },
    cpu: { '1': 100, '2': 300, '3': 200, '4': 300 },
    disk: {},
  });

  describe('top', () => {
    it('ranks highest first and keeps insertion order on ties', () => {
      expect(query.top('cpu', 10)).toEqual([
        { userId: '2', score: 300 },
        { userId: '4', score: 300 },
        { userId: '3', score: 200 },
        { userId: '1', score: 100 },
      ]);
    });

    it('respects the limit', () => {
      expect(query.top('cpu', 2).map(entry => entry.userId)).toEqual(['2', '4']);
      expect(query.top('cpu', 2.7)).toHaveLength(2);
    });

    it('returns nothing for unknown categories and non-positive limits', () => {
      expect(query.top('ram', 10)).toEqual([]);
      expect(query.top('cpu', 0)).toEqual([]);
      expect(query.top('cpu', -1)).toEqual([]);
    });
  });

  describe('topAllCategories', () => {
    it('returns every non-empty category in store order', () => {
      const boards = query.topAllCategories(1);

      expect(Array.from(boards.keys())).toEqual(['gpu', 'cpu']);
      expect(boards.get('gpu')).toEqual([{ userId: '2', score: 70 }]);
      expect(boards.get('cpu')).toEqual([{ userId: '2', score: 300 }]);
    });
  });

  describe('history', () => {
    it('collects a user\'s score in every category', () => {
      expect(Array.from(query.history('1'))).toEqual([
        ['gpu', 40],
        ['cpu', 100],
      ]);
      expect(query.history('3').get('cpu')).toBe(200);
      expect(query.history('9').size).toBe(0);
    });
  });

  it('lists categories alphabetically', () => {
    expect(query.categories()).toEqual(['cpu', 'disk', 'gpu']);
  });
});

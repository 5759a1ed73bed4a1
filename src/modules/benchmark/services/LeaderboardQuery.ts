import type { Category, ScoreEntry, ScoreSnapshot, UserId } from '../types.js';

/**
 * Rank a category's scores, highest first. Equal scores keep insertion order.
 */
function rank(users: ReadonlyMap<UserId, number> | undefined, limit: number): ScoreEntry[] {
  const count = Math.floor(limit);
  if (!users || count <= 0) {
    return [];
  }

  return Array.from(users, ([userId, score]) => ({ userId, score }))
    .sort((a, b) => b.score - a.score)
    .slice(0, count);
}

/**
 * Read-only leaderboard views. Each call works on one snapshot of the store.
 */
export class LeaderboardQuery {
  constructor(private readonly source: { snapshot(): ScoreSnapshot }) {}

  top(category: Category, limit: number): ScoreEntry[] {
    return rank(this.source.snapshot().get(category), limit);
  }

  /**
   * Top entries for every category that has any, in store order
   */
  topAllCategories(limit: number): Map<Category, ScoreEntry[]> {
    const result = new Map<Category, ScoreEntry[]>();

    for (const [category, users] of this.source.snapshot()) {
      const entries = rank(users, limit);
      if (entries.length > 0) {
        result.set(category, entries);
      }
    }

    return result;
  }

  /**
   * A user's best score in every category they have one
   */
  history(userId: UserId): Map<Category, number> {
    const result = new Map<Category, number>();

    for (const [category, users] of this.source.snapshot()) {
      const score = users.get(userId);
      if (score !== undefined) {
        result.set(category, score);
      }
    }

    return result;
  }

  categories(): Category[] {
    return Array.from(this.source.snapshot().keys()).sort();
  }
}

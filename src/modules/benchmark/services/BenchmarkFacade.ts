import { COLORS, type EmbedFieldData } from '../../../shared/utils/embed.js';
import { Logger } from '../../../shared/utils/logger.js';
import type { ScoreStore } from './ScoreStore.js';
import type { LeaderboardQuery } from './LeaderboardQuery.js';
import type { UserDirectory } from './UserDirectory.js';
import type { BenchmarkReply, Category, ScoreEntry, UserId, UserRef } from '../types.js';

const logger = new Logger('Benchmark:Facade');

/** Rows shown by `view` */
export const VIEW_LIMIT = 10;

/** Rows per category shown by `overview` */
export const OVERVIEW_LIMIT = 3;

/** Discord caps autocomplete choices at 25 */
export const SUGGESTION_LIMIT = 25;

export function formatScore(score: number): string {
  return String(score);
}

function message(content: string): BenchmarkReply {
  return { kind: 'message', content };
}

function embed(title: string, color: number, fields: EmbedFieldData[]): BenchmarkReply {
  return { kind: 'embed', title, color, fields };
}

/**
 * Turns benchmark requests into store/query calls and renders the replies.
 * Privilege checks for deletes happen before this is called.
 */
export class BenchmarkFacade {
  constructor(
    private readonly store: ScoreStore,
    private readonly query: LeaderboardQuery,
    private readonly users: UserDirectory
  ) {}

  async add(userId: UserId, category: Category, score: number): Promise<BenchmarkReply> {
    const result = await this.store.put(category, userId, score);

    if (result.status === 'rejected') {
      return message(
        `Your previous score of ${formatScore(result.previous)} for ${category} is higher. Score not updated.`
      );
    }

    if (result.previous === null) {
      return message(`Added new ${category} benchmark score: ${formatScore(result.score)}`);
    }

    return message(
      `New high score for ${category}! Updated from ${formatScore(result.previous)} to ${formatScore(result.score)}`
    );
  }

  async view(category: Category): Promise<BenchmarkReply> {
    const entries = this.query.top(category, VIEW_LIMIT);
    if (entries.length === 0) {
      return message(`No scores found for ${category} benchmark.`);
    }

    const names = await this.resolveNames(entries.map(entry => entry.userId));
    const fields: EmbedFieldData[] = [];

    entries.forEach((entry, index) => {
      const name = names.get(entry.userId);
      if (name === undefined) return;

      fields.push({
        name: `${index + 1}. ${name}`,
        value: `Score: ${formatScore(entry.score)}`,
        inline: false,
      });
    });

    return embed(`${category.toUpperCase()} Benchmark Leaderboard`, COLORS.primary, fields);
  }

  types(): BenchmarkReply {
    const categories = this.query.categories();
    if (categories.length === 0) {
      return message('No benchmark types have been created yet.');
    }

    return message(`Available benchmark types:\n${categories.join('\n')}`);
  }

  /**
   * Delete a whole category, or one user's score in it when a target is given
   */
  async delete(category: Category, target?: UserRef): Promise<BenchmarkReply> {
    if (!this.store.has(category)) {
      return message(`No leaderboard found for ${category}`);
    }

    if (target) {
      const result = await this.store.delete(category, target.id);
      return result === 'removed'
        ? message(`Deleted ${target.name}'s score for ${category} benchmark`)
        : message(`${target.name} has no score for ${category} benchmark`);
    }

    const result = await this.store.deleteCategory(category);
    return result === 'removed'
      ? message(`Deleted entire ${category} benchmark leaderboard`)
      : message(`No leaderboard found for ${category}`);
  }

  async history(requester: UserRef, target?: UserRef): Promise<BenchmarkReply> {
    const user = target ?? requester;
    const scores = this.query.history(user.id);

    if (scores.size === 0) {
      return message(`No historical scores found for ${user.name}.`);
    }

    const fields = Array.from(scores, ([category, score]) => ({
      name: category.toUpperCase(),
      value: `Score: ${formatScore(score)}`,
      inline: false,
    }));

    return embed(`Historical Benchmark Scores for ${user.name}`, COLORS.success, fields);
  }

  /**
   * Top three of every category in one embed
   */
  async overview(): Promise<BenchmarkReply> {
    const boards = this.query.topAllCategories(OVERVIEW_LIMIT);
    if (boards.size === 0) {
      return message('No benchmark scores have been recorded yet.');
    }

    const userIds = new Set<UserId>();
    for (const entries of boards.values()) {
      for (const entry of entries) userIds.add(entry.userId);
    }
    const names = await this.resolveNames(Array.from(userIds));

    const fields: EmbedFieldData[] = [];
    for (const [category, entries] of boards) {
      const lines = this.rankedLines(entries, names);
      if (lines.length > 0) {
        fields.push({ name: category.toUpperCase(), value: lines.join('\n'), inline: false });
      }
    }

    return embed('Overall Benchmark Leaderboards', COLORS.highlight, fields);
  }

  /**
   * Category names containing the typed text, for autocomplete
   */
  categorySuggestions(typed: string): Category[] {
    const needle = typed.toLowerCase();
    return this.query
      .categories()
      .filter(category => category.toLowerCase().includes(needle))
      .slice(0, SUGGESTION_LIMIT);
  }

  private rankedLines(entries: ScoreEntry[], names: Map<UserId, string>): string[] {
    const lines: string[] = [];
    entries.forEach((entry, index) => {
      const name = names.get(entry.userId);
      if (name !== undefined) {
        lines.push(`${index + 1}. ${name}: ${formatScore(entry.score)}`);
      }
    });
    return lines;
  }

  /**
   * Look up display names in parallel. Users that cannot be resolved are
   * absent from the result; one failed lookup never fails the batch.
   */
  private async resolveNames(userIds: UserId[]): Promise<Map<UserId, string>> {
    const resolved = await Promise.all(
      userIds.map(async (userId) => [userId, await this.lookup(userId)] as const)
    );

    const names = new Map<UserId, string>();
    for (const [userId, name] of resolved) {
      if (name !== null) {
        names.set(userId, name);
      }
    }
    return names;
  }

  private async lookup(userId: UserId): Promise<string | null> {
    try {
      const name = await this.users.displayName(userId);
      if (name === null) {
        logger.debug(`Skipping user ${userId}: not found`);
      }
      return name;
    } catch (error) {
      logger.debug(`Skipping user ${userId}: lookup failed`, error);
      return null;
    }
  }
}

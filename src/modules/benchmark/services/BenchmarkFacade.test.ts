import { describe, it, expect, beforeEach } from 'vitest';
import { BenchmarkFacade } from './BenchmarkFacade.js';
import { ScoreStore } from './ScoreStore.js';
import { LeaderboardQuery } from './LeaderboardQuery.js';
import type { UserDirectory } from './UserDirectory.js';
import type { ScoreDocument, UserId } from '../types.js';
import { COLORS } from '../../../shared/utils/embed.js';

class FakeUserDirectory implements UserDirectory {
  constructor(
    private readonly names: Record<UserId, string>,
    private readonly failing: UserId[] = []
  ) {}

  async displayName(userId: UserId): Promise<string | null> {
    if (this.failing.includes(userId)) {
      throw new Error('rate limited');
    }
    return this.names[userId] ?? null;
  }
}

async function createFacade(
  document: ScoreDocument = {},
  directory: UserDirectory = new FakeUserDirectory({ '1': 'Alice', '2': 'Bob', '3': 'Cara' })
): Promise<{ facade: BenchmarkFacade; store: ScoreStore }> {
  let stored = document;
  const store = await ScoreStore.load({
    get: async () => stored,
    set: async (next) => {
      stored = next;
    },
  });
  return { facade: new BenchmarkFacade(store, new LeaderboardQuery(store), directory), store };
}

const alice = { id: '1', name: 'Alice' };
const bob = { id: '2', name: 'Bob' };

describe('BenchmarkFacade', () => {
  describe('add', () => {
    let facade: BenchmarkFacade;

    beforeEach(async () => {
      ({ facade } = await createFacade());
    });

    it('reports a new score', async () => {
      expect(await facade.add('1', 'cpu', 100)).toEqual({
        kind: 'message',
        content: 'Added new cpu benchmark score: 100',
      });
    });

    it('reports an improvement', async () => {
      await facade.add('1', 'cpu', 100);
      expect(await facade.add('1', 'cpu', 150.5)).toEqual({
        kind: 'message',
        content: 'New high score for cpu! Updated from 100 to 150.5',
      });
    });

    it('reports a rejected score', async () => {
      await facade.add('1', 'cpu', 150);
      expect(await facade.add('1', 'cpu', 150)).toEqual({
        kind: 'message',
        content: 'Your previous score of 150 for cpu is higher. Score not updated.',
      });
    });
  });

  describe('view', () => {
    it('reports an unknown or empty category', async () => {
      const { facade } = await createFacade({ gpu: {} });

      expect(await facade.view('cpu')).toEqual({
        kind: 'message',
        content: 'No scores found for cpu benchmark.',
      });
      expect(await facade.view('gpu')).toEqual({
        kind: 'message',
        content: 'No scores found for gpu benchmark.',
      });
    });

    it('ranks entries in an embed', async () => {
      const { facade } = await createFacade({ cpu: { '1': 100, '2': 300 } });

      expect(await facade.view('cpu')).toEqual({
        kind: 'embed',
        title: 'CPU Benchmark Leaderboard',
        color: COLORS.primary,
        fields: [
          { name: '1. Bob', value: 'Score: 300', inline: false },
          { name: '2. Alice', value: 'Score: 100', inline: false },
        ],
      });
    });

    it('skips users that cannot be resolved without renumbering', async () => {
      const { facade } = await createFacade(
        { cpu: { '1': 100, '2': 300, '9': 200 } },
        new FakeUserDirectory({ '1': 'Alice' }, ['2'])
      );

      const reply = await facade.view('cpu');

      expect(reply.kind === 'embed' && reply.fields).toEqual([
        { name: '3. Alice', value: 'Score: 100', inline: false },
      ]);
    });

    it('shows at most ten entries', async () => {
      const users: Record<string, number> = {};
      const names: Record<string, string> = {};
      for (let i = 1; i <= 12; i++) {
        users[String(i)] = i;
        names[String(i)] = `User ${i}`;
      }
      const { facade } = await createFacade({ cpu: users }, new FakeUserDirectory(names));

      const reply = await facade.view('cpu');

      expect(reply.kind === 'embed' && reply.fields.length).toBe(10);
      expect(reply.kind === 'embed' && reply.fields[9]).toEqual({
        name: '10. User 3',
        value: 'Score: 3',
        inline: false,
      });
    });
  });

  describe('types', () => {
    it('reports when there are no categories', async () => {
      const { facade } = await createFacade();
      expect(facade.types()).toEqual({
        kind: 'message',
        content: 'No benchmark types have been created yet.',
      });
    });

    it('lists categories alphabetically, including empty ones', async () => {
      const { facade } = await createFacade({ gpu: { '1': 1 }, cpu: {} });
      expect(facade.types()).toEqual({
        kind: 'message',
        content: 'Available benchmark types:\ncpu\ngpu',
      });
    });
  });

  describe('delete', () => {
    it('reports an unknown category', async () => {
      const { facade } = await createFacade();

      expect(await facade.delete('cpu')).toEqual({
        kind: 'message',
        content: 'No leaderboard found for cpu',
      });
      expect(await facade.delete('cpu', bob)).toEqual({
        kind: 'message',
        content: 'No leaderboard found for cpu',
      });
    });

    it('deletes one user\'s score', async () => {
      const { facade, store } = await createFacade({ cpu: { '1': 100, '2': 300 } });

      expect(await facade.delete('cpu', bob)).toEqual({
        kind: 'message',
        content: 'Deleted Bob\'s score for cpu benchmark',
      });
      expect(store.get('cpu', '2')).toBeNull();
      expect(store.get('cpu', '1')).toBe(100);
    });

    it('reports a user without a score', async () => {
      const { facade } = await createFacade({ cpu: { '1': 100 } });

      expect(await facade.delete('cpu', bob)).toEqual({
        kind: 'message',
        content: 'Bob has no score for cpu benchmark',
      });
    });

    it('deletes a whole category', async () => {
      const { facade, store } = await createFacade({ cpu: { '1': 100 } });

      expect(await facade.delete('cpu')).toEqual({
        kind: 'message',
        content: 'Deleted entire cpu benchmark leaderboard',
      });
      expect(store.has('cpu')).toBe(false);
    });
  });

  describe('history', () => {
    it('defaults to the requesting user', async () => {
      const { facade } = await createFacade({ cpu: { '1': 100 }, gpu: { '2': 5, '1': 7 } });

      expect(await facade.history(alice)).toEqual({
        kind: 'embed',
        title: 'Historical Benchmark Scores for Alice',
        color: COLORS.success,
        fields: [
          { name: 'CPU', value: 'Score: 100', inline: false },
          { name: 'GPU', value: 'Score: 7', inline: false },
        ],
      });
    });

    it('reports a target without scores', async () => {
      const { facade } = await createFacade({ cpu: { '1': 100 } });

      expect(await facade.history(alice, bob)).toEqual({
        kind: 'message',
        content: 'No historical scores found for Bob.',
      });
    });
  });

  describe('overview', () => {
    it('reports when nothing has been recorded', async () => {
      const { facade } = await createFacade({ cpu: {} });

      expect(await facade.overview()).toEqual({
        kind: 'message',
        content: 'No benchmark scores have been recorded yet.',
      });
    });

    it('shows the top three of each category', async () => {
      const { facade } = await createFacade({
        cpu: { '1': 100, '2': 300, '3': 200, '4': 50 },
        gpu: { '2': 9 },
        disk: {},
      });

      expect(await facade.overview()).toEqual({
        kind: 'embed',
        title: 'Overall Benchmark Leaderboards',
        color: COLORS.highlight,
        fields: [
          { name: 'CPU', value: '1. Bob: 300\n2. Cara: 200\n3. Alice: 100', inline: false },
          { name: 'GPU', value: '1. Bob: 9', inline: false },
        ],
      });
    });

    it('drops categories whose users all fail to resolve', async () => {
      const { facade } = await createFacade(
        { cpu: { '1': 100 }, gpu: { '2': 9 } },
        new FakeUserDirectory({ '1': 'Alice' }, ['2'])
      );

      const reply = await facade.overview();

      expect(reply.kind === 'embed' && reply.fields).toEqual([
        { name: 'CPU', value: '1. Alice: 100', inline: false },
      ]);
    });
  });

  describe('categorySuggestions', () => {
    it('matches case-insensitively and sorts', async () => {
      const { facade } = await createFacade({ GPU: {}, cpu: {}, 'gpu-ray': {} });

      expect(facade.categorySuggestions('gp')).toEqual(['GPU', 'gpu-ray']);
      expect(facade.categorySuggestions('')).toEqual(['GPU', 'cpu', 'gpu-ray']);
    });
  });
});

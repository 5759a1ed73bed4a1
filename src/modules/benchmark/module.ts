import { BaseModule, type ModuleMetadata, type ModuleContext } from '../../types/module.types.js';
import { command as benchmarkCommand, setBenchmarkFacade } from './commands/benchmark.js';
import { ScoreStore } from './services/ScoreStore.js';
import { LeaderboardQuery } from './services/LeaderboardQuery.js';
import { BenchmarkFacade } from './services/BenchmarkFacade.js';
import { DiscordUserDirectory } from './services/UserDirectory.js';
import { scoreDocumentSchema } from './types.js';
import { Logger } from '../../shared/utils/logger.js';

const logger = new Logger('Benchmark');

/** Storage key of the persisted score document */
export const LEADERBOARDS_KEY = 'leaderboards';

/**
 * Benchmark Module - per-user best scores by category
 *
 * Provides:
 * - /benchmark add, view, types, history, leaderboard
 * - /benchmark delete (bot owners and administrators)
 *
 * Scores live in one document in the module's storage scope, loaded
 * on load and rewritten after every change.
 */
export class BenchmarkModule extends BaseModule {
  readonly metadata: ModuleMetadata = {
    id: 'benchmark',
    name: 'Benchmark Leaderboard',
    description: 'Tracks benchmark scores and shows leaderboards',
    version: '1.0.0',
    priority: 50,
  };

  constructor() {
    super();
    this.commands = [benchmarkCommand];
  }

  async onLoad(context: ModuleContext): Promise<void> {
    await super.onLoad(context);

    const persisted = this.storage.value(LEADERBOARDS_KEY, scoreDocumentSchema, {});
    const store = await ScoreStore.load(persisted);

    const facade = new BenchmarkFacade(
      store,
      new LeaderboardQuery(store),
      new DiscordUserDirectory(this.client)
    );
    setBenchmarkFacade(facade);

    logger.info(`Benchmark module loaded (${store.categories().length} categories)`);
  }

  async onUnload(): Promise<void> {
    setBenchmarkFacade(null);
    await super.onUnload();

    logger.info('Benchmark module unloaded');
  }
}

import {
  Client,
  type ClientOptions,
  GatewayIntentBits,
  Events,
} from 'discord.js';
import { fileURLToPath } from 'url';
import { DatabaseService } from '../database/mysql.js';
import { MigrationRunner } from '../database/MigrationRunner.js';
import { ModuleManager } from '../modules/ModuleManager.js';
import { CommandManager } from '../commands/CommandManager.js';
import type { StorageBackend } from '../storage/ModuleStorage.js';
import { MySQLStorageBackend } from '../storage/MySQLStorageBackend.js';
import { MemoryStorageBackend } from '../storage/MemoryStorageBackend.js';
import { modules } from '../../modules/index.js';
import { env, isDevelopment } from '../../config/environment.js';
import { Logger } from '../../shared/utils/logger.js';

const logger = new Logger('Client');

/** Core migrations, shared by src/ and dist/ builds */
const CORE_MIGRATIONS_PATH = fileURLToPath(new URL('../../../database/migrations/', import.meta.url));

/**
 * Slash commands only need guild events
 */
const DEFAULT_CLIENT_OPTIONS: ClientOptions = {
  intents: [GatewayIntentBits.Guilds],
};

/**
 * Extended Discord.js Client with integrated managers.
 */
export class ExtendedClient extends Client {
  /** Module manager instance */
  public readonly modules: ModuleManager;

  /** Command manager instance */
  public readonly commands: CommandManager;

  /** Open database, when STORAGE_DRIVER is mysql */
  private database: DatabaseService | null = null;

  /** Whether initial startup is complete (later module loads deploy immediately) */
  private _startupComplete: boolean = false;

  constructor(options?: Partial<ClientOptions>) {
    super({ ...DEFAULT_CLIENT_OPTIONS, ...options });

    this.modules = new ModuleManager({ client: this, modules });
    this.commands = new CommandManager();

    this.wireManagers();
    this.setupCoreEvents();
  }

  /**
   * Wire up manager callbacks
   */
  private wireManagers(): void {
    this.modules.setCommandsChangedCallback(async (module, action) => {
      // During startup all commands are deployed at once on ready
      const shouldDeploy = this._startupComplete;

      if (action === 'register') {
        await this.commands.registerModuleCommands(module, shouldDeploy);
      } else {
        await this.commands.unregisterModuleCommands(module.metadata.id, shouldDeploy);
      }
    });
  }

  /**
   * Set up core Discord event handlers
   */
  private setupCoreEvents(): void {
    this.once(Events.ClientReady, async () => {
      logger.info(`Logged in as ${this.user?.tag}`);
      logger.info(`Serving ${this.guilds.cache.size} guild(s)`);

      try {
        await this.commands.deployCommands();
        this._startupComplete = true;
      } catch (error) {
        logger.error('Failed to deploy commands:', error);
      }
    });

    this.on(Events.InteractionCreate, async (interaction) => {
      try {
        await this.commands.handleInteraction(interaction);
      } catch (error) {
        logger.error('Failed to handle interaction:', error);
      }
    });

    this.on(Events.Error, (error) => {
      logger.error('Client error:', error);
    });

    this.on(Events.Warn, (message) => {
      logger.warn('Client warning:', message);
    });

    if (isDevelopment) {
      this.on(Events.Debug, (message) => {
        if (message.includes('Heartbeat')) return;
        logger.debug(message);
      });
    }
  }

  /**
   * Open the configured storage backend
   */
  private async openStorage(): Promise<StorageBackend> {
    if (env.STORAGE_DRIVER === 'memory') {
      logger.warn('Using in-memory storage, scores will not survive a restart');
      return new MemoryStorageBackend();
    }

    if (!env.DATABASE_URL) {
      throw new Error('DATABASE_URL is required when STORAGE_DRIVER is mysql');
    }

    logger.info('Connecting to database...');
    const database = new DatabaseService(env.DATABASE_URL);
    if (!(await database.testConnection())) {
      await database.close();
      throw new Error('Failed to connect to MySQL database');
    }
    this.database = database;

    const ran = await new MigrationRunner(database).runMigrations('core', CORE_MIGRATIONS_PATH);
    logger.info(`Database connected (${ran} migration(s) applied)`);

    return new MySQLStorageBackend(database);
  }

  /**
   * Initialize the bot - open storage and load modules
   */
  async initialize(): Promise<void> {
    logger.info('Initializing bot...');

    const storage = await this.openStorage();
    await this.modules.initialize(storage);

    logger.info('Bot initialized');
  }

  /**
   * Start the bot - login to Discord
   */
  async start(): Promise<void> {
    logger.info('Starting bot...');

    await this.initialize();
    await this.login(env.BOT_TOKEN);
  }

  /**
   * Shutdown the bot gracefully
   */
  async shutdown(): Promise<void> {
    logger.info('Shutting down bot...');

    await this.modules.shutdown();

    if (this.database) {
      await this.database.close();
      this.database = null;
    }

    await this.destroy();

    logger.info('Bot shut down');
  }
}

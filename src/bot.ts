import { ExtendedClient } from './core/client/ExtendedClient.js';
import { Logger } from './shared/utils/logger.js';

const logger = new Logger('Bot');

/**
 * Global client instance
 */
let client: ExtendedClient | null = null;

/**
 * Start the bot
 */
export async function startBot(): Promise<ExtendedClient> {
  if (client) {
    logger.warn('Bot is already running');
    return client;
  }

  logger.info('Creating bot client...');
  client = new ExtendedClient();

  // Handle process signals for graceful shutdown
  setupShutdownHandlers();

  try {
    await client.start();
  } catch (error) {
    await client.shutdown();
    client = null;
    throw error;
  }

  return client;
}

/**
 * Stop the bot
 */
export async function stopBot(): Promise<void> {
  if (!client) {
    logger.warn('Bot is not running');
    return;
  }

  await client.shutdown();
  client = null;
}

/**
 * Set up graceful shutdown handlers
 */
function setupShutdownHandlers(): void {
  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down...`);

    try {
      await stopBot();
      process.exit(0);
    } catch (error) {
      logger.error('Error during shutdown:', error);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception:', error);
    void shutdown('uncaughtException');
  });

  // Logged only; the process keeps running
  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection:', reason);
  });
}

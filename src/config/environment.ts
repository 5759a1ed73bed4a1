import { z } from 'zod';
import dotenv from 'dotenv';

// Load environment variables from .env file
dotenv.config();

/**
 * Environment variable schema with validation
 */
export const envSchema = z
  .object({
    // Discord
    BOT_TOKEN: z.string().min(1, 'BOT_TOKEN is required'),
    CLIENT_ID: z.string().min(1, 'CLIENT_ID is required'),
    DEV_GUILD_ID: z.string().optional(),
    BOT_OWNER_IDS: z.string().optional(), // Comma-separated list of owner user IDs

    // Environment
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    // Storage
    STORAGE_DRIVER: z.enum(['mysql', 'memory']).default('mysql'),
    DATABASE_URL: z.string().url('DATABASE_URL must be a valid URL').optional(),

    // Logging
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  })
  .superRefine((value, ctx) => {
    if (value.STORAGE_DRIVER === 'mysql' && !value.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'DATABASE_URL is required when STORAGE_DRIVER is mysql',
      });
    }
  });

/**
 * Validated environment type
 */
export type Environment = z.infer<typeof envSchema>;

/**
 * Parse and validate environment variables
 */
function parseEnvironment(): Environment {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    console.error('Environment validation failed:');
    for (const error of result.error.errors) {
      console.error(`  - ${error.path.join('.')}: ${error.message}`);
    }
    process.exit(1);
  }

  return result.data;
}

/**
 * Validated environment variables
 */
export const env: Environment = parseEnvironment();

export const isDevelopment = env.NODE_ENV === 'development';

/**
 * Split a comma-separated id list, dropping blanks
 */
export function parseIdList(raw: string | undefined): string[] {
  return raw
    ? raw.split(',').map(id => id.trim()).filter(id => id.length > 0)
    : [];
}

/**
 * Bot owner IDs from BOT_OWNER_IDS
 */
export const botOwnerIds: string[] = parseIdList(env.BOT_OWNER_IDS);

/**
 * Check if a user ID is a bot owner
 */
export function isBotOwner(userId: string): boolean {
  return botOwnerIds.includes(userId);
}

/**
 * Parse MySQL connection URL into components
 */
export function parseDatabaseUrl(url: string): {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
} {
  const parsed = new URL(url);
  return {
    host: parsed.hostname,
    port: parseInt(parsed.port || '3306', 10),
    user: decodeURIComponent(parsed.username),
    password: decodeURIComponent(parsed.password),
    database: parsed.pathname.slice(1), // Remove leading slash
  };
}

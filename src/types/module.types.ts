import type { Client } from 'discord.js';
import type { ModuleCommand } from './command.types.js';
import type { ModuleStorage } from '../core/storage/ModuleStorage.js';

/**
 * Module metadata describing the module
 */
export interface ModuleMetadata {
  /** Unique identifier for the module (e.g., "benchmark"); also its storage scope */
  id: string;

  /** Display name for the module */
  name: string;

  /** Module description */
  description: string;

  /** Semantic version (e.g., "1.0.0") */
  version: string;

  /** Priority for loading order (higher = earlier, default = 50) */
  priority: number;
}

/**
 * Context passed to modules when they load
 */
export interface ModuleContext {
  /** Discord.js client */
  client: Client;

  /** Key-value storage scoped to the module's id */
  storage: ModuleStorage;
}

/**
 * Module lifecycle hooks
 */
export interface ModuleLifecycle {
  /**
   * Called when the module is loaded, before its commands are registered.
   * Use this to read persisted state and build services.
   */
  onLoad?(context: ModuleContext): Promise<void>;

  /**
   * Called when the module is unloaded (bot shutdown)
   */
  onUnload?(): Promise<void>;
}

/**
 * Main module interface that all modules must implement
 */
export interface BotModule extends ModuleLifecycle {
  readonly metadata: ModuleMetadata;

  /** Commands provided by this module */
  readonly commands: ModuleCommand[];
}

/**
 * Abstract base class for modules.
 * Provides default implementations and common functionality.
 */
export abstract class BaseModule implements BotModule {
  abstract readonly metadata: ModuleMetadata;

  /** Module context - set during onLoad */
  protected context: ModuleContext | null = null;

  /** Shorthand access to client */
  protected get client(): Client {
    if (!this.context) {
      throw new Error('Module not loaded - context not available');
    }
    return this.context.client;
  }

  /** Shorthand access to the module's storage scope */
  protected get storage(): ModuleStorage {
    if (!this.context) {
      throw new Error('Module not loaded - context not available');
    }
    return this.context.storage;
  }

  commands: ModuleCommand[] = [];

  async onLoad(context: ModuleContext): Promise<void> {
    this.context = context;
  }

  async onUnload(): Promise<void> {
    this.context = null;
  }
}

export type { ModuleCommand } from './command.types.js';

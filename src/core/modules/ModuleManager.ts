import type { Client } from 'discord.js';
import type { BotModule, ModuleContext } from '../../types/module.types.js';
import { ModuleStorage, type StorageBackend } from '../storage/ModuleStorage.js';
import { Logger } from '../../shared/utils/logger.js';

const logger = new Logger('ModuleManager');

/**
 * Options for module manager initialization
 */
export interface ModuleManagerOptions {
  client: Client;
  modules: BotModule[];
}

/**
 * Central manager for module lifecycle: load in priority order, hand each
 * module its context, and unload in reverse order on shutdown.
 */
export class ModuleManager {
  private client: Client;
  private available: BotModule[];

  /** Currently loaded modules, in load order */
  private loadedModules: Map<string, BotModule> = new Map();

  /** Callback for when a module's commands need to be registered/unregistered */
  private onCommandsChanged?: (module: BotModule, action: 'register' | 'unregister') => Promise<void>;

  constructor(options: ModuleManagerOptions) {
    this.client = options.client;
    this.available = options.modules;
  }

  /**
   * Set callback for command changes (wired to CommandManager)
   */
  setCommandsChangedCallback(
    callback: (module: BotModule, action: 'register' | 'unregister') => Promise<void>
  ): void {
    this.onCommandsChanged = callback;
  }

  /**
   * Load all modules, highest priority first.
   * A module that fails to load is logged and skipped.
   */
  async initialize(storageBackend: StorageBackend): Promise<void> {
    logger.info('Initializing module system...');

    if (this.available.length === 0) {
      logger.warn('No modules registered');
      return;
    }

    const loadOrder = [...this.available].sort(
      (a, b) => b.metadata.priority - a.metadata.priority
    );

    for (const module of loadOrder) {
      try {
        await this.loadModule(module, storageBackend);
      } catch (error) {
        logger.error(`Failed to load module ${module.metadata.id}:`, error);
      }
    }

    logger.info(`Module system initialized. ${this.loadedModules.size} module(s) loaded.`);
  }

  /**
   * Load a specific module
   */
  async loadModule(module: BotModule, storageBackend: StorageBackend): Promise<void> {
    const moduleId = module.metadata.id;

    if (this.loadedModules.has(moduleId)) {
      logger.warn(`Module ${moduleId} is already loaded`);
      return;
    }

    const context: ModuleContext = {
      client: this.client,
      storage: new ModuleStorage(storageBackend, moduleId),
    };

    await module.onLoad?.(context);

    this.loadedModules.set(moduleId, module);

    await this.onCommandsChanged?.(module, 'register');

    logger.info(`Module ${moduleId} v${module.metadata.version} loaded successfully`);
  }

  /**
   * Unload a specific module
   */
  async unloadModule(moduleId: string): Promise<boolean> {
    const module = this.loadedModules.get(moduleId);
    if (!module) {
      logger.warn(`Module ${moduleId} is not loaded`);
      return false;
    }

    try {
      await this.onCommandsChanged?.(module, 'unregister');
      await module.onUnload?.();
      this.loadedModules.delete(moduleId);

      logger.info(`Module ${moduleId} unloaded successfully`);
      return true;
    } catch (error) {
      logger.error(`Error unloading module ${moduleId}:`, error);
      return false;
    }
  }

  /**
   * Get all loaded module IDs, in load order
   */
  getLoadedModuleIds(): string[] {
    return Array.from(this.loadedModules.keys());
  }

  /**
   * Shutdown all modules (reverse load order)
   */
  async shutdown(): Promise<void> {
    logger.info('Shutting down all modules...');

    for (const moduleId of this.getLoadedModuleIds().reverse()) {
      await this.unloadModule(moduleId);
    }

    logger.info('All modules shut down');
  }
}

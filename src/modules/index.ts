import type { BotModule } from '../types/module.types.js';
import benchmarkModule from './benchmark/index.js';

/**
 * Modules loaded at startup
 */
export const modules: BotModule[] = [benchmarkModule];

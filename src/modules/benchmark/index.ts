/**
 * Benchmark Module - per-user best scores by category, with leaderboards.
 */

import { BenchmarkModule } from './module.js';

export default new BenchmarkModule();
export { BenchmarkModule };

export { loadConfig } from './defaults';
export type { AgedCacheConfig } from './defaults';
export { agedCacheEnvSchema } from './schema';
export type { AgedCacheEnvInput } from './schema';

export { AgedCache } from './cache/aged-cache';
export type { AgedCacheOptions } from './cache/aged-cache';
export { createAgedCache } from './cache/factory';
export { valueEquals, identityEquals } from './cache/key-equality';
export type { KeyEquality } from './cache/key-equality';
export { SystemClock, ManualClock } from './shared/clock';
export type { Clock } from './shared/clock';
export { AgedCacheError } from './shared/errors';
export type { AgedCacheErrorCode, ErrorContext } from './shared/errors';
export { createRootLogger, createLogger } from './shared/logger';
export { loadConfig, agedCacheEnvSchema } from './config';
export type { AgedCacheConfig, AgedCacheEnvInput } from './config';

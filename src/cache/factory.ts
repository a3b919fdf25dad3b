import type { AgedCacheConfig } from '../config/defaults';
import { createLogger } from '../shared/logger';
import { AgedCache, type AgedCacheOptions } from './aged-cache';

/**
 * Build a cache from loaded configuration. Explicit options win over config.
 */
export function createAgedCache<K, V>(
  config: AgedCacheConfig,
  options: AgedCacheOptions<K> = {},
): AgedCache<K, V> {
  const log = options.logger ?? createLogger({ component: 'aged-cache' }, config.log_level);

  return new AgedCache<K, V>({
    ...options,
    sweepOnPut: options.sweepOnPut ?? config.sweep_on_put,
    logger: log,
  });
}

import { agedCacheEnvSchema } from './schema';
import { AgedCacheError } from '../shared/errors';
import logger from '../shared/logger';

export interface AgedCacheConfig {
  log_level: 'debug' | 'info' | 'warn' | 'error';
  sweep_on_put: boolean;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AgedCacheConfig {
  const result = agedCacheEnvSchema.safeParse(env);

  if (!result.success) {
    const invalid = result.error.issues.map((issue) => issue.path.join('.'));
    logger.error({ invalid }, 'Invalid aged-cache environment variables');
    throw new AgedCacheError({
      code: 'INVALID_CONFIG',
      message: `Missing or invalid environment variables: ${invalid.join(', ')}`,
      context: { invalid },
    });
  }

  const parsed = result.data;

  return {
    log_level: parsed.LOG_LEVEL,
    sweep_on_put: parsed.AGED_CACHE_SWEEP_ON_PUT,
  };
}

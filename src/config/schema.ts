import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((raw) => raw === 'true' || raw === '1');

export const agedCacheEnvSchema = z.object({
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  AGED_CACHE_SWEEP_ON_PUT: booleanFlag.default('false'),
});

export type AgedCacheEnvInput = z.input<typeof agedCacheEnvSchema>;

import { describe, it, expect, vi, afterEach } from 'vitest';
import { PassThrough } from 'stream';
import { createRootLogger, createLogger } from '../../src/shared/logger';

async function capture(write: (stream: PassThrough) => void): Promise<string> {
  const stream = new PassThrough();
  const chunks: Buffer[] = [];
  stream.on('data', (chunk: Buffer) => chunks.push(chunk));

  write(stream);

  await new Promise((resolve) => setTimeout(resolve, 50));
  return Buffer.concat(chunks).toString();
}

describe('logger', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.resetModules();
  });

  it('falls back to info when LOG_LEVEL is empty', async () => {
    vi.stubEnv('LOG_LEVEL', '');
    vi.resetModules();

    const { default: rootLogger } = await import('../../src/shared/logger');
    expect(rootLogger.level).toBe('info');
  });

  it('loads the package entry point when LOG_LEVEL is empty', async () => {
    vi.stubEnv('LOG_LEVEL', '');
    vi.resetModules();

    const { AgedCache, ManualClock } = await import('../../src/index');
    const cache = new AgedCache<string, number>({ clock: new ManualClock(0) });
    cache.put('a', 1, 10);
    expect(cache.get('a')).toBe(1);
  });

  it('creates child loggers with context', () => {
    const child = createLogger({ component: 'aged-cache', cacheId: 'sessions' });
    expect(child.bindings()).toEqual(
      expect.objectContaining({ component: 'aged-cache', cacheId: 'sessions' }),
    );
  });

  it('applies a level to child loggers when given', () => {
    expect(createLogger({ component: 'a' }, 'debug').level).toBe('debug');
    expect(createLogger({ component: 'b' }, 'error').level).toBe('error');
  });

  it('outputs structured JSON', async () => {
    const output = await capture((stream) => {
      createRootLogger(stream).info({ action: 'test' }, 'hello world');
    });

    const parsed = JSON.parse(output);
    expect(parsed.level).toBe('info');
    expect(parsed.msg).toBe('hello world');
    expect(parsed.action).toBe('test');
    expect(parsed.name).toBe('aged-cache');
  });

  it('drops messages below the configured level', async () => {
    const output = await capture((stream) => {
      const testLogger = createRootLogger(stream, 'warn');
      testLogger.info('quiet');
      testLogger.warn('loud');
    });

    const lines = output.trim().split('\n');
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0]).msg).toBe('loud');
  });

  it('redacts cached values', async () => {
    const output = await capture((stream) => {
      createRootLogger(stream).info(
        { key: 'session:1', value: 'cached-payload', entry: { value: 'nested-payload' } },
        'redaction test',
      );
    });

    const parsed = JSON.parse(output);
    expect(parsed.key).toBe('session:1');
    expect(parsed.value).toBe('[REDACTED]');
    expect(parsed.entry.value).toBe('[REDACTED]');
  });
});

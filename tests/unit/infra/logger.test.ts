import { describe, expect, it } from 'vitest';

import { createLogger } from '@/infra/logger/index.js';

describe('createLogger', () => {
  it('applies the requested level and name', () => {
    const logger = createLogger({ level: 'warn', name: 'batch', pretty: false });

    expect(logger.level).toBe('warn');
    expect(logger.bindings()).toMatchObject({ name: 'batch' });
  });

  it('creates silent loggers without a transport', () => {
    const logger = createLogger({ level: 'silent', pretty: true });

    expect(logger.level).toBe('silent');
    expect(logger.isLevelEnabled('error')).toBe(false);
  });

  it('defaults to an info logger named after the project', () => {
    const logger = createLogger({ level: 'info' });

    expect(logger.isLevelEnabled('info')).toBe(true);
    expect(logger.bindings()).toMatchObject({ name: 'budget-extractor' });
  });
});

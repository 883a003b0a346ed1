import { describe, expect, it } from 'vitest';

import { createLogger } from '@/infra/logger/index.js';

describe('createLogger', () => {
  it('applies the configured level and name', () => {
    const logger = createLogger({ level: 'warn', name: 'catalog-run', pretty: false });

    expect(logger.level).toBe('warn');
    expect(logger.isLevelEnabled('error')).toBe(true);
    expect(logger.isLevelEnabled('info')).toBe(false);
    expect(logger.bindings()).toMatchObject({ name: 'catalog-run' });
  });

  it('keeps the level on child loggers', () => {
    const logger = createLogger({ level: 'silent', pretty: false });

    const child = logger.child({ metric: 'ev_count' });

    expect(child.level).toBe('silent');
    expect(child.bindings()).toMatchObject({ name: 'electrification-metrics', metric: 'ev_count' });
  });
});

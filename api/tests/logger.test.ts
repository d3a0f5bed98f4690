import { describe, expect, it } from 'vitest';
import { logger } from '../src/utils/index.js';

describe('logger', () => {
  it('tags every line with the api service', () => {
    expect(logger.defaultMeta).toEqual({ service: 'effmap-api' });
  });

  it('logs to a muted console only when no log dir is set under test', () => {
    expect(logger.transports).toHaveLength(1);
    expect(logger.transports[0].silent).toBe(true);
  });
});

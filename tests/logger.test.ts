import { describe, it, expect } from 'vitest';
import { createChildLogger, logger, SERVICE_NAME } from '../src/logger.js';

describe('logger', () => {
  it('tags every line with the service name', () => {
    expect(logger.bindings()).toMatchObject({ service: SERVICE_NAME });
  });

  it('adds the module name on child loggers', () => {
    expect(createChildLogger('price-stream').bindings()).toMatchObject({
      service: 'fx-price-stream',
      module: 'price-stream',
    });
  });
});

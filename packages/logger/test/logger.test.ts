import { describe, expect, it } from 'vitest';
import { createLogger, logger, serializeError } from '../src/index.js';

describe('logger', () => {
  it('creates child loggers carrying their bindings', () => {
    const child = createLogger({ component: 'registry' });

    expect(child.bindings()).toEqual({ component: 'registry' });
    expect(child.level).toBe(logger.level);
  });

  it('serializes errors and thrown non-errors', () => {
    const error = new TypeError('bad input');

    expect(serializeError(error)).toEqual({ name: 'TypeError', message: 'bad input', stack: error.stack });
    expect(serializeError('plain')).toEqual({ name: 'Unknown', message: 'plain' });
  });
});

import { describe, expect, it } from 'vitest';

import { describeError, logger } from './logger';

describe('logger', () => {
  it('carries no metadata its line format would drop', () => {
    expect(logger.defaultMeta).toBeUndefined();
  });
});

describe('describeError', () => {
  it('prefers the message of an Error', () => {
    expect(describeError(new Error('disk full'))).toBe('disk full');
    expect(describeError('plain text')).toBe('plain text');
  });
});

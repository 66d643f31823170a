import { describe, expect, it } from 'vitest';
import { createInteractionError } from './errors';

describe('createInteractionError', () => {
  it('captures the message and stack of thrown errors', () => {
    const record = createInteractionError('stale_pin', new Error('pin gone'), { session: 2 });
    expect(record.type).toBe('stale_pin');
    expect(record.message).toBe('pin gone');
    expect(record.details?.session).toBe(2);
    expect(typeof record.details?.stack).toBe('string');
  });

  it('stringifies non-error values', () => {
    const record = createInteractionError('passthrough', 'pipe closed');
    expect(record.message).toBe('pipe closed');
    expect(record.details).toBeUndefined();
  });
});

import { describe, expect, it } from 'vitest';
import { settlesWithin, withTimeout } from './timeout.js';

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('settlesWithin', () => {
  it('is true for a promise that settles in time, even by rejecting', async () => {
    expect(await settlesWithin(Promise.resolve('ok'), 50)).toBe(true);
    expect(await settlesWithin(Promise.reject(new Error('boom')), 50)).toBe(true);
  });

  it('is false when the promise is still pending at the deadline', async () => {
    expect(await settlesWithin(delay(200), 10)).toBe(false);
  });
});

describe('withTimeout', () => {
  it('mirrors the promise when it settles first', async () => {
    await expect(withTimeout(Promise.resolve(7), 50, () => new Error('late'))).resolves.toBe(7);
  });

  it('rejects with the supplied error after the deadline', async () => {
    await expect(withTimeout(delay(200), 10, () => new Error('send timed out'))).rejects.toThrow('send timed out');
  });
});

import { describe, it, expect } from 'vitest';
import { RequestCancelled } from '../src/types/errors.js';
import { remaining, withDeadline } from '../src/utils/deadline.js';

const later = <T>(ms: number, value: T) => new Promise<T>((resolve) => setTimeout(() => resolve(value), ms));

describe('withDeadline', () => {
  it('resolves with the work when it finishes in time', async () => {
    await expect(withDeadline(Promise.resolve(42), 100, () => new Error('late'))).resolves.toBe(42);
  });

  it('rejects with the timeout error when the deadline passes', async () => {
    await expect(withDeadline(later(100, 1), 10, () => new Error('late'))).rejects.toThrow('late');
  });

  it('passes through the work failure', async () => {
    await expect(withDeadline(Promise.reject(new Error('boom')), 100, () => new Error('late'))).rejects.toThrow('boom');
  });

  it('rejects with RequestCancelled on abort', async () => {
    const controller = new AbortController();
    const pending = withDeadline(later(100, 1), 1_000, () => new Error('late'), controller.signal);
    controller.abort();
    await expect(pending).rejects.toBeInstanceOf(RequestCancelled);

    await expect(withDeadline(later(10, 1), 1_000, () => new Error('late'), controller.signal)).rejects.toBeInstanceOf(
      RequestCancelled
    );
  });
});

describe('remaining', () => {
  it('never goes negative', () => {
    expect(remaining(1_000, 400)).toBe(600);
    expect(remaining(100, 400)).toBe(0);
  });
});

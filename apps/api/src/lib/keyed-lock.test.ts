import { describe, it, expect } from 'vitest';
import { KeyedLock } from './keyed-lock';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('KeyedLock', () => {
  it('runs sections on the same key one at a time, in order', async () => {
    const lock = new KeyedLock();
    const events: string[] = [];

    await Promise.all([
      lock.run('a', async () => {
        events.push('first:start');
        await delay(20);
        events.push('first:end');
      }),
      lock.run('a', async () => {
        events.push('second:start');
        await delay(1);
        events.push('second:end');
      }),
    ]);

    expect(events).toEqual(['first:start', 'first:end', 'second:start', 'second:end']);
  });

  it('lets different keys interleave', async () => {
    const lock = new KeyedLock();
    const events: string[] = [];

    await Promise.all([
      lock.run('a', async () => {
        events.push('a:start');
        await delay(20);
        events.push('a:end');
      }),
      lock.run('b', async () => {
        events.push('b:start');
        await delay(1);
        events.push('b:end');
      }),
    ]);

    expect(events.indexOf('b:end')).toBeLessThan(events.indexOf('a:end'));
  });

  it('returns the section result and propagates its error', async () => {
    const lock = new KeyedLock();

    await expect(lock.run('a', () => 42)).resolves.toBe(42);
    await expect(
      lock.run('a', () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
  });

  it('keeps running queued sections after a failure', async () => {
    const lock = new KeyedLock();
    const failing = lock.run('a', async () => {
      await delay(5);
      throw new Error('boom');
    });
    const next = lock.run('a', () => 'ran');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ran');
  });

  it('forgets keys once their chain drains', async () => {
    const lock = new KeyedLock();
    await lock.run('a', () => undefined);
    await delay(0);

    expect(lock.activeKeys).toBe(0);
  });
});

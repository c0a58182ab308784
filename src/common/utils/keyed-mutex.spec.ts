import { KeyedMutex } from './keyed-mutex';
import { sleep } from './async';

describe('KeyedMutex', () => {
  it('runs tasks for the same key one at a time, in order', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];

    const task = (name: string, ms: number) =>
      mutex.runExclusive('podcast-1', async () => {
        events.push(`${name}:start`);
        await sleep(ms);
        events.push(`${name}:end`);
        return name;
      });

    const results = await Promise.all([task('a', 20), task('b', 1), task('c', 1)]);

    expect(results).toEqual(['a', 'b', 'c']);
    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end']);
  });

  it('lets different keys run concurrently', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];

    await Promise.all([
      mutex.runExclusive('x', async () => {
        events.push('x:start');
        await sleep(20);
        events.push('x:end');
      }),
      mutex.runExclusive('y', async () => {
        events.push('y:start');
        events.push('y:end');
      }),
    ]);

    expect(events.indexOf('y:end')).toBeLessThan(events.indexOf('x:end'));
  });

  it('releases the lock when the task throws', async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.runExclusive('k', async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    expect(mutex.isLocked('k')).toBe(false);
    await expect(mutex.runExclusive('k', async () => 'next')).resolves.toBe('next');
  });
});

import { BoundedPool } from './bounded-pool';
import { sleep } from './async';

describe('BoundedPool', () => {
  it('never runs more than the configured number of tasks at once', async () => {
    const pool = new BoundedPool(2);
    let active = 0;
    let peak = 0;

    for (let i = 0; i < 6; i++) {
      pool.submit(async () => {
        active++;
        peak = Math.max(peak, active);
        await sleep(5);
        active--;
      });
    }

    expect(pool.size).toBe(6);
    await pool.onIdle();
    expect(peak).toBe(2);
    expect(pool.size).toBe(0);
  });

  it('keeps draining after a task fails', async () => {
    const pool = new BoundedPool(1);
    const done: number[] = [];

    pool.submit(async () => {
      throw new Error('boom');
    });
    pool.submit(async () => {
      done.push(2);
    });

    await pool.onIdle();
    expect(done).toEqual([2]);
  });

  it('drops queued tasks on close and lets running ones finish', async () => {
    const pool = new BoundedPool(1);
    const done: number[] = [];

    pool.submit(async () => {
      await sleep(5);
      done.push(1);
    });
    pool.submit(async () => {
      done.push(2);
    });

    expect(pool.close()).toBe(1);
    expect(pool.submit(async () => undefined)).toBe(false);
    await pool.onIdle();
    expect(done).toEqual([1]);
    expect(pool.size).toBe(0);
  });

  it('rejects a concurrency below one', () => {
    expect(() => new BoundedPool(0)).toThrow('Pool concurrency must be at least 1');
  });
});

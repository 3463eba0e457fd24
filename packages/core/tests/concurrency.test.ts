import { describe, expect, it } from 'vitest';
import { KeyedLock } from '../src/utils/keyed-lock.js';
import { Semaphore } from '../src/utils/semaphore.js';

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('KeyedLock', () => {
  it('serializes operations per key and leaves other keys alone', async () => {
    const lock = new KeyedLock();
    const events: string[] = [];
    const gate = deferred();

    const first = lock.run('a', async () => {
      events.push('a1:start');
      await gate.promise;
      events.push('a1:end');
    });
    const second = lock.run('a', async () => {
      events.push('a2');
    });
    const other = lock.run('b', async () => {
      events.push('b1');
    });

    await other;
    expect(events).toEqual(['a1:start', 'b1']);

    gate.resolve();
    await Promise.all([first, second]);
    expect(events).toEqual(['a1:start', 'b1', 'a1:end', 'a2']);
    expect(lock.activeKeys).toBe(0);
  });

  it('does not let a failed operation block the queue', async () => {
    const lock = new KeyedLock();

    await expect(
      lock.run('k', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    await expect(lock.run('k', async () => 42)).resolves.toBe(42);
    expect(lock.activeKeys).toBe(0);
  });
});

describe('Semaphore', () => {
  it('bounds the number of concurrent tasks', async () => {
    const semaphore = new Semaphore(2);
    let active = 0;
    let peak = 0;

    const results = await Promise.all(
      Array.from({ length: 5 }, (_, i) =>
        semaphore.run(async () => {
          active++;
          peak = Math.max(peak, active);
          await new Promise((resolve) => setTimeout(resolve, 5));
          active--;
          return i;
        })
      )
    );

    expect(results).toEqual([0, 1, 2, 3, 4]);
    expect(peak).toBe(2);
    expect(semaphore.inFlight).toBe(0);
    expect(semaphore.queueDepth).toBe(0);
  });

  it('releases the slot when a task fails', async () => {
    const semaphore = new Semaphore(1);
    await expect(
      semaphore.run(async () => {
        throw new Error('nope');
      })
    ).rejects.toThrow('nope');
    await expect(semaphore.run(async () => 'ok')).resolves.toBe('ok');
  });

  it('starts queued tasks in call order', async () => {
    const semaphore = new Semaphore(1);
    const order: number[] = [];
    let open: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      open = resolve;
    });

    const tasks = [1, 2, 3].map((n) =>
      semaphore.run(async () => {
        order.push(n);
        if (n === 1) await gate;
      })
    );

    expect(semaphore.inFlight).toBe(1);
    expect(semaphore.queueDepth).toBe(2);

    open();
    await Promise.all(tasks);

    expect(order).toEqual([1, 2, 3]);
    expect(semaphore.inFlight).toBe(0);
    expect(semaphore.queueDepth).toBe(0);
  });

  it('rejects a non-positive limit', () => {
    expect(() => new Semaphore(0)).toThrow('Semaphore limit must be a positive integer (got 0)');
    expect(() => new Semaphore(1.5)).toThrow('Semaphore limit must be a positive integer (got 1.5)');
  });
});

import { KeyedLock } from '../services/keyedLock';

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('KeyedLock', () => {
  it('runs tasks of the same key one after another', async () => {
    const lock = new KeyedLock();
    const log: string[] = [];
    let releaseFirst: () => void = () => undefined;
    const firstGate = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });

    const first = lock.run('42', async () => {
      log.push('first:start');
      await firstGate;
      log.push('first:end');
    });
    const second = lock.run('42', async () => {
      log.push('second');
    });

    await tick();
    expect(log).toEqual(['first:start']);

    releaseFirst();
    await Promise.all([first, second]);
    expect(log).toEqual(['first:start', 'first:end', 'second']);
    expect(lock.activeKeys).toBe(0);
  });

  it('does not block other keys', async () => {
    const lock = new KeyedLock();
    let releaseSlow: () => void = () => undefined;
    const slowGate = new Promise<void>((resolve) => {
      releaseSlow = resolve;
    });

    const slow = lock.run('1', () => slowGate);
    const fast = await lock.run('2', async () => 'done');

    expect(fast).toBe('done');
    expect(lock.activeKeys).toBe(1);
    releaseSlow();
    await slow;
    expect(lock.activeKeys).toBe(0);
  });

  it('releases the key when a task throws', async () => {
    const lock = new KeyedLock();
    await expect(lock.run('7', async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');

    await expect(lock.run('7', async () => 'next')).resolves.toBe('next');
    expect(lock.activeKeys).toBe(0);
  });
});

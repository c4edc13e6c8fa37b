import { KeyedMutex } from './keyed-mutex';

describe('KeyedMutex', () => {
  const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

  it('should run work for the same key one at a time', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];
    let releaseFirst: () => void = () => undefined;

    const first = mutex.runExclusive('g1', async () => {
      events.push('first:start');
      await new Promise<void>((resolve) => {
        releaseFirst = resolve;
      });
      events.push('first:end');
    });
    const second = mutex.runExclusive('g1', async () => {
      events.push('second:start');
    });

    await tick();
    expect(events).toEqual(['first:start']);

    releaseFirst();
    await Promise.all([first, second]);
    expect(events).toEqual(['first:start', 'first:end', 'second:start']);
  });

  it('should not block other keys', async () => {
    const mutex = new KeyedMutex();
    let releaseFirst: () => void = () => undefined;

    const first = mutex.runExclusive('g1', () => new Promise<void>((resolve) => {
      releaseFirst = resolve;
    }));

    await expect(mutex.runExclusive('g2', async () => 'other')).resolves.toBe('other');

    releaseFirst();
    await first;
  });

  it('should release the key when work fails', async () => {
    const mutex = new KeyedMutex();

    await expect(mutex.runExclusive('g1', async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    await expect(mutex.runExclusive('g1', async () => 'next')).resolves.toBe('next');
  });
});

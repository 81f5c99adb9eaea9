import { createKeyedMutex } from './keyedMutex';

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('createKeyedMutex', () => {
  test('runs tasks for one key one at a time, in order', async () => {
    const mutex = createKeyedMutex();
    const events: string[] = [];
    const gate = deferred();

    const first = mutex.runExclusive('g1', async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
      return 1;
    });
    const second = mutex.runExclusive('g1', async () => {
      events.push('second:start');
      return 2;
    });

    await new Promise((r) => setImmediate(r));
    expect(events).toEqual(['first:start']);
    gate.resolve();

    await expect(Promise.all([first, second])).resolves.toEqual([1, 2]);
    expect(events).toEqual(['first:start', 'first:end', 'second:start']);
    expect(mutex.size()).toBe(0);
  });

  test('different keys do not wait for each other', async () => {
    const mutex = createKeyedMutex();
    const gate = deferred();
    const slow = mutex.runExclusive('g1', async () => {
      await gate.promise;
      return 'slow';
    });

    await expect(mutex.runExclusive('g2', async () => 'fast')).resolves.toBe('fast');
    gate.resolve();
    await expect(slow).resolves.toBe('slow');
  });

  test('a failing task releases the key', async () => {
    const mutex = createKeyedMutex();
    await expect(
      mutex.runExclusive('g1', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    await expect(mutex.runExclusive('g1', async () => 'next')).resolves.toBe('next');
    expect(mutex.size()).toBe(0);
  });
});

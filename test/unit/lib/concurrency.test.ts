import { mapWithConcurrency, withTimeout } from '@/lib/concurrency';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('mapWithConcurrency', () => {
  test('should keep input order', async () => {
    const delays = [30, 10, 20];
    const results = await mapWithConcurrency(delays, 3, async (ms, index) => {
      await new Promise((resolve) => setTimeout(resolve, ms));
      return `${index}:${ms}`;
    });

    expect(results).toEqual(['0:30', '1:10', '2:20']);
  });

  test('should never exceed the limit', async () => {
    let active = 0;
    let peak = 0;

    await mapWithConcurrency([1, 2, 3, 4, 5, 6], 2, async () => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 5));
      active--;
    });

    expect(peak).toBe(2);
  });

  test('should treat a non-positive limit as one worker', async () => {
    const gate = deferred();
    const started: number[] = [];

    const run = mapWithConcurrency([1, 2], 0, async (item) => {
      started.push(item);
      await gate.promise;
      return item;
    });
    await Promise.resolve();

    expect(started).toEqual([1]);
    gate.resolve();
    expect(await run).toEqual([1, 2]);
  });

  test('should handle an empty list', async () => {
    expect(await mapWithConcurrency([], 4, async (item: number) => item)).toEqual([]);
  });
});

describe('withTimeout', () => {
  test('should pass through a value that arrives in time', async () => {
    expect(await withTimeout(Promise.resolve('ok'), 50, 'too slow')).toBe('ok');
  });

  test('should reject with the given message when too slow', async () => {
    const never = new Promise<string>(() => undefined);
    await expect(withTimeout(never, 10, 'too slow')).rejects.toThrow('too slow');
  });
});

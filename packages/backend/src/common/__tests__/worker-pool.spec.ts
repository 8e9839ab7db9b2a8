import { runPool, TimeoutError, withTimeout } from '../utils/worker-pool';
import { sleep } from '../utils/text';

describe('runPool', () => {
  it('keeps result order while running at most `concurrency` workers', async () => {
    let inFlight = 0;
    let maxInFlight = 0;

    const results = await runPool([5, 1, 4, 2, 3, 1, 2, 5, 1, 3], 3, async (delay, index) => {
      inFlight++;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await sleep(delay);
      inFlight--;
      return index * 10;
    });

    expect(results).toEqual([0, 10, 20, 30, 40, 50, 60, 70, 80, 90]);
    expect(maxInFlight).toBe(3);
  });

  it('starts no more workers than there are items', async () => {
    const started: number[] = [];
    await runPool([1, 2], 10, async item => {
      started.push(item);
    });
    expect(started).toEqual([1, 2]);
  });

  it('returns an empty list for no items', async () => {
    await expect(runPool([], 4, async () => 1)).resolves.toEqual([]);
  });
});

describe('withTimeout', () => {
  it('resolves with the task value when it finishes first', async () => {
    await expect(withTimeout(Promise.resolve('done'), 50)).resolves.toBe('done');
  });

  it('rejects with a TimeoutError when the task never settles', async () => {
    const pending = withTimeout(new Promise<string>(() => undefined), 10);
    await expect(pending).rejects.toBeInstanceOf(TimeoutError);
    await expect(pending).rejects.toThrow('timed out after 10ms');
  });

  it('passes task rejections through', async () => {
    await expect(withTimeout(Promise.reject(new Error('boom')), 50)).rejects.toThrow('boom');
  });
});

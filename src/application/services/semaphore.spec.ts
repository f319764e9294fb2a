import { mapWithConcurrency, Semaphore } from './semaphore';

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('Semaphore', () => {
  it('should reject non-positive permit counts', () => {
    expect(() => new Semaphore(0)).toThrow('Semaphore permits must be a positive integer');
  });

  it('should hand a released permit to the oldest waiter', async () => {
    const semaphore = new Semaphore(1);
    const order: string[] = [];
    await semaphore.acquire();

    const first = semaphore.acquire().then(() => order.push('first'));
    const second = semaphore.acquire().then(() => order.push('second'));
    semaphore.release();
    await first;
    semaphore.release();
    await second;

    expect(order).toEqual(['first', 'second']);
    expect(semaphore.available()).toBe(0);
  });
});

describe('mapWithConcurrency', () => {
  it('should never exceed the limit and keep input order', async () => {
    let running = 0;
    let peak = 0;
    const results = await mapWithConcurrency([30, 10, 20, 0, 5], 2, async (value) => {
      running++;
      peak = Math.max(peak, running);
      await new Promise((resolve) => setTimeout(resolve, value));
      running--;
      return value * 2;
    });

    expect(results).toEqual([60, 20, 40, 0, 10]);
    expect(peak).toBe(2);
  });

  it('should stop starting new work after a failure', async () => {
    const started: number[] = [];
    const failure = new Error('backend down');

    const outcome = mapWithConcurrency([1, 2, 3, 4], 1, async (value) => {
      started.push(value);
      await tick();
      if (value === 2) throw failure;
      return value;
    });

    await expect(outcome).rejects.toBe(failure);
    expect(started).toEqual([1, 2]);
  });

  it('should reject as soon as one call fails', async () => {
    const failure = new Error('backend down');
    const slowState = { settled: false };
    const slow = new Promise<number>((resolve) =>
      setTimeout(() => {
        slowState.settled = true;
        resolve(1);
      }, 50)
    );

    const outcome = mapWithConcurrency([0, 1], 2, async (value) => {
      if (value === 0) throw failure;
      return slow;
    });

    await expect(outcome).rejects.toBe(failure);
    expect(slowState.settled).toBe(false);
    await slow;
  });
});

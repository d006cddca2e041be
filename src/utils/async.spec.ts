import { AbortedError, TimeoutError, runWithConcurrency, withTimeout } from './async';

describe('runWithConcurrency', () => {
  it('never exceeds the limit and keeps input order', async () => {
    let active = 0;
    let peak = 0;
    const results = await runWithConcurrency([30, 10, 20, 5, 15], 2, async (ms, index) => {
      active++;
      peak = Math.max(peak, active);
      await new Promise(resolve => setTimeout(resolve, ms));
      active--;
      return index * 10;
    });
    expect(results).toEqual([0, 10, 20, 30, 40]);
    expect(peak).toBe(2);
  });

  it('returns an empty list for no items', async () => {
    await expect(runWithConcurrency([], 3, async () => 1)).resolves.toEqual([]);
  });
});

describe('withTimeout', () => {
  it('resolves with the task result', async () => {
    await expect(withTimeout(async () => 'ok', 100)).resolves.toBe('ok');
  });

  it('rejects with TimeoutError and aborts the task signal', async () => {
    let taskSignal: AbortSignal | undefined;
    const pending = withTimeout(
      signal => {
        taskSignal = signal;
        return new Promise<string>(() => undefined);
      },
      10,
      { context: 'slow call' },
    );
    await expect(pending).rejects.toBeInstanceOf(TimeoutError);
    expect(taskSignal?.aborted).toBe(true);
  });

  it('rejects with AbortedError when the parent signal fires', async () => {
    const parent = new AbortController();
    const pending = withTimeout(() => new Promise<string>(() => undefined), 1000, { parent: parent.signal });
    parent.abort();
    await expect(pending).rejects.toBeInstanceOf(AbortedError);
  });

  it('refuses to start when the parent is already aborted', async () => {
    const parent = new AbortController();
    parent.abort();
    const task = jest.fn(async () => 'never');
    await expect(withTimeout(task, 100, { parent: parent.signal })).rejects.toBeInstanceOf(AbortedError);
    expect(task).not.toHaveBeenCalled();
  });
});

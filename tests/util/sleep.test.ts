import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { sleep } from '../../src/util/sleep';

describe('sleep', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves after the given delay', async() => {
    let done = false;
    const pending = sleep(1_000).then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(999);
    expect(done).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(done).toBe(true);
  });

  it('resolves early when the signal aborts', async() => {
    const controller = new AbortController();
    let done = false;
    const pending = sleep(60_000, controller.signal).then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(10);
    controller.abort();
    await pending;
    expect(done).toBe(true);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('resolves immediately for an already aborted signal', async() => {
    const controller = new AbortController();
    controller.abort();
    await sleep(60_000, controller.signal);
    expect(vi.getTimerCount()).toBe(0);
  });
});

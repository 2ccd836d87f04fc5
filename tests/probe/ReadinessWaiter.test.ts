import { afterEach, describe, it, expect, vi } from 'vitest';
import type { Mock } from 'vitest';
import type { HealthProbe } from '../../src/probe/HealthProbe';
import { ReadinessWaiter } from '../../src/probe/ReadinessWaiter';
import type { HttpProbeTarget, ProbeResult } from '../../src/probe/types';

const target: HttpProbeTarget = {
  kind: 'http',
  url: 'http://localhost:5000/health',
  expect: { statusMin: 200, statusMax: 299 },
  timeoutMs: 2_000,
};

type CheckMock = Mock<Parameters<HealthProbe['check']>, ReturnType<HealthProbe['check']>>;

function scriptedProbe(...results: ProbeResult[]): HealthProbe & { check: CheckMock } {
  const check: CheckMock = vi.fn<Parameters<HealthProbe['check']>, ReturnType<HealthProbe['check']>>();
  for (const result of results) {
    check.mockResolvedValueOnce(result);
  }
  check.mockResolvedValue('not-ready');
  return { check };
}

/** Waiter on a virtual clock: sleeping advances `now` instantly. */
function virtualWaiter(probe: HealthProbe, onSleep?: (ms: number) => void): {
  waiter: ReadinessWaiter;
  sleep: Mock<[number], Promise<void>>;
} {
  let clock = 0;
  const sleep = vi.fn<[number], Promise<void>>(async(ms) => {
    clock += ms;
    onSleep?.(ms);
  });
  const waiter = new ReadinessWaiter({ probe, sleep, now: () => clock });
  return { waiter, sleep };
}

describe('ReadinessWaiter', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('probes immediately and does not sleep when the first probe succeeds', async() => {
    const probe = scriptedProbe('ready');
    const { waiter, sleep } = virtualWaiter(probe);

    const result = await waiter.waitUntilReady(target, { intervalMs: 2_000 });

    expect(result).toEqual({ outcome: 'ready', attempts: 1, elapsedMs: 0 });
    expect(probe.check).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('stops probing at the first ready result', async() => {
    const probe = scriptedProbe('not-ready', 'not-ready', 'not-ready', 'ready', 'ready');
    const { waiter, sleep } = virtualWaiter(probe);

    const result = await waiter.waitUntilReady(target, { intervalMs: 500 });

    expect(result).toEqual({ outcome: 'ready', attempts: 4, elapsedMs: 1_500 });
    expect(probe.check).toHaveBeenCalledTimes(4);
    expect(sleep).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledWith(500, undefined);
  });

  it('performs exactly maxAttempts probes before timing out', async() => {
    const probe = scriptedProbe();
    const { waiter, sleep } = virtualWaiter(probe);

    const result = await waiter.waitUntilReady(target, { intervalMs: 2_000, maxAttempts: 5 });

    expect(result).toEqual({ outcome: 'timed-out', attempts: 5, elapsedMs: 8_000 });
    expect(probe.check).toHaveBeenCalledTimes(5);
    expect(sleep).toHaveBeenCalledTimes(4);
  });

  it('does not start an attempt that would begin after the deadline', async() => {
    const probe = scriptedProbe();
    const { waiter } = virtualWaiter(probe);

    const result = await waiter.waitUntilReady(target, { intervalMs: 1_000, deadlineMs: 2_500 });

    expect(result).toEqual({ outcome: 'timed-out', attempts: 3, elapsedMs: 2_000 });
    expect(probe.check).toHaveBeenCalledTimes(3);
  });

  it('treats a probe that throws as not ready', async() => {
    const check = vi.fn()
      .mockRejectedValueOnce(new Error('boom'))
      .mockResolvedValueOnce('ready');
    const { waiter } = virtualWaiter({ check });

    const result = await waiter.waitUntilReady(target, { intervalMs: 100 });

    expect(result).toEqual({ outcome: 'ready', attempts: 2, elapsedMs: 100 });
  });

  it('reports every attempt to onAttempt', async() => {
    const probe = scriptedProbe('not-ready', 'ready');
    const onAttempt = vi.fn();
    const waiter = new ReadinessWaiter({ probe, sleep: async() => undefined, onAttempt });

    await waiter.waitUntilReady(target, { intervalMs: 10 });

    expect(onAttempt.mock.calls).toEqual([[ 1, 'not-ready' ], [ 2, 'ready' ]]);
  });

  it('returns cancelled without probing when the signal is already aborted', async() => {
    const probe = scriptedProbe('ready');
    const { waiter } = virtualWaiter(probe);
    const controller = new AbortController();
    controller.abort();

    const result = await waiter.waitUntilReady(target, { intervalMs: 10 }, controller.signal);

    expect(result).toEqual({ outcome: 'cancelled', attempts: 0, elapsedMs: 0 });
    expect(probe.check).not.toHaveBeenCalled();
  });

  it('returns cancelled when aborted during the interval', async() => {
    const probe = scriptedProbe();
    const controller = new AbortController();
    const { waiter } = virtualWaiter(probe, () => controller.abort());

    const result = await waiter.waitUntilReady(target, { intervalMs: 2_000 }, controller.signal);

    expect(result).toEqual({ outcome: 'cancelled', attempts: 1, elapsedMs: 2_000 });
    expect(probe.check).toHaveBeenCalledTimes(1);
  });

  it('returns cancelled rather than timed-out when aborted during a probe', async() => {
    const controller = new AbortController();
    const check = vi.fn(async(): Promise<ProbeResult> => {
      controller.abort();
      return 'not-ready';
    });
    const { waiter, sleep } = virtualWaiter({ check });

    const result = await waiter.waitUntilReady(target, { intervalMs: 2_000, maxAttempts: 1 }, controller.signal);

    expect(result.outcome).toBe('cancelled');
    expect(result.attempts).toBe(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('waits the real interval between attempts', async() => {
    vi.useFakeTimers();
    const probe = scriptedProbe('not-ready', 'not-ready', 'ready');
    const waiter = new ReadinessWaiter({ probe });

    const pending = waiter.waitUntilReady(target, { intervalMs: 2_000 });
    await vi.advanceTimersByTimeAsync(1_999);
    expect(probe.check).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(2_001);
    const result = await pending;

    expect(probe.check).toHaveBeenCalledTimes(3);
    expect(result).toEqual({ outcome: 'ready', attempts: 3, elapsedMs: 4_000 });
  });
});

import { abortableSleep, waitUntil } from '../../src/pinterest/wait_strategy';
import { SessionLostError, isSessionLostError } from '../../src/common/errors';
import { createFakeClock } from '../helpers/fake_clock';

describe('wait strategy', () => {
  test('조건이 이미 참이면 대기 없이 바로 반환한다', async () => {
    const fake = createFakeClock();
    const result = await waitUntil(() => true, { timeoutMs: 5_000, pollIntervalMs: 100, clock: fake.clock });

    expect(result).toEqual({ status: 'satisfied', attempts: 1, elapsedMs: 0, lastError: undefined });
    expect(fake.sleeps).toEqual([]);
  });

  test('returns as soon as the predicate first holds', async () => {
    const fake = createFakeClock();
    let calls = 0;
    const result = await waitUntil(() => {
      calls += 1;
      return calls === 3;
    }, { timeoutMs: 5_000, pollIntervalMs: 100, clock: fake.clock });

    expect(result.status).toBe('satisfied');
    expect(result.attempts).toBe(3);
    expect(result.elapsedMs).toBe(200);
    expect(fake.sleeps).toEqual([100, 100]);
  });

  test('never waits past the timeout: last sleep is cut to the remaining time', async () => {
    const fake = createFakeClock();
    const result = await waitUntil(() => false, { timeoutMs: 250, pollIntervalMs: 100, clock: fake.clock });

    expect(result.status).toBe('timed_out');
    expect(result.attempts).toBe(4);
    expect(result.elapsedMs).toBe(250);
    expect(fake.sleeps).toEqual([100, 100, 50]);
  });

  test('backoff grows the interval up to the cap', async () => {
    const fake = createFakeClock();
    const result = await waitUntil(() => false, {
      timeoutMs: 1_000,
      pollIntervalMs: 100,
      backoffFactor: 2,
      maxPollIntervalMs: 300,
      clock: fake.clock,
    });

    expect(fake.sleeps).toEqual([100, 200, 300, 300, 100]);
    expect(result.attempts).toBe(6);
    expect(result.elapsedMs).toBe(1_000);
  });

  test('timeout 0이면 한 번만 평가한다', async () => {
    const fake = createFakeClock();
    const predicate = jest.fn(() => false);
    const result = await waitUntil(predicate, { timeoutMs: 0, pollIntervalMs: 100, clock: fake.clock });

    expect(result.status).toBe('timed_out');
    expect(predicate).toHaveBeenCalledTimes(1);
    expect(fake.sleeps).toEqual([]);
  });

  test('predicate 오류는 미충족으로 보고 다음 폴링에서 재평가한다', async () => {
    const fake = createFakeClock();
    let calls = 0;
    const result = await waitUntil(() => {
      calls += 1;
      if (calls === 1) throw new Error('element is detached');
      return true;
    }, { timeoutMs: 1_000, pollIntervalMs: 50, clock: fake.clock });

    expect(result.status).toBe('satisfied');
    expect(result.attempts).toBe(2);
    expect(result.lastError).toBe('element is detached');
  });

  test('isFatal 오류는 즉시 전파한다', async () => {
    const fake = createFakeClock();
    await expect(
      waitUntil(() => {
        throw new SessionLostError('page has been closed');
      }, { timeoutMs: 1_000, pollIntervalMs: 50, clock: fake.clock, isFatal: isSessionLostError }),
    ).rejects.toBeInstanceOf(SessionLostError);
    expect(fake.sleeps).toEqual([]);
  });

  test('timed out result keeps the last swallowed error', async () => {
    const fake = createFakeClock();
    const result = await waitUntil(() => {
      throw new Error('locator not attached');
    }, { timeoutMs: 100, pollIntervalMs: 100, clock: fake.clock });

    expect(result.status).toBe('timed_out');
    expect(result.attempts).toBe(2);
    expect(result.lastError).toBe('locator not attached');
  });
});

describe('abortableSleep', () => {
  test('이미 abort된 신호면 false', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(abortableSleep(1_000, controller.signal)).resolves.toBe(false);
  });

  test('대기 중 abort되면 false로 끝난다', async () => {
    const controller = new AbortController();
    const pending = abortableSleep(10_000, controller.signal);
    controller.abort();
    await expect(pending).resolves.toBe(false);
  });

  test('resolves true after the delay', async () => {
    await expect(abortableSleep(5)).resolves.toBe(true);
    await expect(abortableSleep(0)).resolves.toBe(true);
  });
});

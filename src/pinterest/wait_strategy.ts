export type WaitClock = {
  now: () => number;
  sleep: (ms: number) => Promise<void>;
};

export const systemClock: WaitClock = {
  now: () => Date.now(),
  sleep: (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms)),
};

export type WaitStatus = 'satisfied' | 'timed_out';

export type WaitResult = {
  status: WaitStatus;
  attempts: number;
  elapsedMs: number;
  /** 마지막으로 삼킨 predicate 오류 메시지 */
  lastError?: string;
};

export type WaitOptions = {
  timeoutMs: number;
  pollIntervalMs: number;
  /** 1보다 크면 폴링 간격을 점점 늘린다 */
  backoffFactor?: number;
  maxPollIntervalMs?: number;
  clock?: WaitClock;
  /** true를 반환하는 오류는 "아직 아님"으로 취급하지 않고 그대로 던진다 */
  isFatal?: (error: unknown) => boolean;
};

export type WaitPredicate = () => boolean | Promise<boolean>;

/**
 * predicate가 처음 참이 되는 즉시 satisfied를 반환한다.
 * sleep은 남은 시간으로 잘라내므로 timeout을 넘겨 대기하지 않는다.
 * predicate 평가 중 오류(페이지 전환 중 detach 등)는 미충족으로 보고 재시도한다.
 */
export async function waitUntil(predicate: WaitPredicate, options: WaitOptions): Promise<WaitResult> {
  const clock = options.clock ?? systemClock;
  const startedAt = clock.now();
  const deadline = startedAt + Math.max(0, options.timeoutMs);
  const backoffFactor = Math.max(1, options.backoffFactor ?? 1);
  const maxInterval = Math.max(1, options.maxPollIntervalMs ?? options.pollIntervalMs);
  let interval = Math.max(1, options.pollIntervalMs);
  let attempts = 0;
  let lastError: string | undefined;

  for (;;) {
    attempts += 1;
    try {
      if (await predicate()) {
        return { status: 'satisfied', attempts, elapsedMs: clock.now() - startedAt, lastError };
      }
    } catch (error) {
      if (options.isFatal?.(error)) throw error;
      lastError = error instanceof Error ? error.message : String(error);
    }

    const remaining = deadline - clock.now();
    if (remaining <= 0) {
      return { status: 'timed_out', attempts, elapsedMs: clock.now() - startedAt, lastError };
    }
    await clock.sleep(Math.min(interval, remaining));
    interval = Math.min(maxInterval, Math.ceil(interval * backoffFactor));
  }
}

/** 신호를 보면서 대기한다. abort되면 즉시 false로 끝난다 */
export function abortableSleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) return Promise.resolve(false);
  if (ms <= 0) return Promise.resolve(true);
  return new Promise<boolean>((resolve) => {
    const onAbort = (): void => {
      clearTimeout(handle);
      resolve(false);
    };
    const handle = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

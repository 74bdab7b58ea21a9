import { BatchRunner, countOutcomes, isRetryableResult, type JobPoster } from '../../src/pinterest/batch_runner';
import { ItemPoster, PinState, type ItemPostResult } from '../../src/pinterest/item_poster';
import { resolvePostJobs } from '../../src/pinterest/metadata_resolver';
import type { DefaultMetadata, JobOutcome, MetadataOverrideRecord, PostJob } from '../../src/pinterest/types';
import { createFakeClock } from '../helpers/fake_clock';
import { FakePinBuilder, type FakePinBuilderBehaviour } from '../helpers/fake_pin_builder';

const defaults: DefaultMetadata = {
  title: 'Weekend',
  description: 'Weekend photos',
  link: '',
  boardName: 'Travel',
};

function buildJobs(files: string[], overrides?: MetadataOverrideRecord[]) {
  return resolvePostJobs({ images: files.map((name) => `/imgs/${name}`), defaults, overrides });
}

function buildRunner(
  behaviour: FakePinBuilderBehaviour = {},
  opts: { maxAttemptsPerPin?: number; onOutcome?: (outcome: JobOutcome) => void } = {},
) {
  const driver = new FakePinBuilder(behaviour);
  const poster = new ItemPoster(driver, {
    timeouts: { uploadTargetMs: 500, uploadMs: 500, fieldMs: 500, boardMs: 500, submitMs: 500, actionMs: 1_000 },
    pollIntervalMs: 100,
    clock: createFakeClock().clock,
  });
  const sleep = jest.fn(async (_ms: number, _signal?: AbortSignal) => true);
  const runner = new BatchRunner(poster, {
    delayBetweenPinsMs: 2_000,
    maxAttemptsPerPin: opts.maxAttemptsPerPin ?? 1,
    sleep,
    onOutcome: opts.onOutcome,
  });
  return { driver, runner, sleep };
}

function summary(outcomes: readonly JobOutcome[]): Array<[string, string]> {
  return outcomes.map((outcome) => [outcome.filename, outcome.status.kind]);
}

describe('batch runner', () => {
  test('Travel 보드에 a.jpg, b.png를 파일명 순서로 게시한다', async () => {
    const { jobs, skipped } = buildJobs(['b.png', 'a.jpg']);
    const { driver, runner, sleep } = buildRunner();

    const result = await runner.run(jobs, { skipped });

    expect(summary(result.outcomes)).toEqual([['a.jpg', 'succeeded'], ['b.png', 'succeeded']]);
    expect(result.counts).toEqual({ total: 2, succeeded: 2, failed: 0, unknown: 0, skipped: 0 });
    expect(result.abort).toBeUndefined();
    expect(driver.calls.filter((call) => call.startsWith('uploadImage:'))).toEqual([
      'uploadImage:a.jpg',
      'uploadImage:b.png',
    ]);
    expect(driver.calls.filter((call) => call.startsWith('chooseBoard:'))).toEqual([
      'chooseBoard:Travel',
      'chooseBoard:Travel',
    ]);
    // 항목 사이에만 대기
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(2_000, undefined);
  });

  test('CSV의 missing.jpg 행은 경고만 남기고 나머지는 기본값으로 게시된다', async () => {
    const resolution = buildJobs(['a.jpg', 'b.png'], [{ filename: 'missing.jpg', title: 'Ghost' }]);
    const { runner } = buildRunner();

    const result = await runner.run(resolution.jobs, { skipped: resolution.skipped });

    expect(resolution.warnings).toEqual(['metadata row for missing.jpg has no matching image']);
    expect(result.counts.succeeded).toBe(2);
    expect(result.outcomes.map((outcome) => outcome.job?.title)).toEqual(['Weekend', 'Weekend']);
  });

  test('c.jpg 보드가 없어도 배치는 계속되어 다음 항목이 CONFIRMED된다', async () => {
    const { jobs } = buildJobs(['a.jpg', 'c.jpg', 'd.jpg'], [{ filename: 'c.jpg', board: 'Nonexistent' }]);
    const { driver, runner } = buildRunner();

    const result = await runner.run(jobs);

    expect(summary(result.outcomes)).toEqual([
      ['a.jpg', 'succeeded'],
      ['c.jpg', 'failed'],
      ['d.jpg', 'succeeded'],
    ]);
    expect(result.outcomes[1].status).toEqual({
      kind: 'failed',
      reason: 'board not found: Nonexistent',
      state: PinState.BOARD_SELECTING,
    });
    expect(result.counts).toEqual({ total: 3, succeeded: 2, failed: 1, unknown: 0, skipped: 0 });
    expect(driver.captures).toEqual([{ stage: PinState.BOARD_SELECTING, filename: 'c.jpg' }]);
  });

  test('세션이 끊기면 현재 항목은 unknown, 나머지는 skipped로 끝난다', async () => {
    const { jobs } = buildJobs(['a.jpg', 'b.jpg', 'c.jpg']);
    const { runner, sleep } = buildRunner({ closeBrowserOn: 'b.jpg' });

    const result = await runner.run(jobs);

    expect(result.outcomes.map((outcome) => [outcome.filename, outcome.status])).toEqual([
      ['a.jpg', { kind: 'succeeded' }],
      ['b.jpg', { kind: 'unknown', reason: 'session lost' }],
      ['c.jpg', { kind: 'skipped', reason: 'session lost' }],
    ]);
    expect(result.abort).toEqual({
      kind: 'session_lost',
      reason: '[SESSION_LOST] locator.setInputFiles: Target page, context or browser has been closed',
    });
    expect(sleep).toHaveBeenCalledTimes(1);
  });

  test('중단 신호 이후의 항목은 interrupted로 skip된다', async () => {
    const controller = new AbortController();
    const { jobs } = buildJobs(['a.jpg', 'b.jpg', 'c.jpg']);
    const { runner } = buildRunner({}, {
      onOutcome: (outcome) => {
        if (outcome.filename === 'a.jpg') controller.abort();
      },
    });

    const result = await runner.run(jobs, { signal: controller.signal });

    expect(result.outcomes.map((outcome) => [outcome.filename, outcome.status])).toEqual([
      ['a.jpg', { kind: 'succeeded' }],
      ['b.jpg', { kind: 'skipped', reason: 'interrupted' }],
      ['c.jpg', { kind: 'skipped', reason: 'interrupted' }],
    ]);
    expect(result.abort).toEqual({ kind: 'interrupted', reason: 'operator abort' });
  });

  test('제출 전 실패는 max_attempts_per_pin까지 재시도한다', async () => {
    const { jobs } = buildJobs(['a.jpg', 'b.jpg']);
    const { runner, sleep } = buildRunner({ rejectUploadOnceFor: 'a.jpg' }, { maxAttemptsPerPin: 2 });

    const result = await runner.run(jobs);

    expect(result.outcomes.map((outcome) => [outcome.filename, outcome.status.kind, outcome.attempts])).toEqual([
      ['a.jpg', 'succeeded', 2],
      ['b.jpg', 'succeeded', 1],
    ]);
    // 재시도 대기 1회 + 항목 사이 대기 1회
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  test('재시도 대기 중 중단되면 다시 시도하지 않는다', async () => {
    const controller = new AbortController();
    const { jobs } = buildJobs(['a.jpg', 'b.jpg']);
    const driver = new FakePinBuilder({ uploadProbes: ['pending'] });
    const poster = new ItemPoster(driver, {
      timeouts: { uploadTargetMs: 500, uploadMs: 500, fieldMs: 500, boardMs: 500, submitMs: 500, actionMs: 1_000 },
      pollIntervalMs: 100,
      clock: createFakeClock().clock,
    });
    const sleep = jest.fn(async (_ms: number, _signal?: AbortSignal) => {
      controller.abort();
      return false;
    });
    const runner = new BatchRunner(poster, { delayBetweenPinsMs: 2_000, maxAttemptsPerPin: 3, sleep });

    const result = await runner.run(jobs, { signal: controller.signal });

    expect(result.outcomes.map((outcome) => [outcome.filename, outcome.status, outcome.attempts])).toEqual([
      ['a.jpg', { kind: 'failed', reason: 'upload timeout', state: PinState.UPLOADING }, 1],
      ['b.jpg', { kind: 'skipped', reason: 'interrupted' }, 0],
    ]);
    expect(result.abort).toEqual({ kind: 'interrupted', reason: 'operator abort' });
    expect(driver.calls.filter((call) => call.startsWith('uploadImage:'))).toEqual(['uploadImage:a.jpg']);
    expect(sleep).toHaveBeenCalledTimes(1);
  });

  test('board not found and unknown results are not retried', async () => {
    const { jobs } = buildJobs(['a.jpg'], [{ filename: 'a.jpg', board: 'Nonexistent' }]);
    const board = buildRunner({}, { maxAttemptsPerPin: 3 });
    const boardRun = await board.runner.run(jobs);
    expect(boardRun.outcomes[0].status).toEqual({
      kind: 'failed',
      reason: 'board not found: Nonexistent',
      state: PinState.BOARD_SELECTING,
    });
    expect(boardRun.outcomes[0].attempts).toBe(1);
    expect(board.driver.calls.filter((call) => call === 'searchBoards:Nonexistent')).toHaveLength(1);

    const unknownRun = await buildRunner({ submissionProbes: ['pending'] }, { maxAttemptsPerPin: 3 }).runner.run(
      buildJobs(['a.jpg']).jobs,
    );
    expect(unknownRun.outcomes[0].status).toEqual({ kind: 'unknown', reason: 'submission timeout' });
    expect(unknownRun.outcomes[0].attempts).toBe(1);
  });

  test('poster가 예외를 던져도 그 항목만 실패하고 계속한다', async () => {
    const { jobs } = buildJobs(['a.jpg', 'b.jpg']);
    const poster: JobPoster = {
      post: async (job: PostJob): Promise<ItemPostResult> => {
        if (job.filename === 'a.jpg') throw new Error('unexpected driver state');
        return { status: { kind: 'succeeded' }, history: [PinState.CONFIRMED], elapsedMs: 1 };
      },
    };
    const runner = new BatchRunner(poster, { delayBetweenPinsMs: 0, maxAttemptsPerPin: 1, sleep: async () => true });

    const result = await runner.run(jobs);

    expect(result.outcomes[0].status).toEqual({ kind: 'failed', reason: 'unexpected driver state', state: 'UNHANDLED' });
    expect(result.outcomes[1].status).toEqual({ kind: 'succeeded' });
  });

  test('resolver에서 제외된 항목도 파일명 순으로 결과에 포함된다', async () => {
    const resolution = resolvePostJobs({
      images: ['/imgs/a.jpg', '/imgs/b.jpg', '/imgs/c.jpg'],
      defaults: { ...defaults, title: '' },
      overrides: [
        { filename: 'a.jpg', title: 'A' },
        { filename: 'c.jpg', title: 'C' },
      ],
    });
    const { runner } = buildRunner();

    const result = await runner.run(resolution.jobs, { skipped: resolution.skipped });

    expect(result.outcomes.map((outcome) => [outcome.filename, outcome.status])).toEqual([
      ['a.jpg', { kind: 'succeeded' }],
      ['b.jpg', { kind: 'skipped', reason: 'missing required field: title' }],
      ['c.jpg', { kind: 'succeeded' }],
    ]);
    expect(result.counts).toEqual({ total: 3, succeeded: 2, failed: 0, unknown: 0, skipped: 1 });
  });

  test('empty job list finishes immediately', async () => {
    const { runner, sleep } = buildRunner();
    const result = await runner.run([]);
    expect(result.outcomes).toEqual([]);
    expect(result.counts.total).toBe(0);
    expect(sleep).not.toHaveBeenCalled();
  });
});

describe('batch helpers', () => {
  test('isRetryableResult', () => {
    const base = { history: [], elapsedMs: 0 };
    expect(isRetryableResult({
      ...base,
      status: { kind: 'failed', reason: 'upload timeout', state: PinState.UPLOADING },
      failedAt: PinState.UPLOADING,
    })).toBe(true);
    expect(isRetryableResult({
      ...base,
      status: { kind: 'failed', reason: 'submission rejected', state: PinState.SUBMITTING },
      failedAt: PinState.SUBMITTING,
    })).toBe(false);
    expect(isRetryableResult({
      ...base,
      status: { kind: 'failed', reason: 'board not found: X', state: PinState.BOARD_SELECTING },
      failedAt: PinState.BOARD_SELECTING,
    })).toBe(false);
    expect(isRetryableResult({ ...base, status: { kind: 'unknown', reason: 'submission timeout' } })).toBe(false);
  });

  test('countOutcomes', () => {
    const outcome = (filename: string, status: JobOutcome['status']): JobOutcome => ({
      filename,
      imagePath: `/imgs/${filename}`,
      status,
      attempts: 1,
      elapsedMs: 0,
    });
    expect(countOutcomes([
      outcome('a.jpg', { kind: 'succeeded' }),
      outcome('b.jpg', { kind: 'failed', reason: 'x', state: 'IDLE' }),
      outcome('c.jpg', { kind: 'unknown', reason: 'y' }),
      outcome('d.jpg', { kind: 'skipped', reason: 'z' }),
      outcome('e.jpg', { kind: 'succeeded' }),
    ])).toEqual({ total: 5, succeeded: 2, failed: 1, unknown: 1, skipped: 1 });
  });
});

import * as log from '../utils/logger';
import { compareByFilename } from '../utils/image_discovery';
import { errorMessage, isSessionLostError } from '../common/errors';
import { abortableSleep } from './wait_strategy';
import { PinState, type ItemPostResult } from './item_poster';
import type {
  BatchCounts,
  BatchResult,
  JobOutcome,
  JobStatus,
  PostJob,
  SkippedJob,
} from './types';

export interface JobPoster {
  post(job: PostJob): Promise<ItemPostResult>;
}

export type PacingSleep = (ms: number, signal?: AbortSignal) => Promise<boolean>;

export type BatchRunnerOptions = {
  delayBetweenPinsMs: number;
  /** 제출 전 단계 실패에 한해 잡당 최대 시도 횟수 (1 = 재시도 없음) */
  maxAttemptsPerPin: number;
  sleep?: PacingSleep;
  onOutcome?: (outcome: JobOutcome, index: number, total: number) => void;
};

export type BatchRunOptions = {
  signal?: AbortSignal;
  /** resolver 단계에서 제외된 잡. 결과에 skipped로 포함된다 */
  skipped?: readonly SkippedJob[];
};

const PRE_SUBMIT_STATES: ReadonlySet<PinState> = new Set([
  PinState.IDLE,
  PinState.UPLOADING,
  PinState.FIELDS_POPULATING,
  PinState.BOARD_SELECTING,
]);

/** 제출 이전에 실패했고 재시도로 바뀔 여지가 있는 경우만 재시도한다 */
export function isRetryableResult(result: ItemPostResult): boolean {
  if (result.status.kind !== 'failed') return false;
  if (!result.failedAt || !PRE_SUBMIT_STATES.has(result.failedAt)) return false;
  return !result.status.reason.startsWith('board not found');
}

export function countOutcomes(outcomes: readonly JobOutcome[]): BatchCounts {
  const counts: BatchCounts = { total: outcomes.length, succeeded: 0, failed: 0, unknown: 0, skipped: 0 };
  for (const outcome of outcomes) {
    counts[outcome.status.kind] += 1;
  }
  return counts;
}

function describeStatus(status: JobStatus): string {
  switch (status.kind) {
    case 'succeeded':
      return 'succeeded';
    case 'failed':
      return `failed state=${status.state} reason=${status.reason}`;
    case 'unknown':
      return `unknown reason=${status.reason} (manual review)`;
    case 'skipped':
      return `skipped reason=${status.reason}`;
  }
}

export class BatchRunner {
  private readonly poster: JobPoster;
  private readonly options: BatchRunnerOptions;

  constructor(poster: JobPoster, options: BatchRunnerOptions) {
    this.poster = poster;
    this.options = options;
  }

  async run(jobs: readonly PostJob[], runOptions: BatchRunOptions = {}): Promise<BatchResult> {
    const startedAt = new Date();
    const { signal } = runOptions;
    const sleep = this.options.sleep ?? abortableSleep;
    const maxAttempts = Math.max(1, Math.floor(this.options.maxAttemptsPerPin));
    const total = jobs.length;
    const processed: JobOutcome[] = [];
    let abort: BatchResult['abort'];

    const record = (outcome: JobOutcome, index: number): void => {
      processed.push(outcome);
      log.info(`[batch] file=${outcome.filename} attempts=${outcome.attempts} ${describeStatus(outcome.status)}`);
      this.options.onOutcome?.(outcome, index, total);
    };

    for (let i = 0; i < total; i++) {
      const job = jobs[i];
      if (abort) {
        record(skippedOutcome(job, abort.kind === 'session_lost' ? 'session lost' : 'interrupted'), i);
        continue;
      }
      if (signal?.aborted) {
        abort = { kind: 'interrupted', reason: 'operator abort' };
        log.warn(`[batch] interrupted before ${job.filename}; remaining items skipped`);
        record(skippedOutcome(job, 'interrupted'), i);
        continue;
      }

      log.step(i + 1, total, `${log.progressBar(i + 1, total)} ${job.filename}`);
      const jobStartedAt = Date.now();
      let attempts = 0;
      let status: JobStatus = { kind: 'failed', reason: 'not attempted', state: PinState.IDLE };

      while (attempts < maxAttempts) {
        attempts += 1;
        try {
          const result = await this.poster.post(job);
          status = result.status;
          if (attempts < maxAttempts && isRetryableResult(result) && !signal?.aborted) {
            log.warn(`[batch] retry file=${job.filename} attempt=${attempts + 1}/${maxAttempts} reason=${errorMessageOf(status)}`);
            const slept = await sleep(this.options.delayBetweenPinsMs, signal);
            if (slept && !signal?.aborted) continue;
            // 재시도 대기 중 중단: 마지막 결과를 남기고 나머지는 skip
            abort = { kind: 'interrupted', reason: 'operator abort' };
            log.warn(`[batch] interrupted while waiting to retry ${job.filename}; remaining items skipped`);
          }
        } catch (error) {
          if (isSessionLostError(error)) {
            abort = { kind: 'session_lost', reason: errorMessage(error) };
            status = { kind: 'unknown', reason: 'session lost' };
            log.error(`[batch] session lost while posting ${job.filename}: ${errorMessage(error)}`);
          } else {
            status = { kind: 'failed', reason: errorMessage(error), state: 'UNHANDLED' };
          }
        }
        break;
      }

      record({
        filename: job.filename,
        imagePath: job.imagePath,
        job,
        status,
        attempts,
        elapsedMs: Date.now() - jobStartedAt,
      }, i);

      if (!abort && i < total - 1) {
        await sleep(this.options.delayBetweenPinsMs, signal);
      }
    }

    const resolverSkipped = (runOptions.skipped ?? []).map((entry): JobOutcome => ({
      filename: entry.filename,
      imagePath: entry.imagePath,
      status: { kind: 'skipped', reason: entry.reason },
      attempts: 0,
      elapsedMs: 0,
    }));
    const outcomes = [...resolverSkipped, ...processed]
      .sort((a, b) => compareByFilename(a.imagePath, b.imagePath));

    return {
      outcomes,
      counts: countOutcomes(outcomes),
      ...(abort ? { abort } : {}),
      startedAt: startedAt.toISOString(),
      finishedAt: new Date().toISOString(),
    };
  }
}

function skippedOutcome(job: PostJob, reason: string): JobOutcome {
  return {
    filename: job.filename,
    imagePath: job.imagePath,
    job,
    status: { kind: 'skipped', reason },
    attempts: 0,
    elapsedMs: 0,
  };
}

function errorMessageOf(status: JobStatus): string {
  return status.kind === 'succeeded' ? 'none' : status.reason;
}

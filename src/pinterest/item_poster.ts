import * as log from '../utils/logger';
import { errorMessage, isSessionLostError, SessionLostError } from '../common/errors';
import { waitUntil, type WaitClock, type WaitPredicate } from './wait_strategy';
import type { JobStatus, PostJob } from './types';

export enum PinState {
  IDLE = 'IDLE',
  UPLOADING = 'UPLOADING',
  FIELDS_POPULATING = 'FIELDS_POPULATING',
  BOARD_SELECTING = 'BOARD_SELECTING',
  SUBMITTING = 'SUBMITTING',
  CONFIRMED = 'CONFIRMED',
  FAILED = 'FAILED',
  UNKNOWN = 'UNKNOWN',
}

type ActiveState = Exclude<PinState, PinState.CONFIRMED | PinState.FAILED | PinState.UNKNOWN>;

export type PinField = 'title' | 'description' | 'link';
export type UploadProbe = 'pending' | 'rendered' | 'rejected';
export type SubmissionProbe = 'pending' | 'confirmed' | 'rejected';

/** 핀 빌더 화면에 대한 최소 조작 능력. Playwright 구현은 pin_builder.ts */
export interface PinBuilderDriver {
  openBuilder(): Promise<void>;
  hasUploadTarget(): Promise<boolean>;
  uploadImage(imagePath: string): Promise<void>;
  probeUpload(): Promise<UploadProbe>;
  isFieldReady(field: PinField): Promise<boolean>;
  fillField(field: PinField, value: string): Promise<void>;
  clearField(field: PinField): Promise<void>;
  openBoardPicker(): Promise<void>;
  listBoards(): Promise<string[]>;
  /** 보드 검색창에 입력한다. 검색창이 없으면 false */
  searchBoards(text: string): Promise<boolean>;
  chooseBoard(displayName: string): Promise<void>;
  submit(): Promise<void>;
  probeSubmission(): Promise<SubmissionProbe>;
  captureFailure?(stage: string, filename: string): Promise<void>;
}

export type ItemPosterTimeouts = {
  uploadTargetMs: number;
  uploadMs: number;
  fieldMs: number;
  boardMs: number;
  submitMs: number;
  /** 단일 드라이버 동작(click/fill/setInputFiles) 한도 */
  actionMs: number;
};

export type ItemPosterOptions = {
  timeouts: ItemPosterTimeouts;
  pollIntervalMs: number;
  clock?: WaitClock;
};

export type ItemPostResult = {
  status: JobStatus;
  /** 실패가 발생한 상태. 재시도 정책 판단에 쓰인다 */
  failedAt?: ActiveState;
  history: PinState[];
  elapsedMs: number;
};

class StepFailure extends Error {}

export function findBoardMatch(available: readonly string[], wanted: string): string | null {
  const target = wanted.trim().toLowerCase();
  if (!target) return null;
  return available.find((name) => name.trim().toLowerCase() === target) ?? null;
}

function sameBoards(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((name, i) => name === b[i]);
}

export class ItemPoster {
  private readonly driver: PinBuilderDriver;
  private readonly options: ItemPosterOptions;

  constructor(driver: PinBuilderDriver, options: ItemPosterOptions) {
    this.driver = driver;
    this.options = options;
  }

  async post(job: PostJob): Promise<ItemPostResult> {
    const startedAt = Date.now();
    let state: PinState = PinState.IDLE;
    const history: PinState[] = [];
    let status: JobStatus | null = null;
    let failedAt: ActiveState | undefined;

    while (state !== PinState.CONFIRMED && state !== PinState.FAILED && state !== PinState.UNKNOWN) {
      history.push(state);
      const current: ActiveState = state;
      log.info(`[pin] file=${job.filename} state=${current}`);
      try {
        switch (current) {
          case PinState.IDLE:
            await this.startUpload(job);
            state = PinState.UPLOADING;
            break;
          case PinState.UPLOADING:
            await this.awaitThumbnail();
            state = PinState.FIELDS_POPULATING;
            break;
          case PinState.FIELDS_POPULATING:
            await this.populateFields(job);
            state = PinState.BOARD_SELECTING;
            break;
          case PinState.BOARD_SELECTING:
            await this.selectBoard(job.boardName);
            state = PinState.SUBMITTING;
            break;
          case PinState.SUBMITTING: {
            const outcome = await this.submitAndConfirm();
            if (outcome === 'confirmed') {
              state = PinState.CONFIRMED;
              status = { kind: 'succeeded' };
            } else {
              state = PinState.UNKNOWN;
              status = { kind: 'unknown', reason: 'submission timeout' };
            }
            break;
          }
        }
      } catch (error) {
        if (isSessionLostError(error)) {
          throw error instanceof SessionLostError ? error : new SessionLostError(errorMessage(error));
        }
        failedAt = current;
        state = PinState.FAILED;
        status = { kind: 'failed', reason: errorMessage(error), state: current };
      }
    }

    history.push(state);
    if (state !== PinState.CONFIRMED) {
      await this.captureFailureSafe(failedAt ?? PinState.SUBMITTING, job.filename);
    }
    return {
      status: status ?? { kind: 'failed', reason: 'invalid_state', state: PinState.IDLE },
      failedAt,
      history,
      elapsedMs: Date.now() - startedAt,
    };
  }

  private async startUpload(job: PostJob): Promise<void> {
    await this.runAction('openBuilder', () => this.driver.openBuilder());
    await this.waitOrFail(
      () => this.driver.hasUploadTarget(),
      this.options.timeouts.uploadTargetMs,
      'upload target not found',
    );
    await this.runAction('uploadImage', () => this.driver.uploadImage(job.imagePath));
  }

  private async awaitThumbnail(): Promise<void> {
    const last: { probe: UploadProbe } = { probe: 'pending' };
    await this.waitOrFail(
      async () => {
        last.probe = await this.driver.probeUpload();
        return last.probe !== 'pending';
      },
      this.options.timeouts.uploadMs,
      'upload timeout',
    );
    if (last.probe === 'rejected') {
      throw new StepFailure('upload rejected');
    }
  }

  private async populateFields(job: PostJob): Promise<void> {
    await this.fillRequired('title', job.title);
    await this.fillRequired('description', job.description);

    if (job.link) {
      await this.fillRequired('link', job.link);
      return;
    }
    // 링크가 없으면 이전 값이 남지 않도록 비운다
    if (await this.driver.isFieldReady('link').catch((error: unknown) => this.rethrowSessionLoss(error))) {
      await this.runAction('clearField:link', () => this.driver.clearField('link'));
    }
  }

  private async fillRequired(field: PinField, value: string): Promise<void> {
    await this.waitOrFail(
      () => this.driver.isFieldReady(field),
      this.options.timeouts.fieldMs,
      `field population timeout: ${field}`,
    );
    await this.runAction(`fillField:${field}`, () => this.driver.fillField(field, value));
  }

  private async selectBoard(boardName: string): Promise<void> {
    await this.runAction('openBoardPicker', () => this.driver.openBoardPicker());
    const listed: { boards: string[] } = { boards: [] };
    await this.waitOrFail(
      async () => {
        listed.boards = await this.driver.listBoards();
        return listed.boards.length > 0;
      },
      this.options.timeouts.boardMs,
      'board list timeout',
    );
    const match = findBoardMatch(listed.boards, boardName) ?? await this.searchBoard(boardName, listed.boards);
    if (!match) {
      throw new StepFailure(`board not found: ${boardName}`);
    }
    await this.runAction('chooseBoard', () => this.driver.chooseBoard(match));
  }

  // 첫 목록에 없으면 검색으로 좁힌다. 목록이 바뀌었는데도 없으면 없는 보드다
  private async searchBoard(boardName: string, unfiltered: readonly string[]): Promise<string | null> {
    const searched = await this.runAction('searchBoards', () => this.driver.searchBoards(boardName));
    if (!searched) return null;
    const filtered: { boards: readonly string[] } = { boards: unfiltered };
    await this.wait(async () => {
      filtered.boards = await this.driver.listBoards();
      return findBoardMatch(filtered.boards, boardName) !== null || !sameBoards(filtered.boards, unfiltered);
    }, this.options.timeouts.boardMs);
    return findBoardMatch(filtered.boards, boardName);
  }

  private async submitAndConfirm(): Promise<'confirmed' | 'timed_out'> {
    await this.runAction('submit', () => this.driver.submit());
    const last: { probe: SubmissionProbe } = { probe: 'pending' };
    const result = await this.wait(async () => {
      last.probe = await this.driver.probeSubmission();
      return last.probe !== 'pending';
    }, this.options.timeouts.submitMs);
    if (result === 'timed_out') return 'timed_out';
    if (last.probe === 'rejected') {
      throw new StepFailure('submission rejected');
    }
    return 'confirmed';
  }

  private async wait(predicate: WaitPredicate, timeoutMs: number): Promise<'satisfied' | 'timed_out'> {
    const result = await waitUntil(predicate, {
      timeoutMs,
      pollIntervalMs: this.options.pollIntervalMs,
      clock: this.options.clock,
      isFatal: isSessionLostError,
    });
    if (result.status === 'timed_out' && result.lastError) {
      log.warn(`[wait] timed_out attempts=${result.attempts} last_error=${result.lastError}`);
    }
    return result.status;
  }

  private async waitOrFail(predicate: WaitPredicate, timeoutMs: number, reason: string): Promise<void> {
    const status = await this.wait(predicate, timeoutMs);
    if (status === 'timed_out') {
      throw new StepFailure(reason);
    }
  }

  private async runAction<T>(label: string, fn: () => Promise<T>): Promise<T> {
    const timeoutMs = this.options.timeouts.actionMs;
    return await withTimeout(fn, timeoutMs, `[ACTION_TIMEOUT] action=${label} timeoutMs=${timeoutMs}`);
  }

  private rethrowSessionLoss(error: unknown): false {
    if (isSessionLostError(error)) throw error;
    return false;
  }

  private async captureFailureSafe(stage: string, filename: string): Promise<void> {
    if (!this.driver.captureFailure) return;
    try {
      await this.driver.captureFailure(stage, filename);
    } catch (error) {
      log.warn(`[pin] failure capture skipped: ${errorMessage(error)}`);
    }
  }
}

async function withTimeout<T>(fn: () => Promise<T>, timeoutMs: number, message: string): Promise<T> {
  let handle: ReturnType<typeof setTimeout> | null = null;
  const timeoutPromise = new Promise<never>((_, reject) => {
    handle = setTimeout(() => reject(new Error(message)), timeoutMs);
  });

  try {
    return await Promise.race([fn(), timeoutPromise]);
  } finally {
    if (handle) clearTimeout(handle);
  }
}

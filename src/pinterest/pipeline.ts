import * as log from '../utils/logger';
import { discoverImages } from '../utils/image_discovery';
import { loadMetadataOverrides } from '../utils/metadata_loader';
import { collectDefaultMetadata, type Ask } from '../utils/prompt';
import { AuthenticationTimeoutError } from '../common/errors';
import {
  applyCliOverrides,
  loadRunConfig,
  type CliOverrides,
  type RunConfig,
} from '../common/config';
import { resolvePostJobs, type ResolveResult } from './metadata_resolver';
import { BatchRunner, type JobPoster, type PacingSleep } from './batch_runner';
import type { ItemPosterOptions } from './item_poster';
import type { SessionController } from './session';
import type { WaitClock } from './wait_strategy';
import type { BatchResult, DefaultMetadata, MetadataOverrideRecord } from './types';

export type PrepareRunOptions = {
  configPath: string;
  configExplicit: boolean;
  csvPath?: string;
  cli: CliOverrides;
  /** 없으면 기본 메타데이터를 묻지 않고 설정값만 사용한다 */
  ask?: Ask;
};

export type PreparedRun = {
  config: Readonly<RunConfig>;
  images: string[];
  overrides: MetadataOverrideRecord[] | null;
  defaults: DefaultMetadata;
  resolution: ResolveResult;
};

/**
 * 브라우저를 띄우기 전 단계: 설정 → 이미지 탐색 → CSV → 기본값 → 잡 해석.
 * 여기서 나는 오류는 모두 시작 단계 치명 오류다.
 */
export async function prepareRun(opts: PrepareRunOptions): Promise<PreparedRun> {
  const loaded = loadRunConfig(opts.configPath, { explicit: opts.configExplicit });
  log.info(`[config] source=${loaded.source} path=${opts.configPath}`);
  const config = applyCliOverrides(loaded.config, opts.cli);

  const images = discoverImages(config.imagesFolder);
  const overrides = opts.csvPath ? loadMetadataOverrides(opts.csvPath) : null;

  const defaults: DefaultMetadata = opts.ask
    ? await collectDefaultMetadata(opts.ask, {
      askMetadata: overrides === null || overrides.length === 0,
      boardName: config.boardName,
    })
    : Object.freeze({ title: '', description: '', link: '', boardName: config.boardName });

  const resolution = resolvePostJobs({ images, defaults, overrides: overrides ?? undefined });
  for (const warning of resolution.warnings) {
    log.warn(`[metadata] ${warning}`);
  }
  for (const skipped of resolution.skipped) {
    log.warn(`[metadata] skip file=${skipped.filename} reason=${skipped.reason}`);
  }
  log.info(`[metadata] jobs=${resolution.jobs.length} skipped=${resolution.skipped.length}`);
  return { config, images, overrides, defaults, resolution };
}

export function buildItemPosterOptions(config: Readonly<RunConfig>, clock?: WaitClock): ItemPosterOptions {
  const elementMs = config.elementTimeoutSeconds * 1000;
  return {
    timeouts: {
      uploadTargetMs: elementMs,
      uploadMs: elementMs,
      fieldMs: elementMs,
      boardMs: elementMs,
      submitMs: config.publishTimeoutSeconds * 1000,
      actionMs: elementMs,
    },
    pollIntervalMs: config.pollIntervalMs,
    clock,
  };
}

export type ExecuteRunDeps<S> = {
  session: SessionController<S>;
  createPoster: (session: S) => JobPoster;
  signal?: AbortSignal;
  /** 로그인 대기 시간 초과 후 운영자 확인. true면 계속 진행 */
  confirmLogin?: () => Promise<boolean>;
  sleep?: PacingSleep;
  onPhase?: (phase: 'login' | 'batch') => void;
};

/** 세션 확보 → 로그인 대기 → 배치 실행. 세션은 어떤 경로로 끝나도 해제된다 */
export async function executeRun<S>(prepared: PreparedRun, deps: ExecuteRunDeps<S>): Promise<BatchResult> {
  const { config, resolution } = prepared;
  const runner = (poster: JobPoster): BatchRunner => new BatchRunner(poster, {
    delayBetweenPinsMs: config.delayBetweenPinsSeconds * 1000,
    maxAttemptsPerPin: config.maxAttemptsPerPin,
    sleep: deps.sleep,
  });

  if (resolution.jobs.length === 0) {
    log.warn('[batch] no valid jobs after metadata resolution; browser not started');
    return await runner({ post: () => Promise.reject(new Error('no jobs')) })
      .run([], { skipped: resolution.skipped });
  }

  try {
    deps.onPhase?.('login');
    const session = await deps.session.acquire(config.headless);
    try {
      await deps.session.requireAuthentication(config.loginWaitSeconds);
    } catch (error) {
      if (!(error instanceof AuthenticationTimeoutError) || !deps.confirmLogin || !(await deps.confirmLogin())) {
        throw error;
      }
      log.warn('[session] login confirmed manually by operator');
    }

    deps.onPhase?.('batch');
    log.info(`[batch] starting ${resolution.jobs.length} pin(s)`);
    return await runner(deps.createPoster(session)).run(resolution.jobs, {
      signal: deps.signal,
      skipped: resolution.skipped,
    });
  } finally {
    await deps.session.release();
  }
}

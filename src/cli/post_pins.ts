#!/usr/bin/env node

import * as path from 'path';
import * as fs from 'fs';
import { Command } from 'commander';
import * as dotenv from 'dotenv';

import * as log from '../utils/logger';
import { createReadlinePrompter, confirmYes, type Prompter } from '../utils/prompt';
import { createDebugRunDir } from '../common/debug_paths';
import { DEFAULT_CONFIG_FILE, getEndpoints, getRuntimeSettings } from '../common/config';
import { classifyRunFailure, errorMessage } from '../common/errors';
import { buildItemPosterOptions, executeRun, prepareRun } from '../pinterest/pipeline';
import { ItemPoster } from '../pinterest/item_poster';
import { PlaywrightPinBuilder } from '../pinterest/pin_builder';
import { SessionController, createPlaywrightSessionDriver } from '../pinterest/session';
import { formatBatchSummary, writeBatchReport } from '../pinterest/report';
import type { BatchResult } from '../pinterest/types';

// ────────────────────────────────────────────
// 환경변수 로드
// ────────────────────────────────────────────
const envPath = path.resolve(process.cwd(), '.env');
if (fs.existsSync(envPath)) {
  dotenv.config({ path: envPath });
}

const EXIT_INTERRUPTED = 130;

export type PostPinsCliOptions = {
  config: string;
  csv?: string;
  headless?: boolean;
  board?: string;
  images?: string;
  report?: string;
  confirmLogin?: boolean;
  prompt: boolean;
};

export type PromptPlan = {
  /** prepareRun에 ask를 넘긴다. 메타데이터 질문 여부는 CSV 유무로 prepareRun이 정한다 */
  ask: boolean;
  intro: boolean;
  needsPrompter: boolean;
};

export function planPrompts(opts: Pick<PostPinsCliOptions, 'prompt' | 'csv' | 'confirmLogin'>): PromptPlan {
  return {
    ask: opts.prompt,
    intro: opts.prompt && !opts.csv,
    needsPrompter: opts.prompt || Boolean(opts.confirmLogin),
  };
}

function printBanner(): void {
  const rule = '='.repeat(60);
  process.stdout.write(`${rule}\n  Pinterest Bulk Pin Poster\n${rule}\n`);
}

export function exitCodeForResult(result: BatchResult): number {
  if (result.abort?.kind === 'interrupted') return EXIT_INTERRUPTED;
  if (result.abort?.kind === 'session_lost') return 1;
  return 0;
}

async function runPostPins(opts: PostPinsCliOptions, configExplicit: boolean): Promise<number> {
  if (!process.env.PINPOST_RUN_ID) {
    process.env.PINPOST_RUN_ID = `run_${new Date().toISOString().replace(/[-:.TZ]/g, '')}`;
  }
  printBanner();
  log.logStructured('run_start', { config: opts.config, csv: opts.csv ?? null, headless: Boolean(opts.headless) });

  const abortController = new AbortController();
  let phase: 'startup' | 'login' | 'batch' = 'startup';
  let interrupts = 0;
  let session: SessionController | null = null;
  let prompter: Prompter | null = null;

  const onSignal = (signal: NodeJS.Signals): void => {
    interrupts += 1;
    if (phase === 'batch' && interrupts === 1) {
      log.warn(`[run] ${signal} received: finishing current pin, remaining pins will be skipped`);
      abortController.abort();
      return;
    }
    log.warn(`[run] ${signal} received during ${phase}: exiting`);
    prompter?.close();
    const release = session ? session.release() : Promise.resolve();
    release.finally(() => process.exit(EXIT_INTERRUPTED)).catch((error: unknown) => {
      log.error(`[run] release on interrupt failed: ${errorMessage(error)}`);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  const startedAt = Date.now();
  try {
    const plan = planPrompts(opts);
    if (plan.needsPrompter) {
      prompter = createReadlinePrompter();
    }

    if (plan.intro) process.stdout.write('\nDefault metadata for all pins (Enter to leave empty):\n');
    const prepared = await prepareRun({
      configPath: opts.config,
      configExplicit,
      csvPath: opts.csv,
      cli: { board: opts.board, images: opts.images, headless: opts.headless },
      ask: plan.ask && prompter ? prompter.ask : undefined,
    });

    const endpoints = getEndpoints();
    const runtime = getRuntimeSettings();
    const actionTimeoutMs = prepared.config.elementTimeoutSeconds * 1000;
    session = new SessionController({
      loginUrl: endpoints.loginUrl,
      driver: createPlaywrightSessionDriver({
        launchTimeoutMs: runtime.browserLaunchTimeoutMs,
        navigationTimeoutMs: prepared.config.publishTimeoutSeconds * 1000,
        actionTimeoutMs,
      }),
      pollIntervalMs: prepared.config.pollIntervalMs,
      launchRetries: runtime.browserLaunchRetries,
      launchRetryDelayMs: runtime.browserLaunchRetryDelayMs,
    });

    const confirmPrompter = opts.confirmLogin ? prompter : null;
    const result = await executeRun(prepared, {
      session,
      signal: abortController.signal,
      onPhase: (next) => {
        phase = next;
        if (next === 'login') {
          process.stdout.write(
            `\nLog in to Pinterest in the opened browser (waiting ${prepared.config.loginWaitSeconds}s)...\n`,
          );
        }
      },
      confirmLogin: confirmPrompter
        ? () => confirmYes(confirmPrompter.ask, 'Are you logged in? (y/n): ')
        : undefined,
      createPoster: (browserSession) => {
        const artifactsDir = createDebugRunDir('pin_failures', process.env.PINPOST_RUN_ID);
        const driver = new PlaywrightPinBuilder(browserSession.page, {
          pinBuilderUrl: endpoints.pinBuilderUrl,
          artifactsDir,
          navigationTimeoutMs: prepared.config.publishTimeoutSeconds * 1000,
        });
        return new ItemPoster(driver, buildItemPosterOptions(prepared.config));
      },
    });

    for (const line of formatBatchSummary(result)) {
      log.info(line);
    }
    if (opts.report) {
      const reportPath = writeBatchReport(result, opts.report);
      log.info(`[report] written: ${reportPath}`);
    }
    log.logStructured('run_end', { counts: result.counts, abort: result.abort ?? null });
    log.logTiming('run_complete', startedAt);
    return exitCodeForResult(result);
  } catch (error) {
    const failure = classifyRunFailure(error);
    log.error(`[run] fatal category=${failure.category}: ${errorMessage(error)}`);
    log.logStructured('run_failed', { category: failure.category, message: errorMessage(error) });
    return failure.exitCode;
  } finally {
    prompter?.close();
    if (session) await session.release();
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }
}

const program = new Command();

program
  .name('pin-poster')
  .description('Pinterest 핀 일괄 등록 도구 (이미지 폴더 + 선택적 CSV 메타데이터)')
  .version('1.0.0');

program
  .option('--config <path>', '설정 파일 경로', DEFAULT_CONFIG_FILE)
  .option('--csv <path>', '이미지별 메타데이터 CSV (filename,title,description[,link,board])')
  .option('--headless', '헤드리스 모드로 브라우저 실행')
  .option('--board <name>', '기본 보드명 (설정 파일 값보다 우선, CSV 행보다는 후순위)')
  .option('--images <path>', '이미지 폴더 경로')
  .option('--report <path>', '실행 결과 JSON 리포트 경로')
  .option('--confirm-login', '로그인 대기 시간 초과 시 로그인 여부를 직접 확인')
  .option('--no-prompt', '기본 메타데이터를 대화형으로 묻지 않음')
  .action(async (opts: PostPinsCliOptions) => {
    const configExplicit = program.getOptionValueSource('config') === 'cli';
    const exitCode = await runPostPins(opts, configExplicit);
    process.exit(exitCode);
  });

if (require.main === module) {
  program.parse(process.argv);
}

import * as fs from 'fs';
import * as path from 'path';
import type { BatchResult, JobOutcome } from './types';

const RULE = '='.repeat(60);

export function formatSummaryLine(result: BatchResult): string {
  const { counts } = result;
  return `COMPLETED: ${counts.succeeded} posted | ${counts.failed} failed | ${counts.unknown} unknown | ` +
    `${counts.skipped} skipped | ${counts.total} total`;
}

function describeOutcome(outcome: JobOutcome): string | null {
  switch (outcome.status.kind) {
    case 'succeeded':
      return null;
    case 'failed':
      return `FAILED   ${outcome.filename}: ${outcome.status.reason} (state=${outcome.status.state})`;
    case 'unknown':
      return `UNKNOWN  ${outcome.filename}: ${outcome.status.reason} (check manually)`;
    case 'skipped':
      return `SKIPPED  ${outcome.filename}: ${outcome.status.reason}`;
  }
}

/** 콘솔 출력용 요약 블록. 성공하지 않은 항목은 파일명과 사유를 한 줄씩 */
export function formatBatchSummary(result: BatchResult): string[] {
  const lines = [RULE, `  ${formatSummaryLine(result)}`];
  if (result.abort) {
    lines.push(`  ABORTED (${result.abort.kind}): ${result.abort.reason}`);
  }
  lines.push(RULE);
  for (const outcome of result.outcomes) {
    const line = describeOutcome(outcome);
    if (line) lines.push(`  ${line}`);
  }
  return lines;
}

export type BatchReportFile = {
  version: 1;
  startedAt: string;
  finishedAt: string;
  counts: BatchResult['counts'];
  abort: BatchResult['abort'] | null;
  items: Array<{
    filename: string;
    imagePath: string;
    boardName: string | null;
    status: JobOutcome['status']['kind'];
    reason: string | null;
    attempts: number;
    elapsedMs: number;
  }>;
};

export function buildBatchReport(result: BatchResult): BatchReportFile {
  return {
    version: 1,
    startedAt: result.startedAt,
    finishedAt: result.finishedAt,
    counts: result.counts,
    abort: result.abort ?? null,
    items: result.outcomes.map((outcome) => ({
      filename: outcome.filename,
      imagePath: outcome.imagePath,
      boardName: outcome.job?.boardName ?? null,
      status: outcome.status.kind,
      reason: outcome.status.kind === 'succeeded' ? null : outcome.status.reason,
      attempts: outcome.attempts,
      elapsedMs: outcome.elapsedMs,
    })),
  };
}

export function writeBatchReport(result: BatchResult, reportPath: string): string {
  const resolved = path.resolve(reportPath);
  fs.mkdirSync(path.dirname(resolved), { recursive: true });
  fs.writeFileSync(resolved, JSON.stringify(buildBatchReport(result), null, 2), 'utf-8');
  return resolved;
}

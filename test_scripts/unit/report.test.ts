import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { buildBatchReport, formatBatchSummary, formatSummaryLine, writeBatchReport } from '../../src/pinterest/report';
import type { BatchResult } from '../../src/pinterest/types';

const result: BatchResult = {
  outcomes: [
    {
      filename: 'a.jpg',
      imagePath: '/imgs/a.jpg',
      job: { imagePath: '/imgs/a.jpg', filename: 'a.jpg', title: 'A', description: 'Desc', boardName: 'Travel' },
      status: { kind: 'succeeded' },
      attempts: 1,
      elapsedMs: 1200,
    },
    {
      filename: 'b.jpg',
      imagePath: '/imgs/b.jpg',
      status: { kind: 'skipped', reason: 'missing required field: title' },
      attempts: 0,
      elapsedMs: 0,
    },
    {
      filename: 'c.jpg',
      imagePath: '/imgs/c.jpg',
      job: { imagePath: '/imgs/c.jpg', filename: 'c.jpg', title: 'C', description: 'Desc', boardName: 'Nonexistent' },
      status: { kind: 'failed', reason: 'board not found: Nonexistent', state: 'BOARD_SELECTING' },
      attempts: 1,
      elapsedMs: 800,
    },
    {
      filename: 'd.jpg',
      imagePath: '/imgs/d.jpg',
      job: { imagePath: '/imgs/d.jpg', filename: 'd.jpg', title: 'D', description: 'Desc', boardName: 'Travel' },
      status: { kind: 'unknown', reason: 'submission timeout' },
      attempts: 1,
      elapsedMs: 60000,
    },
  ],
  counts: { total: 4, succeeded: 1, failed: 1, unknown: 1, skipped: 1 },
  startedAt: '2026-03-01T10:00:00.000Z',
  finishedAt: '2026-03-01T10:02:00.000Z',
};

describe('batch report', () => {
  test('요약 한 줄', () => {
    expect(formatSummaryLine(result)).toBe('COMPLETED: 1 posted | 1 failed | 1 unknown | 1 skipped | 4 total');
  });

  test('성공하지 않은 항목만 사유와 함께 나열한다', () => {
    const rule = '='.repeat(60);
    expect(formatBatchSummary(result)).toEqual([
      rule,
      '  COMPLETED: 1 posted | 1 failed | 1 unknown | 1 skipped | 4 total',
      rule,
      '  SKIPPED  b.jpg: missing required field: title',
      '  FAILED   c.jpg: board not found: Nonexistent (state=BOARD_SELECTING)',
      '  UNKNOWN  d.jpg: submission timeout (check manually)',
    ]);
  });

  test('abort line is shown under the summary', () => {
    const lines = formatBatchSummary({ ...result, abort: { kind: 'session_lost', reason: '[SESSION_LOST] page has been closed' } });
    expect(lines[2]).toBe('  ABORTED (session_lost): [SESSION_LOST] page has been closed');
  });

  test('JSON 리포트 파일', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'pin-report-'));
    const written = writeBatchReport(result, path.join(dir, 'nested', 'report.json'));

    const parsed: unknown = JSON.parse(fs.readFileSync(written, 'utf-8'));
    expect(parsed).toEqual(buildBatchReport(result));
    expect(buildBatchReport(result).abort).toBeNull();
    expect(buildBatchReport(result).items[1]).toEqual({
      filename: 'b.jpg',
      imagePath: '/imgs/b.jpg',
      boardName: null,
      status: 'skipped',
      reason: 'missing required field: title',
      attempts: 0,
      elapsedMs: 0,
    });
    expect(buildBatchReport(result).items[0].reason).toBeNull();
  });
});

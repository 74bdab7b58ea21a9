import { exitCodeForResult, planPrompts } from '../../src/cli/post_pins';
import type { BatchResult } from '../../src/pinterest/types';

function result(abort?: BatchResult['abort']): BatchResult {
  return {
    outcomes: [],
    counts: { total: 0, succeeded: 0, failed: 0, unknown: 0, skipped: 0 },
    ...(abort ? { abort } : {}),
    startedAt: '2026-01-01T00:00:00.000Z',
    finishedAt: '2026-01-01T00:00:01.000Z',
  };
}

describe('post_pins CLI', () => {
  test('--csv가 있어도 프롬프트를 만들고 ask를 넘긴다 (보드 질문용)', () => {
    expect(planPrompts({ prompt: true, csv: 'meta.csv' })).toEqual({ ask: true, intro: false, needsPrompter: true });
  });

  test('without a CSV the default-metadata intro is printed', () => {
    expect(planPrompts({ prompt: true })).toEqual({ ask: true, intro: true, needsPrompter: true });
  });

  test('--no-prompt asks nothing; --confirm-login still needs a prompter', () => {
    expect(planPrompts({ prompt: false, csv: 'meta.csv' })).toEqual({ ask: false, intro: false, needsPrompter: false });
    expect(planPrompts({ prompt: false, confirmLogin: true })).toEqual({ ask: false, intro: false, needsPrompter: true });
  });

  test('exit codes', () => {
    expect(exitCodeForResult(result())).toBe(0);
    expect(exitCodeForResult(result({ kind: 'session_lost', reason: 'page closed' }))).toBe(1);
    expect(exitCodeForResult(result({ kind: 'interrupted', reason: 'operator abort' }))).toBe(130);
  });
});

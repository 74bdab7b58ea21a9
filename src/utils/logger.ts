import * as fs from 'fs';
import * as path from 'path';
import type { Page } from 'playwright';
import { writeLog } from '../common/logger';

const MODULE_NAME = 'pinterest';

export function info(msg: string): void {
  writeLog('INFO', MODULE_NAME, msg);
}

export function warn(msg: string): void {
  writeLog('WARN', MODULE_NAME, msg);
}

export function error(msg: string): void {
  writeLog('ERROR', MODULE_NAME, msg);
}

export function step(current: number, total: number, msg: string): void {
  writeLog('STEP', MODULE_NAME, `[${current}/${total}] ${msg}`);
}

export function logTiming(stepName: string, startedAtMs: number): void {
  info(`[timing] step=${stepName} elapsed=${((Date.now() - startedAtMs) / 1000).toFixed(1)}s`);
}

/** artifacts 디렉토리에 스크린샷/HTML 덤프를 저장한다 */
export function artifactPath(artifactsDir: string, prefix: string, ext: string): string {
  fs.mkdirSync(artifactsDir, { recursive: true });
  const ts = new Date().toISOString().replace(/[:.]/g, '').slice(0, 15);
  return path.join(artifactsDir, `${prefix}_${ts}.${ext}`);
}

export async function captureFailure(
  page: Page,
  stepName: string,
  artifactsDir: string,
): Promise<void> {
  try {
    const screenshotPath = artifactPath(artifactsDir, `fail_${stepName}`, 'png');
    await page.screenshot({ path: screenshotPath, fullPage: true });
    error(`Screenshot saved: ${screenshotPath}`);
  } catch (e) {
    error(`Failed to capture screenshot: ${e}`);
  }

  try {
    const htmlPath = artifactPath(artifactsDir, `fail_${stepName}`, 'html');
    const html = await page.content();
    fs.writeFileSync(htmlPath, html, 'utf-8');
    error(`HTML dump saved: ${htmlPath}`);
  } catch (e) {
    error(`Failed to capture HTML: ${e}`);
  }
}

// ── 구조화 JSON 로그 헬퍼 ─────────────────────────────────────────

export type StructuredLogPayload = Record<string, unknown>;

export function getRunContext(): { run_id: string } {
  return { run_id: process.env.PINPOST_RUN_ID ?? 'none' };
}

export function sanitizeLogPayload(data: StructuredLogPayload): StructuredLogPayload {
  const parsed: unknown = JSON.parse(
    JSON.stringify(data, (key, val: unknown) => {
      if (typeof val === 'string' && /^(cookie_value|token_value|session_token|password)$/.test(key)) {
        return '[REDACTED]';
      }
      return val;
    }),
  );
  return typeof parsed === 'object' && parsed !== null ? { ...parsed } : {};
}

export function logStructured(event: string, data: StructuredLogPayload): void {
  const payload = sanitizeLogPayload({ ...getRunContext(), ...data });
  info(`${event}: ${JSON.stringify(payload)}`);
}

export function progressBar(current: number, total: number, width: number = 40): string {
  const ratio = total > 0 ? Math.min(1, Math.max(0, current / total)) : 0;
  const filled = Math.floor(width * ratio);
  const bar = '█'.repeat(filled) + '░'.repeat(width - filled);
  return `|${bar}| ${current}/${total} (${Math.round(ratio * 100)}%)`;
}

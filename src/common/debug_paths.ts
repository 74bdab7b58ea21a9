import * as fs from 'fs';
import * as path from 'path';
import { getCurrentLogDir } from './logger';

function timestamp(now: Date = new Date()): string {
  return now.toISOString().replace(/[:.]/g, '-');
}

/** 실패 스크린샷/HTML 덤프가 쌓이는 루트. PINPOST_ARTIFACTS_DIR로 덮어쓸 수 있다 */
export function getDebugRootDir(name: string, now: Date = new Date()): string {
  const override = (process.env.PINPOST_ARTIFACTS_DIR || '').trim();
  if (override) return path.resolve(override, name);
  return path.resolve(path.join(getCurrentLogDir(now), name));
}

export function ensureDebugRootDir(name: string, now: Date = new Date()): string {
  const root = getDebugRootDir(name, now);
  fs.mkdirSync(root, { recursive: true });
  return root;
}

export function sanitizeDirSuffix(raw: string): string {
  return raw.replace(/[^a-zA-Z0-9._-]+/g, '_').replace(/^_+|_+$/g, '').slice(0, 60);
}

export function createDebugRunDir(name: string, suffix?: string, now: Date = new Date()): string {
  const root = ensureDebugRootDir(name, now);
  const cleaned = suffix ? sanitizeDirSuffix(suffix) : '';
  const folderName = cleaned ? `${timestamp(now)}_${cleaned}` : timestamp(now);
  const runDir = path.join(root, folderName);
  fs.mkdirSync(runDir, { recursive: true });
  return runDir;
}

import * as path from 'path';
import { compareByFilename, isSupportedImage } from '../utils/image_discovery';
import type {
  DefaultMetadata,
  MetadataOverrideRecord,
  PostJob,
  SkippedJob,
} from './types';

export type ResolveInput = {
  images: readonly string[];
  defaults: DefaultMetadata;
  overrides?: readonly MetadataOverrideRecord[];
};

export type ResolveResult = {
  jobs: PostJob[];
  skipped: SkippedJob[];
  warnings: string[];
};

export const MISSING_REQUIRED_FIELD = 'missing required field';

function pick(override: string | undefined, fallback: string): string {
  const value = (override ?? '').trim();
  return value.length > 0 ? value : fallback.trim();
}

/** filename → 레코드. 같은 filename이 반복되면 마지막 행이 이긴다 */
export function indexOverrides(records: readonly MetadataOverrideRecord[]): {
  byFilename: Map<string, MetadataOverrideRecord>;
  duplicates: string[];
} {
  const byFilename = new Map<string, MetadataOverrideRecord>();
  const duplicates: string[] = [];
  for (const record of records) {
    if (byFilename.has(record.filename) && !duplicates.includes(record.filename)) {
      duplicates.push(record.filename);
    }
    byFilename.set(record.filename, record);
  }
  return { byFilename, duplicates };
}

/**
 * 이미지 목록과 기본값, CSV override를 필드 단위로 병합해 PostJob 목록을 만든다.
 * 필수 필드(title, description, board)가 비면 잡에서 제외하고 사유를 남긴다.
 */
export function resolvePostJobs(input: ResolveInput): ResolveResult {
  const images = input.images.filter((imagePath) => isSupportedImage(imagePath)).sort(compareByFilename);
  const { byFilename, duplicates } = indexOverrides(input.overrides ?? []);
  const warnings: string[] = duplicates.map(
    (filename) => `duplicate metadata rows for ${filename}: last row wins`,
  );

  const jobs: PostJob[] = [];
  const skipped: SkippedJob[] = [];
  const seen = new Set<string>();

  for (const imagePath of images) {
    const filename = path.basename(imagePath);
    seen.add(filename);
    const override = byFilename.get(filename);

    const title = pick(override?.title, input.defaults.title);
    const description = pick(override?.description, input.defaults.description);
    const link = pick(override?.link, input.defaults.link);
    const boardName = pick(override?.board, input.defaults.boardName);

    const missing: string[] = [];
    if (!title) missing.push('title');
    if (!description) missing.push('description');
    if (!boardName) missing.push('board');
    if (missing.length > 0) {
      skipped.push({ imagePath, filename, reason: `${MISSING_REQUIRED_FIELD}: ${missing.join(', ')}` });
      continue;
    }

    jobs.push(Object.freeze({
      imagePath,
      filename,
      title,
      description,
      ...(link ? { link } : {}),
      boardName,
    }));
  }

  for (const filename of byFilename.keys()) {
    if (!seen.has(filename)) {
      warnings.push(`metadata row for ${filename} has no matching image`);
    }
  }

  return { jobs, skipped, warnings };
}

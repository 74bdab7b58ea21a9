import * as fs from 'fs';
import * as path from 'path';
import * as log from './logger';
import { ImagesFolderError } from '../common/errors';

export const SUPPORTED_IMAGE_EXTENSIONS: ReadonlySet<string> = new Set([
  '.jpg',
  '.jpeg',
  '.png',
  '.gif',
  '.webp',
  '.bmp',
  '.tiff',
]);

export function isSupportedImage(filePath: string): boolean {
  return SUPPORTED_IMAGE_EXTENSIONS.has(path.extname(filePath).toLowerCase());
}

/** basename 기준 코드 유닛 순서 정렬 (로케일 무관, 안정 정렬) */
export function compareByFilename(a: string, b: string): number {
  const left = path.basename(a);
  const right = path.basename(b);
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

/**
 * 폴더 내 지원 확장자 이미지를 파일명 순으로 반환한다.
 * 폴더가 없거나 이미지가 하나도 없으면 시작 단계 오류.
 */
export function discoverImages(folderPath: string): string[] {
  const folder = path.resolve(folderPath);
  if (!fs.existsSync(folder) || !fs.statSync(folder).isDirectory()) {
    throw new ImagesFolderError(folder, 'missing');
  }

  const images = fs.readdirSync(folder, { withFileTypes: true })
    .filter((entry) => entry.isFile() && isSupportedImage(entry.name))
    .map((entry) => path.join(folder, entry.name))
    .sort(compareByFilename);

  if (images.length === 0) {
    throw new ImagesFolderError(folder, 'empty');
  }
  log.info(`[images] found ${images.length} image(s) in ${folder}`);
  return images;
}

import * as fs from 'fs';
import * as path from 'path';
import * as log from './logger';
import { CsvSyntaxError, parseCsv } from './csv';
import { MetadataInputError } from '../common/errors';
import type { MetadataOverrideRecord } from '../pinterest/types';

export const REQUIRED_CSV_COLUMNS = ['filename', 'title', 'description'] as const;
export const OPTIONAL_CSV_COLUMNS = ['link', 'board'] as const;

type CsvColumn = typeof REQUIRED_CSV_COLUMNS[number] | typeof OPTIONAL_CSV_COLUMNS[number];

function buildColumnIndex(header: string[], csvPath: string): Map<CsvColumn, number> {
  const normalized = header.map((name) => name.trim().toLowerCase());
  const index = new Map<CsvColumn, number>();
  for (const column of [...REQUIRED_CSV_COLUMNS, ...OPTIONAL_CSV_COLUMNS]) {
    const at = normalized.indexOf(column);
    if (at >= 0) index.set(column, at);
  }
  const missing = REQUIRED_CSV_COLUMNS.filter((column) => !index.has(column));
  if (missing.length > 0) {
    throw new MetadataInputError(csvPath, `missing required header column(s): ${missing.join(', ')}`);
  }
  return index;
}

function cell(row: string[], index: Map<CsvColumn, number>, column: CsvColumn): string | undefined {
  const at = index.get(column);
  if (at === undefined) return undefined;
  const value = (row[at] ?? '').trim();
  return value.length > 0 ? value : undefined;
}

/** CSV 텍스트를 override 레코드로 변환한다. filename은 basename으로 줄인다 */
export function parseMetadataCsv(text: string, csvPath: string): MetadataOverrideRecord[] {
  let rows: string[][];
  try {
    rows = parseCsv(text);
  } catch (error) {
    if (error instanceof CsvSyntaxError) {
      throw new MetadataInputError(csvPath, error.message);
    }
    throw error;
  }
  if (rows.length === 0) {
    throw new MetadataInputError(csvPath, 'missing header row');
  }

  const [header, ...body] = rows;
  const index = buildColumnIndex(header, csvPath);
  const records: MetadataOverrideRecord[] = [];
  for (const row of body) {
    const rawFilename = cell(row, index, 'filename');
    if (!rawFilename) continue;
    const record: MetadataOverrideRecord = { filename: path.basename(rawFilename) };
    const title = cell(row, index, 'title');
    const description = cell(row, index, 'description');
    const link = cell(row, index, 'link');
    const board = cell(row, index, 'board');
    if (title) record.title = title;
    if (description) record.description = description;
    if (link) record.link = link;
    if (board) record.board = board;
    records.push(record);
  }
  return records;
}

export function loadMetadataOverrides(csvPath: string): MetadataOverrideRecord[] {
  const resolvedPath = path.resolve(csvPath);
  if (!fs.existsSync(resolvedPath)) {
    throw new MetadataInputError(resolvedPath, 'file not found');
  }
  const records = parseMetadataCsv(fs.readFileSync(resolvedPath, 'utf-8'), resolvedPath);
  log.info(`[csv] loaded ${records.length} metadata row(s) from ${resolvedPath}`);
  return records;
}

// ────────────────────────────────────────────
// RFC 4180 CSV 파서 (따옴표 필드, "" 이스케이프, CRLF)
// ────────────────────────────────────────────

export class CsvSyntaxError extends Error {
  readonly line: number;

  constructor(line: number, detail: string) {
    super(`[CSV_SYNTAX] line=${line} ${detail}`);
    this.line = line;
  }
}

/** 레코드 배열을 반환한다. 완전히 빈 줄은 건너뛴다 */
export function parseCsv(text: string): string[][] {
  const input = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;
  let fieldWasQuoted = false;
  let line = 1;

  const pushField = (): void => {
    row.push(fieldWasQuoted ? field : field.trim());
    field = '';
    fieldWasQuoted = false;
  };
  const pushRow = (): void => {
    pushField();
    if (!(row.length === 1 && row[0] === '')) {
      rows.push(row);
    }
    row = [];
  };

  for (let i = 0; i < input.length; i++) {
    const ch = input[i];
    if (inQuotes) {
      if (ch === '"') {
        if (input[i + 1] === '"') {
          field += '"';
          i += 1;
        } else {
          inQuotes = false;
        }
      } else {
        if (ch === '\n') line += 1;
        field += ch;
      }
      continue;
    }

    if (ch === '"') {
      if (field.trim().length > 0) {
        throw new CsvSyntaxError(line, 'unexpected quote inside unquoted field');
      }
      field = '';
      inQuotes = true;
      fieldWasQuoted = true;
    } else if (ch === ',') {
      pushField();
    } else if (ch === '\r') {
      if (input[i + 1] === '\n') i += 1;
      pushRow();
      line += 1;
    } else if (ch === '\n') {
      pushRow();
      line += 1;
    } else if (fieldWasQuoted) {
      if (ch.trim().length > 0) {
        throw new CsvSyntaxError(line, 'unexpected character after closing quote');
      }
    } else {
      field += ch;
    }
  }

  if (inQuotes) {
    throw new CsvSyntaxError(line, 'unterminated quoted field');
  }
  if (field.length > 0 || fieldWasQuoted || row.length > 0) {
    pushRow();
  }
  return rows;
}

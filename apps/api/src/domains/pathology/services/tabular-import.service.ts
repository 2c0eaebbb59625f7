// ============================================================================
// Pathology Reporting: Tabular Import
// Delimited text (CSV, TSV, pipe) and .xlsx workbooks to raw records keyed by
// header.
// ============================================================================

import * as XLSX from 'xlsx';
import type { RawRecord } from './normalizer.service.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface TabularParseResult {
  delimiter: string;
  headers: string[];
  records: RawRecord[];
}

export interface WorkbookParseResult {
  /** Name of the sheet that was read, `null` for a workbook without sheets */
  sheetName: string | null;
  records: RawRecord[];
}

const BOM = '\uFEFF';

/** Candidate delimiters in tie-break order. */
const DELIMITERS = [',', '\t', '|'] as const;

const LEADING_BLANK_LINES = /^(?:[ \t]*\r?\n)+/;

// ---------------------------------------------------------------------------
// Delimiter detection
// ---------------------------------------------------------------------------

/**
 * Pick the delimiter that occurs most often, outside quotes, in the header
 * record. Comma wins ties and is the answer when no candidate occurs.
 */
export function detectDelimiter(text: string): string {
  const counts = new Map<string, number>(DELIMITERS.map((d) => [d, 0]));
  let quoted = false;

  for (const char of text.replace(LEADING_BLANK_LINES, '')) {
    if (char === '"') {
      quoted = !quoted;
    } else if (!quoted && (char === '\n' || char === '\r')) {
      break;
    } else if (!quoted) {
      const seen = counts.get(char);
      if (seen !== undefined) counts.set(char, seen + 1);
    }
  }

  let best = ',';
  let bestCount = 0;
  for (const [delimiter, count] of counts) {
    if (count > bestCount) {
      best = delimiter;
      bestCount = count;
    }
  }
  return best;
}

// ---------------------------------------------------------------------------
// Record scanning
// ---------------------------------------------------------------------------

/**
 * Scan delimited text into records of trimmed cells. Double-quoted cells may
 * hold the delimiter, line breaks and `""` escapes; `\n` and `\r\n` end a
 * record only outside quotes.
 */
export function scanRecords(text: string, delimiter: string): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let cell = '';
  let quoted = false;

  const endCell = () => {
    record.push(cell.trim());
    cell = '';
  };
  const endRecord = () => {
    endCell();
    records.push(record);
    record = [];
  };

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (quoted) {
      if (char !== '"') {
        cell += char;
      } else if (text[i + 1] === '"') {
        cell += '"';
        i++;
      } else {
        quoted = false;
      }
      continue;
    }

    if (char === '"') {
      quoted = true;
    } else if (char === delimiter) {
      endCell();
    } else if (char === '\n') {
      endRecord();
    } else if (char === '\r' && text[i + 1] === '\n') {
      endRecord();
      i++;
    } else {
      cell += char;
    }
  }

  if (cell !== '' || record.length > 0) {
    endRecord();
  }

  return records;
}

/** Cells of a single line, e.g. one line of an oracle answer. */
export function splitDelimitedLine(line: string, delimiter: string): string[] {
  return scanRecords(line, delimiter)[0] ?? [''];
}

function isBlankRecord(cells: readonly string[]): boolean {
  return cells.length === 1 && cells[0] === '';
}

// ---------------------------------------------------------------------------
// Parse delimited text
// ---------------------------------------------------------------------------

export function parseTabularText(content: string): TabularParseResult {
  const text = content.startsWith(BOM) ? content.slice(BOM.length) : content;
  const delimiter = detectDelimiter(text);
  const [headers, ...rows] = scanRecords(text, delimiter).filter((r) => !isBlankRecord(r));

  if (headers === undefined) {
    return { delimiter, headers: [], records: [] };
  }

  const records = rows.map((cells) => {
    const record: Record<string, string> = {};
    headers.forEach((header, index) => {
      // A repeated header keeps its first cell
      if (!Object.hasOwn(record, header)) {
        record[header] = cells[index] ?? '';
      }
    });
    return record;
  });

  return { delimiter, headers, records };
}

// ---------------------------------------------------------------------------
// Parse workbook
// ---------------------------------------------------------------------------

/**
 * Rows of the first sheet, keyed by the sheet's header row. Empty cells come
 * through as `""`; numbers and booleans keep their cell type.
 */
export function parseWorkbook(data: Buffer): WorkbookParseResult {
  const workbook = XLSX.read(data, { type: 'buffer' });
  const [sheetName] = workbook.SheetNames;
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];

  if (sheetName === undefined || sheet === undefined) {
    return { sheetName: null, records: [] };
  }

  return {
    sheetName,
    records: XLSX.utils.sheet_to_json<Record<string, unknown>>(sheet, { defval: '' }),
  };
}

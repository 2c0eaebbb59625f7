// ============================================================================
// Pathology Reporting: Normalizer
// Maps raw rows onto the three required fields, tags admission mode, and
// drops rows that cannot be aggregated or classified.
// ============================================================================

import {
  AdmissionTag,
  INPATIENT_MARKER,
  INPUT_COLUMN_ALIASES,
  InputField,
} from '@labtally/shared/constants/pathology.constants.js';
import {
  canonicalizeHeader,
  cellText,
  containsIgnoreCase,
} from '@labtally/shared/utils/text.utils.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** One uploaded row, keyed by the header text as written in the source. */
export type RawRecord = Readonly<Record<string, unknown>>;

/** One test order after normalization. Text fields are kept verbatim. */
export interface CleanRecord {
  rowIndex: number;
  testName: string;
  admissionMode: string;
  admissionTag: AdmissionTag;
  subgroup: string;
}

export interface DroppedRow {
  rowIndex: number;
  missingFields: InputField[];
}

export interface NormalizationResult {
  records: CleanRecord[];
  droppedCount: number;
  dropped: DroppedRow[];
}

const REQUIRED_FIELDS: readonly InputField[] = [
  InputField.TEST_NAME,
  InputField.ADMISSION_MODE,
  InputField.SUBGROUP,
];

// ---------------------------------------------------------------------------
// Admission tag
// ---------------------------------------------------------------------------

export function toAdmissionTag(admissionMode: string | null | undefined): AdmissionTag {
  const text = (admissionMode ?? '').trim();
  return containsIgnoreCase(text, INPATIENT_MARKER)
    ? AdmissionTag.INPATIENT
    : AdmissionTag.OUTPATIENT_INDENT;
}

// ---------------------------------------------------------------------------
// Column lookup
// ---------------------------------------------------------------------------

/**
 * Resolve which header of a row carries each field. The first header (in the
 * row's key order) whose canonical form is a known alias wins.
 */
export function matchColumns(headers: readonly string[]): Partial<Record<InputField, string>> {
  const matched: Partial<Record<InputField, string>> = {};

  for (const header of headers) {
    const canonical = canonicalizeHeader(header);
    for (const field of REQUIRED_FIELDS) {
      if (matched[field] === undefined && INPUT_COLUMN_ALIASES[field].includes(canonical)) {
        matched[field] = header;
      }
    }
  }

  return matched;
}

function readField(
  row: RawRecord,
  columns: Partial<Record<InputField, string>>,
  field: InputField,
): string | null {
  const header = columns[field];
  return header === undefined ? null : cellText(row[header]);
}

// ---------------------------------------------------------------------------
// Normalize
// ---------------------------------------------------------------------------

export function normalize(rawRecords: readonly RawRecord[]): NormalizationResult {
  const records: CleanRecord[] = [];
  const dropped: DroppedRow[] = [];

  rawRecords.forEach((row, rowIndex) => {
    const columns = matchColumns(Object.keys(row));

    const testName = readField(row, columns, InputField.TEST_NAME);
    const admissionMode = readField(row, columns, InputField.ADMISSION_MODE);
    const subgroup = readField(row, columns, InputField.SUBGROUP);

    if (testName === null || admissionMode === null || subgroup === null) {
      const missingFields: InputField[] = [];
      if (testName === null) missingFields.push(InputField.TEST_NAME);
      if (admissionMode === null) missingFields.push(InputField.ADMISSION_MODE);
      if (subgroup === null) missingFields.push(InputField.SUBGROUP);
      dropped.push({ rowIndex, missingFields });
      return;
    }

    records.push({
      rowIndex,
      testName,
      admissionMode,
      admissionTag: toAdmissionTag(admissionMode),
      subgroup,
    });
  });

  return { records, droppedCount: dropped.length, dropped };
}

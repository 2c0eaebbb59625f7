// ============================================================================
// Pathology Reporting: Constants
// ============================================================================

// --- Admission Tags ---

export const AdmissionTag = {
  /** Admitted patient (booking mode mentions IPD) */
  INPATIENT: 'IPD',
  /** Everything else, including blank or unrecognised booking modes */
  OUTPATIENT_INDENT: 'OPD Indent',
} as const;

export type AdmissionTag = (typeof AdmissionTag)[keyof typeof AdmissionTag];

/** Case-insensitive marker that tags a booking mode as inpatient. */
export const INPATIENT_MARKER = 'IPD';

// --- Clinical Categories (ordered) ---

export const Category = {
  BIOCHEMISTRY: 'Biochemistry',
  CLINICAL: 'Clinical',
  HEMATOLOGY: 'Hematology',
  IMMUNOLOGY: 'Immunology',
} as const;

export type Category = (typeof Category)[keyof typeof Category];

// --- Keyword Rules ---

export interface CategoryRule {
  readonly category: string;
  readonly keywords: readonly string[];
}

/**
 * Ordered keyword rules. Order is significant: when a test matches keywords
 * from more than one category, the earliest entry wins.
 */
export const DEFAULT_CATEGORY_RULES: readonly CategoryRule[] = [
  {
    category: Category.BIOCHEMISTRY,
    keywords: [
      'RENAL FUNCTION TEST',
      'LIVER FUNCTION TEST',
      'BLOOD GLUCOSE',
      'GLYCOSYLATED HB',
      'SGOT',
      'SGPT',
      'BLOOD UREA',
      'VIRAL MARKER',
      'PREOPERATIVE PROFILE',
      'SEROLOGY',
      'PT/INR',
    ],
  },
  {
    category: Category.CLINICAL,
    keywords: [
      'URINE ANALYSIS',
      'PLEURAL FLUID EXAMINATION',
      'Plural Fluid for R/E Biochemistry / ADA',
    ],
  },
  {
    category: Category.HEMATOLOGY,
    keywords: [
      'COMPLETE BLOOD COUNTS [CBC]',
      'CBC',
      'TOTAL LEUCOCYTE COUNT',
      'FLUID DLC',
      'COMPLETE HEMOGRAM WITH ESR',
      'BLOOD GROUP',
    ],
  },
  {
    category: Category.IMMUNOLOGY,
    keywords: [
      'Hormone Assays Report',
      'Serum IGE',
      'VDRL TITER',
      'HBsAg',
      'HCV ANTIBODY TEST',
      'CA-125',
      'THYROID FUNCTION TEST',
      'THYROID STIMULATING HORMONE',
      'TOTAL THYROID PROFILE',
      'IgG IgM S Typhe',
      'C-REACTIVE PROTEIN',
    ],
  },
];

/** Category given to records that neither a rule nor the oracle resolved. */
export const DEFAULT_FALLBACK_CATEGORY: Category = Category.BIOCHEMISTRY;

// --- Classification Sources ---

export const ClassificationSource = {
  RULE: 'rule',
  ORACLE: 'oracle',
  DEFAULT: 'default',
} as const;

export type ClassificationSource =
  (typeof ClassificationSource)[keyof typeof ClassificationSource];

// --- Oracle Status (per run) ---

export const OracleStatus = {
  /** Every record matched a rule; the oracle was not consulted */
  NOT_NEEDED: 'not_needed',
  /** No oracle configured */
  DISABLED: 'disabled',
  /** Oracle replied (coverage may be partial) */
  ANSWERED: 'answered',
  /** Oracle threw, timed out, or was unreachable */
  FAILED: 'failed',
} as const;

export type OracleStatus = (typeof OracleStatus)[keyof typeof OracleStatus];

// --- Input Columns ---

export const InputField = {
  TEST_NAME: 'testName',
  ADMISSION_MODE: 'admissionMode',
  SUBGROUP: 'subgroup',
} as const;

export type InputField = (typeof InputField)[keyof typeof InputField];

/**
 * Accepted header spellings per field, already canonicalised
 * (whitespace removed, lower case).
 */
export const INPUT_COLUMN_ALIASES: Readonly<Record<InputField, readonly string[]>> = {
  testName: ['testname', 'test_name'],
  admissionMode: ['bookingmode', 'booking_mode', 'admissionmode', 'admission_mode'],
  subgroup: ['subgroup', 'sub_group'],
};

// --- Report Labels ---

export const GRAND_TOTAL_LABEL = 'Grand Total';

export const REPORT_TITLE = 'DAILY PATHOLOGY REPORT';

export const CATEGORY_SECTION_TITLE = 'Category Counts';

export const REPORT_DOWNLOAD_FILENAME = 'daily_pathology_report.csv';

export const DECISION_LOG_FILENAME = 'classification_decisions.csv';

// --- Limits ---

/** Oracle latency budget in milliseconds */
export const ORACLE_TIMEOUT_MS = 10_000;

/** Completion token cap for one oracle batch */
export const ORACLE_MAX_TOKENS = 800;

/** Upper bound on rows accepted in one JSON report request */
export const MAX_REPORT_ROWS = 50_000;

/** Upload size cap for tabular files (10 MB) */
export const MAX_UPLOAD_BYTES = 10 * 1024 * 1024;

export const ACCEPTED_UPLOAD_EXTENSIONS = ['csv', 'tsv', 'txt', 'xlsx'] as const;

/** Upload extensions read as a workbook rather than delimited text */
export const WORKBOOK_UPLOAD_EXTENSIONS = ['xlsx'] as const;

export const ReportFormat = {
  JSON: 'json',
  /** Both aggregate tables */
  CSV: 'csv',
  /** Per-record classification decisions */
  DECISIONS_CSV: 'decisions_csv',
} as const;

export type ReportFormat = (typeof ReportFormat)[keyof typeof ReportFormat];

export {
  AdmissionTag,
  INPATIENT_MARKER,
  Category,
  DEFAULT_CATEGORY_RULES,
  DEFAULT_FALLBACK_CATEGORY,
  ClassificationSource,
  OracleStatus,
  InputField,
  INPUT_COLUMN_ALIASES,
  GRAND_TOTAL_LABEL,
  REPORT_TITLE,
  CATEGORY_SECTION_TITLE,
  REPORT_DOWNLOAD_FILENAME,
  DECISION_LOG_FILENAME,
  ORACLE_TIMEOUT_MS,
  ORACLE_MAX_TOKENS,
  MAX_REPORT_ROWS,
  MAX_UPLOAD_BYTES,
  ACCEPTED_UPLOAD_EXTENSIONS,
  WORKBOOK_UPLOAD_EXTENSIONS,
  ReportFormat,
} from './pathology.constants.js';

export type { CategoryRule } from './pathology.constants.js';

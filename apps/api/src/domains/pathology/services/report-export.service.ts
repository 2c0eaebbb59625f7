// ============================================================================
// Pathology Reporting: Report Export
// Plain CSV rendering of the two aggregate tables and of the decision log.
// No styling; the spreadsheet layout belongs to the consumer.
// ============================================================================

import {
  CATEGORY_SECTION_TITLE,
  REPORT_TITLE,
} from '@labtally/shared/constants/pathology.constants.js';
import type { CategoryCountRow, TestCountRow } from './aggregator.service.js';
import type { ClassificationDecision, PathologyReport } from './report-pipeline.service.js';

// ---------------------------------------------------------------------------
// CSV Helpers
// ---------------------------------------------------------------------------

const TEST_COUNT_HEADERS = ['TestName', 'IPD', 'OPD', 'Total'];

const CATEGORY_COUNT_HEADERS = ['Category', 'Count'];

const DECISION_LOG_HEADERS = [
  'row_index',
  'test_name',
  'subgroup',
  'category',
  'source',
  'matched_keyword',
];

export function escapeCsvField(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n') || value.includes('\r')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function csvLine(cells: Array<string | number>): string {
  return cells.map((cell) => escapeCsvField(String(cell))).join(',');
}

function testCountLine(row: TestCountRow): string {
  return csvLine([row.testName, row.inpatientCount, row.outpatientCount, row.totalCount]);
}

function categoryCountLine(row: CategoryCountRow): string {
  return csvLine([row.category, row.count]);
}

/** DD-MM-YYYY in local time. */
export function formatReportDate(date: Date): string {
  const dd = String(date.getDate()).padStart(2, '0');
  const mm = String(date.getMonth() + 1).padStart(2, '0');
  return `${dd}-${mm}-${date.getFullYear()}`;
}

// ---------------------------------------------------------------------------
// Renderers
// ---------------------------------------------------------------------------

export function renderReportCsv(
  report: Pick<PathologyReport, 'testCounts' | 'categoryCounts'>,
  options: { generatedOn: Date },
): string {
  return [
    REPORT_TITLE,
    '',
    csvLine(TEST_COUNT_HEADERS),
    ...report.testCounts.map(testCountLine),
    '',
    CATEGORY_SECTION_TITLE,
    csvLine(CATEGORY_COUNT_HEADERS),
    ...report.categoryCounts.map(categoryCountLine),
    '',
    `Generated on: ${formatReportDate(options.generatedOn)}`,
  ].join('\n');
}

export function renderDecisionLogCsv(decisions: readonly ClassificationDecision[]): string {
  const lines = decisions.map((d) =>
    csvLine([d.rowIndex, d.testName, d.subgroup, d.category, d.source, d.matchedKeyword ?? '']),
  );
  return [csvLine(DECISION_LOG_HEADERS), ...lines].join('\n');
}

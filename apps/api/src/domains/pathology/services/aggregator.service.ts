// ============================================================================
// Pathology Reporting: Aggregator
// Two independent reductions over the cleaned record set, each closed by a
// synthetic Grand Total row.
// ============================================================================

import {
  AdmissionTag,
  GRAND_TOTAL_LABEL,
} from '@labtally/shared/constants/pathology.constants.js';
import type { CleanRecord } from './normalizer.service.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface TestCountRow {
  testName: string;
  inpatientCount: number;
  outpatientCount: number;
  totalCount: number;
}

export interface CategoryCountRow {
  category: string;
  count: number;
}

export interface CategorizedRecord {
  category: string;
}

// Code-unit comparison: case-sensitive and locale independent.
function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

// ---------------------------------------------------------------------------
// Counts by test name x admission tag
// ---------------------------------------------------------------------------

export function countsByTest(
  records: readonly Pick<CleanRecord, 'testName' | 'admissionTag'>[],
): TestCountRow[] {
  const groups = new Map<string, { inpatient: number; outpatient: number }>();

  for (const record of records) {
    let group = groups.get(record.testName);
    if (!group) {
      group = { inpatient: 0, outpatient: 0 };
      groups.set(record.testName, group);
    }
    if (record.admissionTag === AdmissionTag.INPATIENT) {
      group.inpatient += 1;
    } else {
      group.outpatient += 1;
    }
  }

  const body: TestCountRow[] = [...groups.keys()]
    .sort(compareCodeUnits)
    .map((testName) => {
      const { inpatient, outpatient } = groups.get(testName) ?? { inpatient: 0, outpatient: 0 };
      return {
        testName,
        inpatientCount: inpatient,
        outpatientCount: outpatient,
        totalCount: inpatient + outpatient,
      };
    });

  const grandTotal = body.reduce<TestCountRow>(
    (acc, row) => ({
      testName: GRAND_TOTAL_LABEL,
      inpatientCount: acc.inpatientCount + row.inpatientCount,
      outpatientCount: acc.outpatientCount + row.outpatientCount,
      totalCount: acc.totalCount + row.totalCount,
    }),
    { testName: GRAND_TOTAL_LABEL, inpatientCount: 0, outpatientCount: 0, totalCount: 0 },
  );

  return [...body, grandTotal];
}

// ---------------------------------------------------------------------------
// Counts by category
// ---------------------------------------------------------------------------

/**
 * One row per configured category, in configuration order. The Grand Total
 * is the number of records, which equals the sum of the rows only when every
 * record carries one of the configured categories.
 */
export function countsByCategory(
  records: readonly CategorizedRecord[],
  categories: readonly string[],
): CategoryCountRow[] {
  const counts = new Map<string, number>(categories.map((c) => [c, 0]));

  for (const record of records) {
    const current = counts.get(record.category);
    if (current !== undefined) {
      counts.set(record.category, current + 1);
    }
  }

  return [
    ...categories.map((category) => ({ category, count: counts.get(category) ?? 0 })),
    { category: GRAND_TOTAL_LABEL, count: records.length },
  ];
}

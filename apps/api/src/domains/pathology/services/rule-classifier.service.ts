// ============================================================================
// Pathology Reporting: Rule Classifier
// Ordered keyword rules; first matching category wins.
// ============================================================================

import type { CategoryRule } from '@labtally/shared/constants/pathology.constants.js';
import { foldCase } from '@labtally/shared/utils/text.utils.js';
import type { CleanRecord } from './normalizer.service.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RuleMatch {
  status: 'matched';
  category: string;
  /** Keyword as written in the rule table */
  matchedKeyword: string;
}

export interface Unresolved {
  status: 'unresolved';
  testName: string;
  subgroup: string;
}

export type RuleClassification = RuleMatch | Unresolved;

type ClassifiableRecord = Pick<CleanRecord, 'testName' | 'subgroup'>;

// ---------------------------------------------------------------------------
// Search text
// ---------------------------------------------------------------------------

export function buildSearchText(record: ClassifiableRecord): string {
  return foldCase(`${record.testName} ${record.subgroup}`);
}

// ---------------------------------------------------------------------------
// Classify
// ---------------------------------------------------------------------------

export function classify(
  record: ClassifiableRecord,
  rules: readonly CategoryRule[],
): RuleClassification {
  const text = buildSearchText(record);

  for (const rule of rules) {
    const keyword = rule.keywords.find((kw) => text.includes(foldCase(kw)));
    if (keyword !== undefined) {
      return { status: 'matched', category: rule.category, matchedKeyword: keyword };
    }
  }

  return { status: 'unresolved', testName: record.testName, subgroup: record.subgroup };
}

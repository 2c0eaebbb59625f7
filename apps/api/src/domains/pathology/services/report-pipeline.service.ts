// ============================================================================
// Pathology Reporting: Report Pipeline
// normalize -> classify -> resolve fallbacks -> aggregate. One run per record
// set; the pipeline object only holds immutable configuration.
// ============================================================================

import type { FastifyBaseLogger } from 'fastify';
import {
  ClassificationSource,
  ORACLE_TIMEOUT_MS,
  OracleStatus,
} from '@labtally/shared/constants/pathology.constants.js';
import { nullCategoryOracle, type CategoryOracle, type TestPair } from '../pathology.llm.js';
import { normalize, type RawRecord } from './normalizer.service.js';
import { classify } from './rule-classifier.service.js';
import { resolve, applyResolution } from './fallback-resolver.service.js';
import {
  countsByTest,
  countsByCategory,
  type TestCountRow,
  type CategoryCountRow,
} from './aggregator.service.js';
import { defaultRuleSet, type CategoryRuleSet } from './category-rules.service.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ReportLogger = Pick<FastifyBaseLogger, 'debug' | 'info' | 'warn'>;

export interface ClassificationDecision {
  rowIndex: number;
  testName: string;
  subgroup: string;
  category: string;
  source: ClassificationSource;
  matchedKeyword: string | null;
}

export interface ReportSummary {
  receivedCount: number;
  processedCount: number;
  droppedCount: number;
  bySource: Record<ClassificationSource, number>;
  oracleStatus: OracleStatus;
}

export interface PathologyReport {
  testCounts: TestCountRow[];
  categoryCounts: CategoryCountRow[];
  decisions: ClassificationDecision[];
  summary: ReportSummary;
}

export interface ReportPipelineDeps {
  ruleSet?: CategoryRuleSet;
  oracle?: CategoryOracle;
  oracleTimeoutMs?: number;
  logger?: ReportLogger;
}

export interface RunOptions {
  /** Per-run logger, e.g. a request-scoped child logger */
  logger?: ReportLogger;
}

// ---------------------------------------------------------------------------
// Pipeline Factory
// ---------------------------------------------------------------------------

export function createReportPipeline(deps: ReportPipelineDeps = {}) {
  const ruleSet = deps.ruleSet ?? defaultRuleSet;
  const oracle = deps.oracle ?? nullCategoryOracle;
  const oracleTimeoutMs = deps.oracleTimeoutMs ?? ORACLE_TIMEOUT_MS;

  async function run(
    rawRecords: readonly RawRecord[],
    options: RunOptions = {},
  ): Promise<PathologyReport> {
    const log = options.logger ?? deps.logger;

    // 1. Normalize
    const { records, droppedCount, dropped } = normalize(rawRecords);
    if (droppedCount > 0) {
      log?.info(
        { droppedCount, firstDroppedRows: dropped.slice(0, 10) },
        'Dropped rows missing a required field',
      );
    }

    // 2. Rule classification
    const ruleResults = records.map((record) => classify(record, ruleSet.rules));
    const unresolved: TestPair[] = [];
    for (const result of ruleResults) {
      if (result.status === 'unresolved') {
        unresolved.push({ testName: result.testName, subgroup: result.subgroup });
      }
    }

    // 3. Fallback for rule-unresolved records (single oracle call)
    const resolution = await resolve(unresolved, {
      oracle,
      categories: ruleSet.categories,
      timeoutMs: oracleTimeoutMs,
    });

    if (unresolved.length > 0) {
      log?.debug(
        { unresolvedCount: unresolved.length, oracleStatus: resolution.oracleStatus },
        'Resolved records without a matching rule',
      );
    }
    if (resolution.oracleStatus === OracleStatus.FAILED) {
      log?.warn(
        { reason: resolution.failureReason, unresolvedCount: unresolved.length },
        'Category oracle failed; using default category',
      );
    }
    if (resolution.discardedDecisions > 0) {
      log?.warn(
        { discardedDecisions: resolution.discardedDecisions },
        'Discarded oracle decisions outside the requested batch or category set',
      );
    }

    // 4. Decision log (input order)
    const decisions: ClassificationDecision[] = records.map((record, i) => {
      const ruleResult = ruleResults[i];
      if (ruleResult.status === 'matched') {
        return {
          rowIndex: record.rowIndex,
          testName: record.testName,
          subgroup: record.subgroup,
          category: ruleResult.category,
          source: ClassificationSource.RULE,
          matchedKeyword: ruleResult.matchedKeyword,
        };
      }

      const fallback = applyResolution(record, resolution.mapping, ruleSet.defaultCategory);
      return {
        rowIndex: record.rowIndex,
        testName: record.testName,
        subgroup: record.subgroup,
        category: fallback.category,
        source: fallback.source,
        matchedKeyword: null,
      };
    });

    // 5. Aggregate
    const bySource: Record<ClassificationSource, number> = {
      [ClassificationSource.RULE]: 0,
      [ClassificationSource.ORACLE]: 0,
      [ClassificationSource.DEFAULT]: 0,
    };
    for (const decision of decisions) {
      bySource[decision.source] += 1;
    }

    return {
      testCounts: countsByTest(records),
      categoryCounts: countsByCategory(decisions, ruleSet.categories),
      decisions,
      summary: {
        receivedCount: rawRecords.length,
        processedCount: records.length,
        droppedCount,
        bySource,
        oracleStatus: resolution.oracleStatus,
      },
    };
  }

  return {
    ruleSet,
    run,
  };
}

export type ReportPipeline = ReturnType<typeof createReportPipeline>;

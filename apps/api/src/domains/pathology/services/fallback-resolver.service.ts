// ============================================================================
// Pathology Reporting: Fallback Resolver
// One bounded oracle call per run for rule-unresolved tests, then a fixed
// default category for whatever is still unmapped. Never throws.
// ============================================================================

import {
  ClassificationSource,
  OracleStatus,
} from '@labtally/shared/constants/pathology.constants.js';
import { foldCase } from '@labtally/shared/utils/text.utils.js';
import {
  nullCategoryOracle,
  type CategoryOracle,
  type OracleDecision,
  type TestPair,
} from '../pathology.llm.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** (testName, subgroup) -> category */
export type ResolutionMapping = ReadonlyMap<string, string>;

export interface FallbackResolution {
  mapping: ResolutionMapping;
  oracleStatus: OracleStatus;
  /** Oracle decisions dropped for naming an unknown category or test */
  discardedDecisions: number;
  /** Set when oracleStatus is FAILED */
  failureReason?: string;
}

export interface FallbackResolverDeps {
  oracle: CategoryOracle;
  categories: readonly string[];
  timeoutMs: number;
}

export interface FallbackAssignment {
  category: string;
  source: typeof ClassificationSource.ORACLE | typeof ClassificationSource.DEFAULT;
}

export class OracleTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Category oracle did not answer within ${timeoutMs}ms`);
    this.name = 'OracleTimeoutError';
  }
}

// ---------------------------------------------------------------------------
// Pair keys
// ---------------------------------------------------------------------------

/**
 * Lookup key for a (testName, subgroup) pair. Trimmed and case-folded so an
 * oracle echoing a name with different casing or padding still matches.
 */
export function pairKey(testName: string, subgroup: string): string {
  return JSON.stringify([foldCase(testName.trim()), foldCase(subgroup.trim())]);
}

/** Distinct pairs (by {@link pairKey}) in first-seen order. */
export function distinctPairs(batch: readonly TestPair[]): TestPair[] {
  const seen = new Set<string>();
  const pairs: TestPair[] = [];
  for (const { testName, subgroup } of batch) {
    const key = pairKey(testName, subgroup);
    if (!seen.has(key)) {
      seen.add(key);
      pairs.push({ testName, subgroup });
    }
  }
  return pairs;
}

// ---------------------------------------------------------------------------
// Timeout
// ---------------------------------------------------------------------------

async function withTimeout<T>(work: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new OracleTimeoutError(timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

// ---------------------------------------------------------------------------
// Resolve
// ---------------------------------------------------------------------------

export async function resolve(
  unresolvedBatch: readonly TestPair[],
  deps: FallbackResolverDeps,
): Promise<FallbackResolution> {
  const pairs = distinctPairs(unresolvedBatch);

  if (pairs.length === 0) {
    return { mapping: new Map(), oracleStatus: OracleStatus.NOT_NEEDED, discardedDecisions: 0 };
  }
  if (deps.oracle === nullCategoryOracle) {
    return { mapping: new Map(), oracleStatus: OracleStatus.DISABLED, discardedDecisions: 0 };
  }

  let decisions: OracleDecision[];
  try {
    // Invoked inside the try so a synchronous throw is absorbed too
    decisions = await withTimeout(
      Promise.resolve().then(() => deps.oracle.classifyBatch(pairs, deps.categories)),
      deps.timeoutMs,
    );
  } catch (error) {
    return {
      mapping: new Map(),
      oracleStatus: OracleStatus.FAILED,
      discardedDecisions: 0,
      failureReason: error instanceof Error ? error.message : String(error),
    };
  }

  const requested = new Set(pairs.map((p) => pairKey(p.testName, p.subgroup)));
  const allowed = new Set(deps.categories);
  const mapping = new Map<string, string>();
  let discardedDecisions = 0;

  for (const decision of Array.isArray(decisions) ? decisions : []) {
    const key = pairKey(decision.testName, decision.subgroup);
    if (!requested.has(key) || !allowed.has(decision.category)) {
      discardedDecisions++;
      continue;
    }
    // First answer for a pair wins
    if (!mapping.has(key)) {
      mapping.set(key, decision.category);
    }
  }

  return { mapping, oracleStatus: OracleStatus.ANSWERED, discardedDecisions };
}

// ---------------------------------------------------------------------------
// Apply
// ---------------------------------------------------------------------------

/**
 * Final category for a rule-unresolved record: the oracle's answer when it
 * gave one, otherwise the configured default.
 */
export function applyResolution(
  pair: TestPair,
  mapping: ResolutionMapping,
  defaultCategory: string,
): FallbackAssignment {
  const mapped = mapping.get(pairKey(pair.testName, pair.subgroup));
  return mapped !== undefined
    ? { category: mapped, source: ClassificationSource.ORACLE }
    : { category: defaultCategory, source: ClassificationSource.DEFAULT };
}

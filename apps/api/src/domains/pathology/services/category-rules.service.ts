// ============================================================================
// Pathology Reporting: Category Rules Configuration
// Built-in rule table, or one loaded from a JSON file at startup.
// ============================================================================

import { readFileSync } from 'node:fs';
import {
  DEFAULT_CATEGORY_RULES,
  DEFAULT_FALLBACK_CATEGORY,
  type CategoryRule,
} from '@labtally/shared/constants/pathology.constants.js';
import { categoryRulesConfigSchema } from '@labtally/shared/schemas/validation/pathology.validation.js';
import { ConfigurationError } from '../../../lib/errors.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CategoryRuleSet {
  rules: readonly CategoryRule[];
  /** Category names in rule order */
  categories: readonly string[];
  defaultCategory: string;
}

export interface LoadCategoryRulesOptions {
  /** JSON file replacing the built-in rules */
  filePath?: string;
  /** Overrides the default category of the built-in rules or the file */
  defaultCategory?: string;
}

// ---------------------------------------------------------------------------
// Builders
// ---------------------------------------------------------------------------

export function createRuleSet(
  rules: readonly CategoryRule[],
  defaultCategory: string,
): CategoryRuleSet {
  const categories = rules.map((r) => r.category);
  if (!categories.includes(defaultCategory)) {
    throw new ConfigurationError(
      `Default category "${defaultCategory}" is not one of: ${categories.join(', ')}`,
    );
  }
  const frozenRules = rules.map((r) =>
    Object.freeze({ category: r.category, keywords: Object.freeze([...r.keywords]) }),
  );
  return Object.freeze({
    rules: Object.freeze(frozenRules),
    categories: Object.freeze(categories),
    defaultCategory,
  });
}

export const defaultRuleSet: CategoryRuleSet = createRuleSet(
  DEFAULT_CATEGORY_RULES,
  DEFAULT_FALLBACK_CATEGORY,
);

/** Validate a parsed rules document (`{categories, default_category?}`). */
export function parseCategoryRules(document: unknown, defaultOverride?: string): CategoryRuleSet {
  const result = categoryRulesConfigSchema.safeParse(document);
  if (!result.success) {
    throw new ConfigurationError('Invalid category rules', result.error.flatten());
  }

  const { categories, default_category } = result.data;
  return createRuleSet(
    categories,
    defaultOverride ?? default_category ?? categories[0].category,
  );
}

// ---------------------------------------------------------------------------
// Loader
// ---------------------------------------------------------------------------

export function loadCategoryRules(options: LoadCategoryRulesOptions = {}): CategoryRuleSet {
  const { filePath, defaultCategory } = options;

  if (!filePath) {
    return defaultCategory === undefined
      ? defaultRuleSet
      : createRuleSet(DEFAULT_CATEGORY_RULES, defaultCategory);
  }

  let document: unknown;
  try {
    document = JSON.parse(readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(`Cannot read category rules from ${filePath}`, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  return parseCategoryRules(document, defaultCategory);
}

// ============================================================================
// Pathology Reporting: Zod Validation Schemas
// ============================================================================

import { z } from 'zod';
import {
  MAX_REPORT_ROWS,
  ReportFormat,
} from '../../constants/pathology.constants.js';

// --- Enum Value Arrays ---

const REPORT_FORMATS = [
  ReportFormat.JSON,
  ReportFormat.CSV,
  ReportFormat.DECISIONS_CSV,
] as const;

// --- Helpers ---

// Query strings arrive as text; accept the usual boolean spellings.
const queryBoolean = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

// A raw row: header -> cell. Cells are validated per field by the normalizer.
const rawRecordSchema = z.record(z.string(), z.unknown());

// ============================================================================
// Report Requests
// ============================================================================

// --- JSON Report Body ---

export const generateReportSchema = z.object({
  rows: z.array(rawRecordSchema).max(MAX_REPORT_ROWS),
  include_decisions: z.boolean().optional(),
});

export type GenerateReport = z.infer<typeof generateReportSchema>;

// --- Report Query (JSON and upload endpoints) ---

export const reportQuerySchema = z.object({
  format: z.enum(REPORT_FORMATS).default(ReportFormat.JSON),
  include_decisions: queryBoolean.optional(),
});

export type ReportQuery = z.infer<typeof reportQuerySchema>;

// ============================================================================
// Category Rules Configuration File
// ============================================================================

const categoryRuleSchema = z.object({
  category: z.string().trim().min(1).max(100),
  keywords: z.array(z.string().trim().min(1).max(200)).min(1),
});

export const categoryRulesConfigSchema = z
  .object({
    categories: z.array(categoryRuleSchema).min(1),
    default_category: z.string().trim().min(1).optional(),
  })
  .refine(
    (data) =>
      new Set(data.categories.map((c) => c.category.toLowerCase())).size ===
      data.categories.length,
    {
      message: 'Category names must be unique',
      path: ['categories'],
    },
  )
  .refine(
    (data) =>
      data.default_category === undefined ||
      data.categories.some((c) => c.category === data.default_category),
    {
      message: 'default_category must name one of the configured categories',
      path: ['default_category'],
    },
  );

export type CategoryRulesConfig = z.infer<typeof categoryRulesConfigSchema>;

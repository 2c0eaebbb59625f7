// ============================================================================
// Pathology Reporting: Report Routes
// JSON and file-upload entry points to the report pipeline, plus the active
// category rules.
// ============================================================================

import { type FastifyInstance, type FastifyRequest, type FastifyReply } from 'fastify';
import multipart from '@fastify/multipart';
import {
  generateReportSchema,
  reportQuerySchema,
  type GenerateReport,
  type ReportQuery,
} from '@labtally/shared/schemas/validation/pathology.validation.js';
import {
  ACCEPTED_UPLOAD_EXTENSIONS,
  DECISION_LOG_FILENAME,
  MAX_UPLOAD_BYTES,
  REPORT_DOWNLOAD_FILENAME,
  ReportFormat,
  WORKBOOK_UPLOAD_EXTENSIONS,
} from '@labtally/shared/constants/pathology.constants.js';
import { PayloadTooLargeError, ValidationError } from '../../../lib/errors.js';
import { uploadRateLimit } from '../../../plugins/rate-limit.plugin.js';
import type { RawRecord } from '../services/normalizer.service.js';
import type { PathologyReport, ReportPipeline } from '../services/report-pipeline.service.js';
import { parseTabularText, parseWorkbook } from '../services/tabular-import.service.js';
import { renderDecisionLogCsv, renderReportCsv } from '../services/report-export.service.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ReportRouteDeps {
  pipeline: ReportPipeline;
  /** Clock for the report footer date. */
  now?: () => Date;
}

const ALLOWED_UPLOAD_MIMES = [
  'text/csv',
  'text/plain',
  'text/tab-separated-values',
  'application/csv',
  'application/vnd.ms-excel',
  'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
  'application/octet-stream',
];

const UNSUPPORTED_UPLOAD_MESSAGE = 'Only .csv, .tsv, .txt and .xlsx files are accepted';

function readUpload(content: Buffer, ext: string): RawRecord[] {
  if (!WORKBOOK_UPLOAD_EXTENSIONS.some((workbookExt) => workbookExt === ext)) {
    return parseTabularText(content.toString('utf8')).records;
  }
  try {
    return parseWorkbook(content).records;
  } catch (error) {
    throw new ValidationError('Uploaded workbook could not be read', {
      cause: error instanceof Error ? error.message : String(error),
    });
  }
}

// ---------------------------------------------------------------------------
// Helper: serialize a report for the API (snake_case)
// ---------------------------------------------------------------------------

function serializeReport(report: PathologyReport, includeDecisions: boolean) {
  return {
    test_counts: report.testCounts.map((row) => ({
      test_name: row.testName,
      inpatient_count: row.inpatientCount,
      outpatient_count: row.outpatientCount,
      total_count: row.totalCount,
    })),
    category_counts: report.categoryCounts.map((row) => ({
      category: row.category,
      count: row.count,
    })),
    summary: {
      received_count: report.summary.receivedCount,
      processed_count: report.summary.processedCount,
      dropped_count: report.summary.droppedCount,
      by_source: report.summary.bySource,
      oracle_status: report.summary.oracleStatus,
    },
    ...(includeDecisions
      ? {
          decisions: report.decisions.map((d) => ({
            row_index: d.rowIndex,
            test_name: d.testName,
            subgroup: d.subgroup,
            category: d.category,
            source: d.source,
            matched_keyword: d.matchedKeyword,
          })),
        }
      : {}),
  };
}

// ---------------------------------------------------------------------------
// Route registration
// ---------------------------------------------------------------------------

export async function reportRoutes(
  app: FastifyInstance,
  opts: { deps: ReportRouteDeps },
) {
  const { pipeline } = opts.deps;
  const now = opts.deps.now ?? (() => new Date());

  async function runAndSend(
    request: FastifyRequest,
    reply: FastifyReply,
    rows: readonly RawRecord[],
    format: ReportQuery['format'],
    includeDecisions: boolean,
  ) {
    const report = await pipeline.run(rows, { logger: request.log });

    request.log.info(
      {
        receivedCount: report.summary.receivedCount,
        processedCount: report.summary.processedCount,
        oracleStatus: report.summary.oracleStatus,
      },
      'Pathology report generated',
    );

    switch (format) {
      case ReportFormat.CSV:
        return reply
          .code(200)
          .header('content-type', 'text/csv; charset=utf-8')
          .header('content-disposition', `attachment; filename="${REPORT_DOWNLOAD_FILENAME}"`)
          .send(renderReportCsv(report, { generatedOn: now() }));

      case ReportFormat.DECISIONS_CSV:
        return reply
          .code(200)
          .header('content-type', 'text/csv; charset=utf-8')
          .header('content-disposition', `attachment; filename="${DECISION_LOG_FILENAME}"`)
          .send(renderDecisionLogCsv(report.decisions));

      default:
        return reply.code(200).send({
          data: serializeReport(report, includeDecisions),
        });
    }
  }

  // =========================================================================
  // GET /api/v1/pathology/categories
  // Active category rules in match order, and the fallback category.
  // =========================================================================

  app.get('/api/v1/pathology/categories', async (_request, reply) => {
    const { rules, defaultCategory } = pipeline.ruleSet;
    return reply.code(200).send({
      data: {
        categories: rules.map((r) => ({ category: r.category, keywords: r.keywords })),
        default_category: defaultCategory,
      },
    });
  });

  // =========================================================================
  // POST /api/v1/pathology/reports
  // Build the report from rows posted as JSON.
  // =========================================================================

  app.post('/api/v1/pathology/reports', {
    schema: { body: generateReportSchema, querystring: reportQuerySchema },
    handler: async (
      request: FastifyRequest<{ Body: GenerateReport; Querystring: ReportQuery }>,
      reply: FastifyReply,
    ) => {
      const { rows } = request.body;
      const includeDecisions =
        request.body.include_decisions ?? request.query.include_decisions ?? false;

      return runAndSend(request, reply, rows, request.query.format, includeDecisions);
    },
  });

  // =========================================================================
  // POST /api/v1/pathology/reports/upload
  // Build the report from an uploaded CSV / TSV file or .xlsx workbook (multipart).
  // =========================================================================

  await app.register(multipart, {
    throwFileSizeLimit: false,
    limits: {
      files: 1,
      fileSize: MAX_UPLOAD_BYTES,
    },
  });

  app.post('/api/v1/pathology/reports/upload', {
    schema: { querystring: reportQuerySchema },
    config: { rateLimit: uploadRateLimit() },
    handler: async (
      request: FastifyRequest<{ Querystring: ReportQuery }>,
      reply: FastifyReply,
    ) => {
      const data = await request.file();
      if (!data) {
        throw new ValidationError('No file uploaded');
      }

      const fileName = data.filename ?? '';
      const ext = fileName.toLowerCase().split('.').pop() ?? '';
      if (!ACCEPTED_UPLOAD_EXTENSIONS.some((accepted) => accepted === ext)) {
        throw new ValidationError(UNSUPPORTED_UPLOAD_MESSAGE);
      }

      // Loose check: browsers label CSV inconsistently
      const mime = data.mimetype ?? '';
      if (mime && !ALLOWED_UPLOAD_MIMES.includes(mime)) {
        throw new ValidationError(UNSUPPORTED_UPLOAD_MESSAGE);
      }

      const chunks: Buffer[] = [];
      for await (const chunk of data.file) {
        chunks.push(chunk);
      }
      if (data.file.truncated) {
        throw new PayloadTooLargeError('File exceeds maximum size of 10MB');
      }

      const records = readUpload(Buffer.concat(chunks), ext);

      return runAndSend(
        request,
        reply,
        records,
        request.query.format,
        request.query.include_decisions ?? false,
      );
    },
  });
}

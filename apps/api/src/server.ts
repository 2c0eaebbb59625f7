import Fastify, { type FastifyServerOptions } from 'fastify';
import helmet from '@fastify/helmet';
import cors from '@fastify/cors';
import { randomUUID } from 'node:crypto';
import { pathToFileURL } from 'node:url';
import {
  serializerCompiler,
  validatorCompiler,
} from 'fastify-type-provider-zod';
import { MAX_UPLOAD_BYTES } from '@labtally/shared/constants/pathology.constants.js';
import { getEnv, type Env } from './lib/env.js';
import { errorHandlerPluginFp } from './plugins/error-handler.plugin.js';
import { rateLimitPluginFp } from './plugins/rate-limit.plugin.js';
import { reportRoutes, type ReportRouteDeps } from './domains/pathology/routes/report.routes.js';
import {
  createReportPipeline,
  type ReportLogger,
} from './domains/pathology/services/report-pipeline.service.js';
import { loadCategoryRules } from './domains/pathology/services/category-rules.service.js';
import { createCategoryOracle, createLlmClient } from './domains/pathology/pathology.llm.js';

export interface BuildAppOptions {
  env?: Env;
  /** Replaces the env-derived pipeline (tests inject fakes here). */
  reportDeps?: ReportRouteDeps;
  logger?: FastifyServerOptions['logger'];
  rateLimitMax?: number;
}

/**
 * Wire the report pipeline from configuration: rules file, default category,
 * and the LLM oracle (enabled only when LLM_BASE_URL and LLM_MODEL are set).
 */
export function createReportDepsFromEnv(env: Env, logger?: ReportLogger): ReportRouteDeps {
  const ruleSet = loadCategoryRules({
    filePath: env.CATEGORY_RULES_PATH,
    defaultCategory: env.DEFAULT_CATEGORY,
  });

  const llmClient = createLlmClient({
    baseUrl: env.LLM_BASE_URL,
    model: env.LLM_MODEL,
    apiKey: env.LLM_API_KEY,
    timeoutMs: env.LLM_TIMEOUT_MS,
  });
  if (!llmClient) {
    logger?.warn('Category oracle is disabled: LLM_BASE_URL or LLM_MODEL not configured');
  }

  const oracle = createCategoryOracle(llmClient, {
    onRejectedLines: (count) =>
      logger?.warn({ rejectedLines: count }, 'Ignored unparsable oracle response lines'),
    onTruncated: (pairCount) =>
      logger?.warn({ pairCount }, 'Oracle answer hit the token cap; later tests may be unanswered'),
  });

  return {
    pipeline: createReportPipeline({
      ruleSet,
      oracle,
      // Client aborts at its own timeout; give the resolver a little headroom
      oracleTimeoutMs: env.LLM_TIMEOUT_MS + 1000,
    }),
  };
}

export function buildApp(opts: BuildAppOptions = {}) {
  const env = opts.env ?? getEnv();

  const app = Fastify({
    logger: opts.logger ?? { level: env.LOG_LEVEL },
    genReqId: () => randomUUID(),
    bodyLimit: MAX_UPLOAD_BYTES,
  });

  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  // Register plugins
  app.register(errorHandlerPluginFp);
  app.register(helmet);
  app.register(cors, {
    origin: env.CORS_ORIGIN,
  });
  app.register(rateLimitPluginFp, { defaultMax: opts.rateLimitMax });

  const reportDeps = opts.reportDeps ?? createReportDepsFromEnv(env, app.log);
  app.register(reportRoutes, { deps: reportDeps });

  // Health check
  app.get('/health', async () => ({ status: 'ok' }));

  return app;
}

// Start server when run directly
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  const env = getEnv();
  const app = buildApp({ env });

  app.listen({ port: env.API_PORT, host: env.API_HOST }, (err) => {
    if (err) {
      app.log.error(err);
      process.exit(1);
    }
  });
}

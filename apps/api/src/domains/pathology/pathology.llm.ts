// ============================================================================
// Pathology Reporting: LLM Category Oracle
// Configurable OpenAI-compatible HTTP client, batch prompt, line-by-line
// response parsing restricted to the configured category set.
// ============================================================================

import { ORACLE_MAX_TOKENS } from '@labtally/shared/constants/pathology.constants.js';
import { splitDelimitedLine } from './services/tabular-import.service.js';

// ---------------------------------------------------------------------------
// LLM Client Configuration
// ---------------------------------------------------------------------------

export interface LlmClientConfig {
  baseUrl: string;
  model: string;
  apiKey?: string;
  timeoutMs: number;
}

export interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

export interface ChatCompletionOptions {
  temperature?: number;
  maxTokens?: number;
}

export interface ChatCompletionResult {
  content: string;
  finishReason: string;
}

export interface LlmClient {
  chatCompletion(messages: ChatMessage[], options?: ChatCompletionOptions): Promise<ChatCompletionResult>;
  config: Readonly<LlmClientConfig>;
}

interface ChatCompletionResponseBody {
  choices?: Array<{
    message?: { content?: string };
    finish_reason?: string;
  }>;
}

// ---------------------------------------------------------------------------
// LLM Client Factory
// ---------------------------------------------------------------------------

/**
 * Create an LLM client that speaks the OpenAI-compatible `/v1/chat/completions`
 * protocol (OpenAI, llama.cpp, Ollama, vLLM).
 *
 * Returns `null` when `baseUrl` or `model` is missing, which disables the
 * oracle. Configuration is passed in by the caller; nothing is read from the
 * environment here.
 */
export function createLlmClient(config: Partial<LlmClientConfig>): LlmClient | null {
  const { baseUrl, model, apiKey, timeoutMs } = config;

  if (!baseUrl || !model || timeoutMs === undefined) {
    return null;
  }

  const resolvedConfig: LlmClientConfig = {
    baseUrl: baseUrl.replace(/\/+$/, ''),
    model,
    apiKey,
    timeoutMs,
  };

  return {
    config: Object.freeze(resolvedConfig),

    async chatCompletion(
      messages: ChatMessage[],
      options?: ChatCompletionOptions,
    ): Promise<ChatCompletionResult> {
      const url = `${resolvedConfig.baseUrl}/v1/chat/completions`;

      const headers: Record<string, string> = {
        'Content-Type': 'application/json',
      };
      if (apiKey) {
        headers['Authorization'] = `Bearer ${apiKey}`;
      }

      const body = JSON.stringify({
        model,
        messages,
        temperature: options?.temperature ?? 0,
        max_tokens: options?.maxTokens ?? ORACLE_MAX_TOKENS,
      });

      const controller = new AbortController();
      const timer = setTimeout(() => controller.abort(), resolvedConfig.timeoutMs);

      try {
        const response = await fetch(url, {
          method: 'POST',
          headers,
          body,
          signal: controller.signal,
        });

        if (!response.ok) {
          throw new Error(`LLM API error: ${response.status}`);
        }

        const json = (await response.json()) as ChatCompletionResponseBody;
        const choice = json.choices?.[0];
        return {
          content: choice?.message?.content ?? '',
          finishReason: choice?.finish_reason ?? 'unknown',
        };
      } finally {
        clearTimeout(timer);
      }
    },
  };
}

// ---------------------------------------------------------------------------
// Oracle contract
// ---------------------------------------------------------------------------

export interface TestPair {
  testName: string;
  subgroup: string;
}

export interface OracleDecision extends TestPair {
  category: string;
}

/**
 * Best-effort classifier for tests no rule matched. May answer for any
 * subset of the batch; may throw. Callers must treat every failure as
 * "no answer".
 */
export interface CategoryOracle {
  classifyBatch(pairs: readonly TestPair[], categories: readonly string[]): Promise<OracleDecision[]>;
}

/** No-op oracle used when no LLM is configured. Never answers. */
export const nullCategoryOracle: CategoryOracle = {
  async classifyBatch() {
    return [];
  },
};

// ---------------------------------------------------------------------------
// Prompt Construction
// ---------------------------------------------------------------------------

const SYSTEM_PROMPT = `You classify hospital laboratory tests into clinical laboratory sections.
Answer only with CSV lines. Do not add commentary.`;

export function buildOraclePrompt(
  pairs: readonly TestPair[],
  categories: readonly string[],
): string {
  const tests = pairs
    .map((p) => `- Test: ${p.testName}, Subgroup: ${p.subgroup}`)
    .join('\n');

  return [
    `Categories: ${categories.join(', ')}.`,
    'Assign each test to the best category.',
    'Return CSV: TestName,Subgroup,Category',
    'Tests:',
    tests,
  ].join('\n');
}

// ---------------------------------------------------------------------------
// Response Parsing
// ---------------------------------------------------------------------------

export interface ParsedOracleResponse {
  decisions: OracleDecision[];
  rejectedLines: number;
}

// An echoed `TestName,Subgroup,Category` header line is skipped, not rejected
const ORACLE_HEADER_LAST_CELL = 'category';

/**
 * One decision per line, `TestName,Subgroup,Category`. Lines with a different
 * cell count, or a category outside `categories`, are rejected one by one.
 * Category names are matched case-insensitively and returned in their
 * configured spelling.
 */
export function parseOracleResponse(
  content: string,
  categories: readonly string[],
): ParsedOracleResponse {
  const canonical = new Map(categories.map((c) => [c.toLowerCase(), c]));
  const decisions: OracleDecision[] = [];
  let rejectedLines = 0;

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line === '' || line.startsWith('```')) continue;

    const cells = splitDelimitedLine(line, ',');
    if (cells.length === 3 && cells[2].toLowerCase() === ORACLE_HEADER_LAST_CELL) {
      continue;
    }
    if (cells.length !== 3) {
      rejectedLines++;
      continue;
    }

    const [testName, subgroup, categoryCell] = cells;
    const category = canonical.get(categoryCell.toLowerCase());
    if (category === undefined || testName === '') {
      rejectedLines++;
      continue;
    }

    decisions.push({ testName, subgroup, category });
  }

  return { decisions, rejectedLines };
}

// ---------------------------------------------------------------------------
// LLM-backed Oracle
// ---------------------------------------------------------------------------

export interface LlmCategoryOracleOptions {
  /** Called with the number of discarded response lines, for logging. */
  onRejectedLines?: (count: number) => void;
  /** Called with the batch size when the answer stopped at the token cap. */
  onTruncated?: (pairCount: number) => void;
}

export function createLlmCategoryOracle(
  client: LlmClient,
  options: LlmCategoryOracleOptions = {},
): CategoryOracle {
  return {
    async classifyBatch(pairs, categories) {
      if (pairs.length === 0) return [];

      const messages: ChatMessage[] = [
        { role: 'system', content: SYSTEM_PROMPT },
        { role: 'user', content: buildOraclePrompt(pairs, categories) },
      ];

      const result = await client.chatCompletion(messages, {
        temperature: 0,
        maxTokens: ORACLE_MAX_TOKENS,
      });

      if (result.finishReason === 'length') {
        options.onTruncated?.(pairs.length);
      }

      const parsed = parseOracleResponse(result.content, categories);
      if (parsed.rejectedLines > 0) {
        options.onRejectedLines?.(parsed.rejectedLines);
      }
      return parsed.decisions;
    },
  };
}

/** Falls back to {@link nullCategoryOracle} when no LLM client is configured. */
export function createCategoryOracle(
  client: LlmClient | null,
  options: LlmCategoryOracleOptions = {},
): CategoryOracle {
  return client ? createLlmCategoryOracle(client, options) : nullCategoryOracle;
}

// ============================================================================
// Pathology Reporting: LLM Category Oracle Unit Tests
// ============================================================================

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  buildOraclePrompt,
  createCategoryOracle,
  createLlmCategoryOracle,
  createLlmClient,
  nullCategoryOracle,
  parseOracleResponse,
  type ChatCompletionOptions,
  type ChatCompletionResult,
  type ChatMessage,
  type LlmClient,
} from './pathology.llm.js';

const CATEGORIES = ['Biochemistry', 'Clinical', 'Hematology', 'Immunology'];

// ---------------------------------------------------------------------------
// Mock LLM Client Factory
// ---------------------------------------------------------------------------

function createMockLlmClient(
  response: ChatCompletionResult | Error,
  capturedCalls?: Array<{ messages: ChatMessage[]; options?: ChatCompletionOptions }>,
): LlmClient {
  return {
    config: Object.freeze({
      baseUrl: 'http://localhost:8080',
      model: 'test-model',
      apiKey: 'test-key',
      timeoutMs: 3000,
    }),
    async chatCompletion(
      messages: ChatMessage[],
      options?: ChatCompletionOptions,
    ): Promise<ChatCompletionResult> {
      capturedCalls?.push({ messages, options });
      if (response instanceof Error) {
        throw response;
      }
      return response;
    },
  };
}

function stubFetch(status: number, body: unknown) {
  const fetchMock = vi.fn(
    async (_url: string, _init?: RequestInit) => new Response(JSON.stringify(body), { status }),
  );
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

afterEach(() => {
  vi.unstubAllGlobals();
});

// ============================================================================
// LLM Client Factory
// ============================================================================

describe('createLlmClient', () => {
  it('returns null when baseUrl is missing', () => {
    expect(createLlmClient({ model: 'test-model', timeoutMs: 1000 })).toBeNull();
  });

  it('returns null when model is missing', () => {
    expect(createLlmClient({ baseUrl: 'http://localhost:8080', timeoutMs: 1000 })).toBeNull();
  });

  it('strips trailing slashes from the base URL', () => {
    const client = createLlmClient({
      baseUrl: 'http://localhost:8080//',
      model: 'test-model',
      timeoutMs: 1000,
    });
    expect(client?.config).toEqual({
      baseUrl: 'http://localhost:8080',
      model: 'test-model',
      apiKey: undefined,
      timeoutMs: 1000,
    });
  });

  it('posts an OpenAI-compatible chat completion request', async () => {
    const fetchMock = stubFetch(200, {
      choices: [{ message: { content: 'CBC,Routine,Hematology' }, finish_reason: 'stop' }],
    });
    const client = createLlmClient({
      baseUrl: 'http://localhost:8080',
      model: 'test-model',
      apiKey: 'test-key',
      timeoutMs: 1000,
    });

    const result = await client?.chatCompletion([{ role: 'user', content: 'hello' }], {
      maxTokens: 50,
    });

    expect(result).toEqual({ content: 'CBC,Routine,Hematology', finishReason: 'stop' });
    expect(fetchMock).toHaveBeenCalledTimes(1);

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://localhost:8080/v1/chat/completions');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-key',
    });
    expect(JSON.parse(String(init?.body))).toEqual({
      model: 'test-model',
      messages: [{ role: 'user', content: 'hello' }],
      temperature: 0,
      max_tokens: 50,
    });
  });

  it('omits the Authorization header without an API key', async () => {
    const fetchMock = stubFetch(200, { choices: [] });
    const client = createLlmClient({
      baseUrl: 'http://localhost:8080',
      model: 'test-model',
      timeoutMs: 1000,
    });

    const result = await client?.chatCompletion([{ role: 'user', content: 'hello' }]);

    expect(result).toEqual({ content: '', finishReason: 'unknown' });
    expect(fetchMock.mock.calls[0][1]?.headers).toEqual({ 'Content-Type': 'application/json' });
  });

  it('throws on a non-OK response', async () => {
    stubFetch(503, { error: 'busy' });
    const client = createLlmClient({
      baseUrl: 'http://localhost:8080',
      model: 'test-model',
      timeoutMs: 1000,
    });

    await expect(
      client?.chatCompletion([{ role: 'user', content: 'hello' }]),
    ).rejects.toThrow('LLM API error: 503');
  });

  it('aborts a request that outlives the timeout', async () => {
    const fetchMock = vi.fn(
      (_url: string, init?: RequestInit) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('request aborted')));
        }),
    );
    vi.stubGlobal('fetch', fetchMock);
    const client = createLlmClient({
      baseUrl: 'http://localhost:8080',
      model: 'test-model',
      timeoutMs: 20,
    });

    const startedAt = Date.now();
    await expect(
      client?.chatCompletion([{ role: 'user', content: 'hello' }]),
    ).rejects.toThrow('request aborted');

    expect(Date.now() - startedAt).toBeLessThan(1000);
    expect(fetchMock.mock.calls[0][1]?.signal?.aborted).toBe(true);
  });

  it('rejects a successful response whose body is not JSON', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => new Response('<html>gateway</html>', { status: 200 })),
    );
    const client = createLlmClient({
      baseUrl: 'http://localhost:8080',
      model: 'test-model',
      timeoutMs: 1000,
    });

    await expect(
      client?.chatCompletion([{ role: 'user', content: 'hello' }]),
    ).rejects.toThrow(SyntaxError);
  });
});

// ============================================================================
// Prompt
// ============================================================================

describe('buildOraclePrompt', () => {
  it('lists the categories and every test pair', () => {
    const prompt = buildOraclePrompt(
      [
        { testName: 'Vitamin D3', subgroup: 'Special' },
        { testName: 'Ferritin', subgroup: 'Iron Studies' },
      ],
      CATEGORIES,
    );

    expect(prompt).toBe(
      [
        'Categories: Biochemistry, Clinical, Hematology, Immunology.',
        'Assign each test to the best category.',
        'Return CSV: TestName,Subgroup,Category',
        'Tests:',
        '- Test: Vitamin D3, Subgroup: Special',
        '- Test: Ferritin, Subgroup: Iron Studies',
      ].join('\n'),
    );
  });
});

// ============================================================================
// Response Parsing
// ============================================================================

describe('parseOracleResponse', () => {
  it('parses one decision per line', () => {
    expect(
      parseOracleResponse('Vitamin D3,Special,Biochemistry\nFerritin,Iron Studies,Hematology', CATEGORIES),
    ).toEqual({
      decisions: [
        { testName: 'Vitamin D3', subgroup: 'Special', category: 'Biochemistry' },
        { testName: 'Ferritin', subgroup: 'Iron Studies', category: 'Hematology' },
      ],
      rejectedLines: 0,
    });
  });

  it('returns categories in their configured spelling', () => {
    const { decisions } = parseOracleResponse('Ferritin,Iron Studies, HEMATOLOGY ', CATEGORIES);
    expect(decisions).toEqual([
      { testName: 'Ferritin', subgroup: 'Iron Studies', category: 'Hematology' },
    ]);
  });

  it('skips blank lines and code fences', () => {
    const { decisions, rejectedLines } = parseOracleResponse(
      '```csv\n\nFerritin,Iron Studies,Hematology\n```',
      CATEGORIES,
    );
    expect(decisions).toHaveLength(1);
    expect(rejectedLines).toBe(0);
  });

  it('honours quoted cells', () => {
    const { decisions } = parseOracleResponse('"Urea, Serum",Renal,Biochemistry', CATEGORIES);
    expect(decisions).toEqual([
      { testName: 'Urea, Serum', subgroup: 'Renal', category: 'Biochemistry' },
    ]);
  });

  it('rejects malformed lines and unknown categories one by one', () => {
    expect(
      parseOracleResponse(
        [
          'Here are the results:',
          'Culture,Micro,Microbiology',
          ',Special,Biochemistry',
          'Ferritin,Iron Studies,Hematology',
        ].join('\n'),
        CATEGORIES,
      ),
    ).toEqual({
      decisions: [{ testName: 'Ferritin', subgroup: 'Iron Studies', category: 'Hematology' }],
      rejectedLines: 3,
    });
  });

  it('skips an echoed header line without counting it as rejected', () => {
    expect(
      parseOracleResponse('TestName,Subgroup,CATEGORY\nFerritin,Iron Studies,Hematology', CATEGORIES),
    ).toEqual({
      decisions: [{ testName: 'Ferritin', subgroup: 'Iron Studies', category: 'Hematology' }],
      rejectedLines: 0,
    });
  });
});

// ============================================================================
// Oracle
// ============================================================================

describe('createLlmCategoryOracle', () => {
  it('sends one deterministic request for the whole batch', async () => {
    const calls: Array<{ messages: ChatMessage[]; options?: ChatCompletionOptions }> = [];
    const oracle = createLlmCategoryOracle(
      createMockLlmClient({ content: 'Ferritin,Iron Studies,Hematology', finishReason: 'stop' }, calls),
    );

    const decisions = await oracle.classifyBatch(
      [{ testName: 'Ferritin', subgroup: 'Iron Studies' }],
      CATEGORIES,
    );

    expect(decisions).toEqual([
      { testName: 'Ferritin', subgroup: 'Iron Studies', category: 'Hematology' },
    ]);
    expect(calls).toHaveLength(1);
    expect(calls[0].options).toEqual({ temperature: 0, maxTokens: 800 });
    expect(calls[0].messages.map((m) => m.role)).toEqual(['system', 'user']);
    expect(calls[0].messages[1].content).toContain('- Test: Ferritin, Subgroup: Iron Studies');
  });

  it('does not call the client for an empty batch', async () => {
    const calls: Array<{ messages: ChatMessage[]; options?: ChatCompletionOptions }> = [];
    const oracle = createLlmCategoryOracle(
      createMockLlmClient({ content: '', finishReason: 'stop' }, calls),
    );

    expect(await oracle.classifyBatch([], CATEGORIES)).toEqual([]);
    expect(calls).toHaveLength(0);
  });

  it('reports the number of rejected lines', async () => {
    const onRejectedLines = vi.fn();
    const oracle = createLlmCategoryOracle(
      createMockLlmClient({ content: 'nonsense\nFerritin,Iron Studies,Hematology', finishReason: 'stop' }),
      { onRejectedLines },
    );

    await oracle.classifyBatch([{ testName: 'Ferritin', subgroup: 'Iron Studies' }], CATEGORIES);

    expect(onRejectedLines).toHaveBeenCalledWith(1);
  });

  it('reports a batch whose answer stopped at the token cap', async () => {
    const onTruncated = vi.fn();
    const oracle = createLlmCategoryOracle(
      createMockLlmClient({ content: 'Ferritin,Iron Studies,Hematology', finishReason: 'length' }),
      { onTruncated },
    );

    const decisions = await oracle.classifyBatch(
      [
        { testName: 'Ferritin', subgroup: 'Iron Studies' },
        { testName: 'Vitamin D3', subgroup: 'Special' },
      ],
      CATEGORIES,
    );

    expect(onTruncated).toHaveBeenCalledWith(2);
    expect(decisions).toHaveLength(1);
  });

  it('does not report truncation for a complete answer', async () => {
    const onTruncated = vi.fn();
    const oracle = createLlmCategoryOracle(
      createMockLlmClient({ content: 'Ferritin,Iron Studies,Hematology', finishReason: 'stop' }),
      { onTruncated },
    );

    await oracle.classifyBatch([{ testName: 'Ferritin', subgroup: 'Iron Studies' }], CATEGORIES);

    expect(onTruncated).not.toHaveBeenCalled();
  });

  it('propagates client errors', async () => {
    const oracle = createLlmCategoryOracle(createMockLlmClient(new Error('LLM unavailable')));
    await expect(
      oracle.classifyBatch([{ testName: 'Ferritin', subgroup: 'Iron Studies' }], CATEGORIES),
    ).rejects.toThrow('LLM unavailable');
  });
});

describe('createCategoryOracle', () => {
  it('returns the null oracle without a client', () => {
    expect(createCategoryOracle(null)).toBe(nullCategoryOracle);
  });

  it('null oracle never answers', async () => {
    expect(
      await nullCategoryOracle.classifyBatch([{ testName: 'CBC', subgroup: 'Routine' }], CATEGORIES),
    ).toEqual([]);
  });
});

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { ModelRouterConfig, CompletionRequest, CompletionChunk, Tool, ToolHandler } from '../model-types.js';

// ---------------------------------------------------------------------------
// Mock Anthropic SDK
// ---------------------------------------------------------------------------

const { mockMessagesCreate, mockMessagesStream, mockOpenAICreate } = vi.hoisted(() => ({
  mockMessagesCreate: vi.fn(),
  mockMessagesStream: vi.fn(),
  mockOpenAICreate: vi.fn(),
}));

vi.mock('@anthropic-ai/sdk', () => ({
  default: vi.fn().mockImplementation(function () {
    return {
      messages: {
        create: mockMessagesCreate,
        stream: mockMessagesStream,
      },
    };
  }),
}));

// ---------------------------------------------------------------------------
// Mock openai SDK (for OpenAI / Ollama / OpenAI-compatible adapter)
// ---------------------------------------------------------------------------

vi.mock('openai', () => ({
  default: vi.fn().mockImplementation(function () {
    return {
      chat: {
        completions: {
          create: mockOpenAICreate,
        },
      },
    };
  }),
}));

// ---------------------------------------------------------------------------
// Import after mocks
// ---------------------------------------------------------------------------

import { ModelRouter } from '../model-router.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function makeConfig(overrides?: Partial<ModelRouterConfig>): ModelRouterConfig {
  return {
    providers: {
      anthropic: {
        provider: 'anthropic',
        apiKey: 'test-secret',
      },
    },
    models: [
      {
        id: 'sonnet-4',
        modelName: 'claude-sonnet-4-20250514',
        provider: 'anthropic',
        maxTokens: 4096,
      },
      {
        id: 'haiku-4.5',
        modelName: 'claude-haiku-4-5-20251001',
        provider: 'anthropic',
        maxTokens: 2048,
      },
    ],
    roles: {
      agent: 'sonnet-4',
      router: 'haiku-4.5',
    },
    ...overrides,
  };
}

const mockAnthropicResponse = {
  content: [{ type: 'text', text: 'Hello from Claude' }],
  stop_reason: 'end_turn',
  model: 'claude-sonnet-4-20250514',
  usage: { input_tokens: 10, output_tokens: 20 },
};

function makeRequest(overrides?: Partial<CompletionRequest>): CompletionRequest {
  return {
    messages: [{ role: 'user', content: 'Hi' }],
    settings: {},
    ...overrides,
  };
}

const CLOCK_SCHEMA = { type: 'object' as const, properties: { zone: { type: 'string' } } };

function clockTool(handler: ToolHandler): Tool {
  return { name: 'get_time', description: 'Current time', input_schema: CLOCK_SCHEMA, handler };
}

function abortError(): Error {
  const err = new Error('The operation was aborted');
  err.name = 'AbortError';
  return err;
}

async function collect(stream: AsyncIterable<CompletionChunk>): Promise<CompletionChunk[]> {
  const chunks: CompletionChunk[] = [];
  for await (const chunk of stream) {
    chunks.push(chunk);
  }
  return chunks;
}

function anthropicStream(events: unknown[], finalMessage: unknown) {
  return {
    [Symbol.asyncIterator]: async function* () {
      for (const event of events) yield event;
    },
    finalMessage: vi.fn().mockResolvedValue(finalMessage),
  };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('ModelRouter', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('create()', () => {
    it('initializes with Anthropic provider', async () => {
      const router = await ModelRouter.create(makeConfig());
      expect(router).toBeInstanceOf(ModelRouter);
      expect(router.routerConfig.providers).toHaveProperty('anthropic');
    });

    it('throws when the Anthropic provider has no credentials', async () => {
      const saved = process.env.ANTHROPIC_API_KEY;
      delete process.env.ANTHROPIC_API_KEY;
      try {
        await expect(
          ModelRouter.create(makeConfig({ providers: { anthropic: { provider: 'anthropic' } } })),
        ).rejects.toThrow('anthropic adapter: no credentials found');
      } finally {
        if (saved !== undefined) process.env.ANTHROPIC_API_KEY = saved;
      }
    });
  });

  describe('resolveModel() (tested via complete)', () => {
    it('resolves agent role by default', async () => {
      mockMessagesCreate.mockResolvedValue(mockAnthropicResponse);
      const router = await ModelRouter.create(makeConfig());
      await router.complete(makeRequest());
      expect(mockMessagesCreate).toHaveBeenCalledWith(
        expect.objectContaining({ model: 'claude-sonnet-4-20250514', max_tokens: 4096 }),
        { signal: undefined },
      );
    });

    it('resolves router role', async () => {
      mockMessagesCreate.mockResolvedValue(mockAnthropicResponse);
      const router = await ModelRouter.create(makeConfig());
      await router.complete(makeRequest({ settings: { role: 'router' } }));
      expect(mockMessagesCreate).toHaveBeenCalledWith(
        expect.objectContaining({ model: 'claude-haiku-4-5-20251001', max_tokens: 2048 }),
        { signal: undefined },
      );
    });

    it('falls back to the agent model when no router model is configured', async () => {
      mockMessagesCreate.mockResolvedValue(mockAnthropicResponse);
      const router = await ModelRouter.create(makeConfig({ roles: { agent: 'sonnet-4' } }));
      await router.complete(makeRequest({ settings: { role: 'router' } }));
      expect(mockMessagesCreate).toHaveBeenCalledWith(
        expect.objectContaining({ model: 'claude-sonnet-4-20250514' }),
        { signal: undefined },
      );
    });

    it('uses modelOverride when provided', async () => {
      mockMessagesCreate.mockResolvedValue(mockAnthropicResponse);
      const router = await ModelRouter.create(makeConfig());
      await router.complete(makeRequest({ settings: { modelOverride: 'haiku-4.5' } }));
      expect(mockMessagesCreate).toHaveBeenCalledWith(
        expect.objectContaining({ model: 'claude-haiku-4-5-20251001' }),
        { signal: undefined },
      );
    });

    it('throws for an unknown model id', async () => {
      const router = await ModelRouter.create(makeConfig());
      await expect(
        router.complete(makeRequest({ settings: { modelOverride: 'missing' } })),
      ).rejects.toThrow("model-router: unknown model id 'missing' for role 'agent'");
    });
  });

  describe('complete()', () => {
    it('normalizes the Anthropic response', async () => {
      mockMessagesCreate.mockResolvedValue(mockAnthropicResponse);
      const router = await ModelRouter.create(makeConfig());
      const response = await router.complete(makeRequest());

      expect(response).toEqual({
        content: 'Hello from Claude',
        modelId: 'claude-sonnet-4-20250514',
        stopReason: 'end_turn',
        usage: { inputTokens: 10, outputTokens: 20, totalTokens: 30 },
      });
    });

    it('forwards system text, temperature, user and the abort signal', async () => {
      mockMessagesCreate.mockResolvedValue(mockAnthropicResponse);
      const router = await ModelRouter.create(makeConfig());
      const controller = new AbortController();

      await router.complete(
        makeRequest({ system: 'Be brief.', settings: { temperature: 0, user: 'user-1', maxTokens: 100 } }),
        controller.signal,
      );

      expect(mockMessagesCreate).toHaveBeenCalledWith(
        {
          model: 'claude-sonnet-4-20250514',
          max_tokens: 100,
          messages: [{ role: 'user', content: 'Hi' }],
          system: 'Be brief.',
          temperature: 0,
          metadata: { user_id: 'user-1' },
        },
        { signal: controller.signal },
      );
    });

    it('forces a tool for structured output and returns its input as JSON', async () => {
      mockMessagesCreate.mockResolvedValue({
        content: [{ type: 'tool_use', id: 'tu_1', name: 'route_decision', input: { next: 'Writer' } }],
        stop_reason: 'tool_use',
        model: 'claude-sonnet-4-20250514',
        usage: { input_tokens: 3, output_tokens: 4 },
      });
      const schema = { type: 'object', properties: { next: { type: 'string' } }, required: ['next'] };
      const router = await ModelRouter.create(makeConfig());

      const response = await router.complete(
        makeRequest({ settings: { responseFormat: { type: 'json_schema', name: 'route_decision', description: 'Routing', schema } } }),
      );

      expect(response.content).toBe('{"next":"Writer"}');
      expect(mockMessagesCreate).toHaveBeenCalledWith(
        expect.objectContaining({
          tools: [{ name: 'route_decision', description: 'Routing', input_schema: schema }],
          tool_choice: { type: 'tool', name: 'route_decision' },
        }),
        { signal: undefined },
      );
    });

    it('tries fallback chain on primary failure', async () => {
      mockMessagesCreate
        .mockRejectedValueOnce(new Error('primary failed'))
        .mockResolvedValueOnce({
          ...mockAnthropicResponse,
          model: 'claude-haiku-4-5-20251001',
        });

      const router = await ModelRouter.create(makeConfig({ fallbackChain: ['sonnet-4', 'haiku-4.5'] }));
      const response = await router.complete(makeRequest());

      expect(mockMessagesCreate).toHaveBeenCalledTimes(2);
      expect(response.modelId).toBe('claude-haiku-4-5-20251001');
    });

    it('throws when all fallbacks fail', async () => {
      mockMessagesCreate
        .mockRejectedValueOnce(new Error('primary failed'))
        .mockRejectedValueOnce(new Error('fallback failed'));

      const router = await ModelRouter.create(makeConfig({ fallbackChain: ['sonnet-4', 'haiku-4.5'] }));

      await expect(router.complete(makeRequest())).rejects.toThrow('fallback failed');
    });

    it('re-throws cancellation without walking the fallback chain', async () => {
      mockMessagesCreate.mockRejectedValueOnce(abortError());

      const router = await ModelRouter.create(makeConfig({ fallbackChain: ['sonnet-4', 'haiku-4.5'] }));

      await expect(router.complete(makeRequest())).rejects.toMatchObject({ name: 'AbortError' });
      expect(mockMessagesCreate).toHaveBeenCalledTimes(1);
      expect(router.breakerStates()).toEqual({ anthropic: 'closed' });
    });
  });

  describe('tool loop', () => {
    const toolUseResponse = {
      content: [
        { type: 'text', text: 'Checking. ' },
        { type: 'tool_use', id: 'tu_1', name: 'get_time', input: { zone: 'UTC' } },
      ],
      stop_reason: 'tool_use',
      model: 'claude-sonnet-4-20250514',
      usage: { input_tokens: 10, output_tokens: 5 },
    };

    it('invokes the requested tool and feeds the result back', async () => {
      const handler = vi.fn((_input: Record<string, unknown>) => '12:00');
      mockMessagesCreate.mockResolvedValueOnce(toolUseResponse).mockResolvedValueOnce({
        content: [{ type: 'text', text: 'It is 12:00.' }],
        stop_reason: 'end_turn',
        model: 'claude-sonnet-4-20250514',
        usage: { input_tokens: 20, output_tokens: 7 },
      });
      const router = await ModelRouter.create(makeConfig());

      const response = await router.complete(makeRequest({ settings: { tools: [clockTool(handler)] } }));

      expect(response).toEqual({
        content: 'Checking. It is 12:00.',
        modelId: 'claude-sonnet-4-20250514',
        stopReason: 'end_turn',
        usage: { inputTokens: 30, outputTokens: 12, totalTokens: 42 },
      });
      expect(handler).toHaveBeenCalledWith({ zone: 'UTC' }, undefined);
      expect(mockMessagesCreate).toHaveBeenNthCalledWith(
        1,
        expect.objectContaining({
          tools: [{ name: 'get_time', description: 'Current time', input_schema: CLOCK_SCHEMA }],
        }),
        { signal: undefined },
      );
      expect(mockMessagesCreate.mock.calls[1]?.[0].messages).toEqual([
        { role: 'user', content: 'Hi' },
        {
          role: 'assistant',
          content: [
            { type: 'text', text: 'Checking. ' },
            { type: 'tool_use', id: 'tu_1', name: 'get_time', input: { zone: 'UTC' } },
          ],
        },
        { role: 'user', content: [{ type: 'tool_result', tool_use_id: 'tu_1', content: '12:00' }] },
      ]);
    });

    it('reports unknown tools and handler failures to the model', async () => {
      const handler = vi.fn((_input: Record<string, unknown>): string => {
        throw new Error('clock broken');
      });
      mockMessagesCreate
        .mockResolvedValueOnce({
          ...toolUseResponse,
          content: [
            { type: 'tool_use', id: 'tu_1', name: 'nope', input: {} },
            { type: 'tool_use', id: 'tu_2', name: 'get_time', input: {} },
          ],
        })
        .mockResolvedValueOnce(mockAnthropicResponse);
      const router = await ModelRouter.create(makeConfig());

      const response = await router.complete(makeRequest({ settings: { tools: [clockTool(handler)] } }));

      expect(response.content).toBe('Hello from Claude');
      expect(mockMessagesCreate.mock.calls[1]?.[0].messages[2]).toEqual({
        role: 'user',
        content: [
          { type: 'tool_result', tool_use_id: 'tu_1', content: 'Unknown tool: nope', is_error: true },
          { type: 'tool_result', tool_use_id: 'tu_2', content: 'Error: clock broken', is_error: true },
        ],
      });
    });

    it('stops after maxToolRounds model calls', async () => {
      const handler = vi.fn((_input: Record<string, unknown>) => '12:00');
      mockMessagesCreate.mockResolvedValue(toolUseResponse);
      const router = await ModelRouter.create(makeConfig());

      const response = await router.complete(
        makeRequest({ settings: { tools: [clockTool(handler)], maxToolRounds: 2 } }),
      );

      expect(response.stopReason).toBe('max_tool_rounds');
      expect(response.content).toBe('Checking. Checking. ');
      expect(mockMessagesCreate).toHaveBeenCalledTimes(2);
      expect(handler).toHaveBeenCalledTimes(1);
    });

    it('leaves tools out when toolChoice is none', async () => {
      mockMessagesCreate.mockResolvedValue(mockAnthropicResponse);
      const router = await ModelRouter.create(makeConfig());

      await router.complete(makeRequest({ settings: { tools: [clockTool(vi.fn(() => ''))], toolChoice: 'none' } }));

      expect(mockMessagesCreate.mock.calls[0]?.[0]).not.toHaveProperty('tools');
    });

    it('lets the model call tools before answering in the response format', async () => {
      mockMessagesCreate.mockResolvedValue({
        ...toolUseResponse,
        content: [{ type: 'tool_use', id: 'tu_9', name: 'route_decision', input: { next: 'Writer' } }],
      });
      const schema = { type: 'object', properties: { next: { type: 'string' } } };
      const router = await ModelRouter.create(makeConfig());

      const response = await router.complete(
        makeRequest({
          settings: {
            tools: [clockTool(vi.fn(() => ''))],
            responseFormat: { type: 'json_schema', name: 'route_decision', description: 'Routing', schema },
          },
        }),
      );

      expect(response.content).toBe('{"next":"Writer"}');
      expect(mockMessagesCreate).toHaveBeenCalledTimes(1);
      expect(mockMessagesCreate).toHaveBeenCalledWith(
        expect.objectContaining({
          tools: [
            { name: 'get_time', description: 'Current time', input_schema: CLOCK_SCHEMA },
            { name: 'route_decision', description: 'Routing', input_schema: schema },
          ],
          tool_choice: { type: 'any' },
        }),
        { signal: undefined },
      );
    });
  });

  describe('completeStream()', () => {
    it('yields text and format-tool fragments, then a final chunk with usage', async () => {
      mockMessagesStream.mockReturnValue(
        anthropicStream(
          [
            { type: 'message_start' },
            { type: 'content_block_start', index: 0, content_block: { type: 'text', text: '' } },
            { type: 'content_block_delta', index: 0, delta: { type: 'text_delta', text: 'Hello' } },
            { type: 'content_block_delta', index: 0, delta: { type: 'text_delta', text: ' world' } },
            { type: 'content_block_start', index: 1, content_block: { type: 'tool_use', id: 'tu_1', name: 'route_decision', input: {} } },
            { type: 'content_block_delta', index: 1, delta: { type: 'input_json_delta', partial_json: '{"a":' } },
          ],
          {
            content: [
              { type: 'text', text: 'Hello world' },
              { type: 'tool_use', id: 'tu_1', name: 'route_decision', input: { a: 1 } },
            ],
            stop_reason: 'tool_use',
            model: 'claude-sonnet-4-20250514',
            usage: { input_tokens: 5, output_tokens: 10 },
          },
        ),
      );

      const router = await ModelRouter.create(makeConfig());
      const chunks = await collect(
        router.completeStream(
          makeRequest({ settings: { responseFormat: { type: 'json_schema', name: 'route_decision', schema: {} } } }),
        ),
      );

      expect(chunks).toEqual([
        { content: 'Hello', done: false },
        { content: ' world', done: false },
        { content: '{"a":', done: false },
        {
          content: '',
          done: true,
          modelId: 'claude-sonnet-4-20250514',
          usage: { inputTokens: 5, outputTokens: 10, totalTokens: 15 },
        },
      ]);
    });

    it('streams every tool round without showing tool input', async () => {
      const handler = vi.fn((_input: Record<string, unknown>) => '12:00');
      mockMessagesStream
        .mockReturnValueOnce(
          anthropicStream(
            [
              { type: 'content_block_start', index: 0, content_block: { type: 'text', text: '' } },
              { type: 'content_block_delta', index: 0, delta: { type: 'text_delta', text: 'Checking. ' } },
              { type: 'content_block_start', index: 1, content_block: { type: 'tool_use', id: 'tu_1', name: 'get_time', input: {} } },
              { type: 'content_block_delta', index: 1, delta: { type: 'input_json_delta', partial_json: '{}' } },
            ],
            {
              content: [
                { type: 'text', text: 'Checking. ' },
                { type: 'tool_use', id: 'tu_1', name: 'get_time', input: {} },
              ],
              stop_reason: 'tool_use',
              model: 'claude-sonnet-4-20250514',
              usage: { input_tokens: 10, output_tokens: 5 },
            },
          ),
        )
        .mockReturnValueOnce(
          anthropicStream(
            [{ type: 'content_block_delta', index: 0, delta: { type: 'text_delta', text: 'It is 12:00.' } }],
            {
              content: [{ type: 'text', text: 'It is 12:00.' }],
              stop_reason: 'end_turn',
              model: 'claude-sonnet-4-20250514',
              usage: { input_tokens: 20, output_tokens: 7 },
            },
          ),
        );

      const router = await ModelRouter.create(makeConfig());
      const chunks = await collect(router.completeStream(makeRequest({ settings: { tools: [clockTool(handler)] } })));

      expect(chunks).toEqual([
        { content: 'Checking. ', done: false },
        { content: 'It is 12:00.', done: false },
        {
          content: '',
          done: true,
          modelId: 'claude-sonnet-4-20250514',
          usage: { inputTokens: 30, outputTokens: 12, totalTokens: 42 },
        },
      ]);
      expect(handler).toHaveBeenCalledTimes(1);
      expect(mockMessagesStream).toHaveBeenCalledTimes(2);
    });

    it('does NOT use fallback (fails immediately)', async () => {
      mockMessagesStream.mockImplementation(() => {
        throw new Error('stream failed');
      });

      const router = await ModelRouter.create(makeConfig({ fallbackChain: ['sonnet-4', 'haiku-4.5'] }));

      await expect(collect(router.completeStream(makeRequest()))).rejects.toThrow('stream failed');
      expect(mockMessagesStream).toHaveBeenCalledTimes(1);
    });

    it('uses circuit breaker for streaming', async () => {
      const router = await ModelRouter.create(makeConfig());

      for (let i = 0; i < 5; i++) {
        mockMessagesStream.mockImplementationOnce(() => {
          throw new Error('stream failed');
        });
        await expect(collect(router.completeStream(makeRequest()))).rejects.toThrow('stream failed');
      }

      mockMessagesStream.mockClear();

      await expect(collect(router.completeStream(makeRequest()))).rejects.toThrow(/circuit breaker.*open/i);
      expect(mockMessagesStream).not.toHaveBeenCalled();
      expect(router.breakerStates()).toEqual({ anthropic: 'open' });
    });
  });

  describe('OpenAI-compatible adapters', () => {
    const ollamaConfig: ModelRouterConfig = {
      providers: {
        anthropic: { provider: 'anthropic', apiKey: 'test-secret' },
        ollama: { provider: 'ollama', baseURL: 'http://localhost:11434/v1' },
      },
      models: [
        { id: 'sonnet-4', modelName: 'claude-sonnet-4-20250514', provider: 'anthropic', maxTokens: 4096 },
        { id: 'llama3', modelName: 'llama3:8b', provider: 'ollama', maxTokens: 1024 },
      ],
      roles: { agent: 'llama3', router: 'sonnet-4' },
    };

    it('lazy-inits the Ollama adapter and normalizes the response', async () => {
      mockOpenAICreate.mockResolvedValue({
        choices: [{ message: { content: 'Hello from Llama' }, finish_reason: 'stop' }],
        model: 'llama3:8b',
        usage: { prompt_tokens: 5, completion_tokens: 10, total_tokens: 15 },
      });

      const router = await ModelRouter.create(ollamaConfig);
      const response = await router.complete(makeRequest({ system: 'Be brief.' }));

      expect(response).toEqual({
        content: 'Hello from Llama',
        modelId: 'llama3:8b',
        stopReason: 'end_turn',
        usage: { inputTokens: 5, outputTokens: 10, totalTokens: 15 },
      });
      expect(mockOpenAICreate).toHaveBeenCalledWith(
        expect.objectContaining({
          model: 'llama3:8b',
          max_tokens: 1024,
          messages: [
            { role: 'system', content: 'Be brief.' },
            { role: 'user', content: 'Hi' },
          ],
          response_format: undefined,
        }),
        { signal: undefined },
      );
    });

    it('requests a strict json_schema response format', async () => {
      mockOpenAICreate.mockResolvedValue({
        choices: [{ message: { content: '{"next":"Planner"}' }, finish_reason: 'stop' }],
        model: 'llama3:8b',
      });
      const schema = { type: 'object', properties: { next: { type: 'string' } } };

      const router = await ModelRouter.create(ollamaConfig);
      const response = await router.complete(
        makeRequest({ settings: { responseFormat: { type: 'json_schema', name: 'route_decision', schema } } }),
      );

      expect(response.content).toBe('{"next":"Planner"}');
      expect(response.usage).toBeUndefined();
      expect(mockOpenAICreate).toHaveBeenCalledWith(
        expect.objectContaining({
          response_format: {
            type: 'json_schema',
            json_schema: { name: 'route_decision', description: undefined, schema, strict: true },
          },
        }),
        { signal: undefined },
      );
    });

    it('streams deltas and reports usage from the trailing chunk', async () => {
      mockOpenAICreate.mockResolvedValue({
        [Symbol.asyncIterator]: async function* () {
          yield { model: 'llama3:8b', choices: [{ delta: { content: 'Hel' } }] };
          yield { model: 'llama3:8b', choices: [{ delta: { content: 'lo' }, finish_reason: 'stop' }] };
          yield { model: 'llama3:8b', choices: [], usage: { prompt_tokens: 2, completion_tokens: 3, total_tokens: 5 } };
        },
      });

      const router = await ModelRouter.create(ollamaConfig);
      const chunks = await collect(router.completeStream(makeRequest()));

      expect(chunks).toEqual([
        { content: 'Hel', done: false },
        { content: 'lo', done: false },
        { content: '', done: true, modelId: 'llama3:8b', usage: { inputTokens: 2, outputTokens: 3, totalTokens: 5 } },
      ]);
      expect(mockOpenAICreate).toHaveBeenCalledWith(
        expect.objectContaining({ stream: true, stream_options: { include_usage: true } }),
        { signal: undefined },
      );
    });

    it('sends tools as functions and answers tool calls with tool messages', async () => {
      const handler = vi.fn((_input: Record<string, unknown>) => '12:00');
      mockOpenAICreate
        .mockResolvedValueOnce({
          choices: [
            {
              message: {
                content: null,
                tool_calls: [{ id: 'call_1', type: 'function', function: { name: 'get_time', arguments: '{"zone":"UTC"}' } }],
              },
              finish_reason: 'tool_calls',
            },
          ],
          model: 'llama3:8b',
        })
        .mockResolvedValueOnce({
          choices: [{ message: { content: 'It is 12:00.' }, finish_reason: 'stop' }],
          model: 'llama3:8b',
        });

      const router = await ModelRouter.create(ollamaConfig);
      const response = await router.complete(makeRequest({ settings: { tools: [clockTool(handler)] } }));

      expect(response).toEqual({ content: 'It is 12:00.', modelId: 'llama3:8b', stopReason: 'end_turn', usage: undefined });
      expect(handler).toHaveBeenCalledWith({ zone: 'UTC' }, undefined);
      expect(mockOpenAICreate).toHaveBeenNthCalledWith(
        1,
        expect.objectContaining({
          tools: [
            { type: 'function', function: { name: 'get_time', description: 'Current time', parameters: CLOCK_SCHEMA } },
          ],
        }),
        { signal: undefined },
      );
      expect(mockOpenAICreate.mock.calls[1]?.[0].messages).toEqual([
        { role: 'user', content: 'Hi' },
        {
          role: 'assistant',
          content: null,
          tool_calls: [{ id: 'call_1', type: 'function', function: { name: 'get_time', arguments: '{"zone":"UTC"}' } }],
        },
        { role: 'tool', tool_call_id: 'call_1', content: '12:00' },
      ]);
    });

    it('throws when the provider has no config', async () => {
      const router = await ModelRouter.create({
        ...ollamaConfig,
        providers: { anthropic: { provider: 'anthropic', apiKey: 'test-secret' } },
      });

      await expect(router.complete(makeRequest())).rejects.toThrow("model-router: no provider config for 'ollama'");
    });
  });
});

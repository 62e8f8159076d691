/**
 * ModelRouter routes completion requests to the appropriate LLM provider.
 *
 * Supports:
 *   - Anthropic (official SDK, structured output through a forced tool)
 *   - OpenAI (openai SDK, structured output through response_format)
 *   - Ollama / OpenAI-compatible (openai SDK with custom baseURL)
 *
 * The router resolves role -> model definition -> provider adapter, walks the
 * fallback chain, runs the tool loop, and normalises responses into
 * provider-agnostic types.
 */

import Anthropic from '@anthropic-ai/sdk';
import type OpenAI from 'openai';
import { logger } from './logger.js';
import { CircuitBreaker } from './circuit-breaker.js';
import { isAbortError } from './errors.js';
import { withSpan } from './tracing.js';
import type {
  ModelRouterConfig,
  ModelDefinition,
  ModelProvider,
  AnthropicProviderConfig,
  OpenAIProviderConfig,
  OllamaProviderConfig,
  OpenAICompatibleProviderConfig,
  CompletionProvider,
  CompletionRequest,
  CompletionResponse,
  CompletionChunk,
  CompletionSettings,
  Tool,
  UsageRecord,
} from './model-types.js';

const log = logger.child({ module: 'model-router' });

export const DEFAULT_MAX_TOOL_ROUNDS = 8;

// ---------------------------------------------------------------------------
// Provider-agnostic chat interfaces (tool rounds included)
// ---------------------------------------------------------------------------

type ChatContentBlock =
  | { type: 'text'; text: string }
  | { type: 'tool_use'; id: string; name: string; input: Record<string, unknown> }
  | { type: 'tool_result'; tool_use_id: string; content: string; is_error?: boolean };

interface ChatMessage {
  role: 'user' | 'assistant';
  content: string | ChatContentBlock[];
}

interface ToolCall {
  id: string;
  name: string;
  input: Record<string, unknown>;
}

interface AdapterRequest {
  system?: string;
  messages: ChatMessage[];
  settings: CompletionSettings;
}

/** One model call: its text and the tool calls it asked for. */
interface AdapterTurn {
  content: string;
  toolCalls: ToolCall[];
  modelId: string;
  stopReason: string;
  usage?: UsageRecord;
}

type StreamEvent = { type: 'delta'; content: string } | { type: 'end'; turn: AdapterTurn };

// ---------------------------------------------------------------------------
// Provider adapter interface
// ---------------------------------------------------------------------------

interface ProviderAdapter {
  complete(model: ModelDefinition, request: AdapterRequest, signal?: AbortSignal): Promise<AdapterTurn>;
  completeStream(model: ModelDefinition, request: AdapterRequest, signal?: AbortSignal): AsyncGenerator<StreamEvent>;
}

function toUsage(inputTokens: number, outputTokens: number): UsageRecord {
  return { inputTokens, outputTokens, totalTokens: inputTokens + outputTokens };
}

function addUsage(total: UsageRecord | undefined, next: UsageRecord | undefined): UsageRecord | undefined {
  if (!next) return total;
  if (!total) return next;
  return toUsage(total.inputTokens + next.inputTokens, total.outputTokens + next.outputTokens);
}

/** Tools advertised to the model for this request */
function activeTools(settings: CompletionSettings): Tool[] {
  if (settings.toolChoice === 'none') return [];
  return settings.tools ?? [];
}

function toToolInput(value: unknown): Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return {};
  return value as Record<string, unknown>;
}

/**
 * The SDKs raise their own abort errors (plain `Error`s by name). When our
 * signal fired, surface its reason so callers see a cancellation.
 */
function rethrow(err: unknown, signal: AbortSignal | undefined): never {
  if (signal?.aborted) throw signal.reason;
  throw err;
}

// ---------------------------------------------------------------------------
// Anthropic adapter
// ---------------------------------------------------------------------------

/** Text of the reply, or the forced tool's input serialised as JSON. */
function anthropicContent(blocks: Anthropic.Messages.ContentBlock[], formatName: string | undefined): string {
  if (formatName) {
    for (const block of blocks) {
      if (block.type === 'tool_use' && block.name === formatName) {
        return JSON.stringify(block.input);
      }
    }
  }
  let text = '';
  for (const block of blocks) {
    if (block.type === 'text') text += block.text;
  }
  return text;
}

function anthropicTurn(message: Anthropic.Messages.Message, formatName: string | undefined): AdapterTurn {
  const toolCalls: ToolCall[] = [];
  for (const block of message.content) {
    if (block.type === 'tool_use' && block.name !== formatName) {
      toolCalls.push({ id: block.id, name: block.name, input: toToolInput(block.input) });
    }
  }
  return {
    content: anthropicContent(message.content, formatName),
    toolCalls,
    modelId: message.model,
    stopReason: message.stop_reason ?? 'end_turn',
    usage: toUsage(message.usage.input_tokens, message.usage.output_tokens),
  };
}

function toAnthropicBlock(block: ChatContentBlock): Anthropic.Messages.ContentBlockParam {
  switch (block.type) {
    case 'text':
      return { type: 'text', text: block.text };
    case 'tool_use':
      return { type: 'tool_use', id: block.id, name: block.name, input: block.input };
    case 'tool_result':
      return block.is_error
        ? { type: 'tool_result', tool_use_id: block.tool_use_id, content: block.content, is_error: true }
        : { type: 'tool_result', tool_use_id: block.tool_use_id, content: block.content };
  }
}

function anthropicParams(model: ModelDefinition, request: AdapterRequest): Anthropic.Messages.MessageCreateParamsNonStreaming {
  const { settings } = request;
  const params: Anthropic.Messages.MessageCreateParamsNonStreaming = {
    model: model.modelName,
    max_tokens: settings.maxTokens ?? model.maxTokens,
    messages: request.messages.map((m) => ({
      role: m.role,
      content: typeof m.content === 'string' ? m.content : m.content.map(toAnthropicBlock),
    })),
  };
  if (request.system) params.system = request.system;
  if (settings.temperature !== undefined) params.temperature = settings.temperature;
  if (settings.user) params.metadata = { user_id: settings.user };

  const tools: Anthropic.Messages.Tool[] = activeTools(settings).map((t) => ({
    name: t.name,
    description: t.description,
    input_schema: t.input_schema,
  }));
  const format = settings.responseFormat;
  if (format) {
    // With callable tools the model may use them first; any tool call is
    // required so the reply still ends in the format tool.
    params.tool_choice = tools.length > 0 ? { type: 'any' } : { type: 'tool', name: format.name };
    tools.push({
      name: format.name,
      description: format.description ?? `Respond with a ${format.name} object.`,
      input_schema: { ...format.schema, type: 'object' },
    });
  }
  if (tools.length > 0) params.tools = tools;
  return params;
}

function createAnthropicAdapter(providerCfg: AnthropicProviderConfig): ProviderAdapter {
  const apiKey = providerCfg.apiKey || process.env.ANTHROPIC_API_KEY;
  if (!apiKey) {
    throw new Error('anthropic adapter: no credentials found');
  }
  const client = new Anthropic({ apiKey, baseURL: providerCfg.baseURL });
  log.info('anthropic adapter: using API key');

  return {
    async complete(model, request, signal) {
      try {
        const response = await client.messages.create(anthropicParams(model, request), { signal });
        return anthropicTurn(response, request.settings.responseFormat?.name);
      } catch (err) {
        rethrow(err, signal);
      }
    },

    async *completeStream(model, request, signal) {
      const formatName = request.settings.responseFormat?.name;
      try {
        const stream = client.messages.stream(anthropicParams(model, request), { signal });
        // Only the format tool's input is reply text; other tool inputs are not shown.
        const formatBlocks = new Set<number>();

        for await (const event of stream) {
          if (event.type === 'content_block_start') {
            if (event.content_block.type === 'tool_use' && event.content_block.name === formatName) {
              formatBlocks.add(event.index);
            }
            continue;
          }
          if (event.type !== 'content_block_delta') continue;
          if (event.delta.type === 'text_delta') {
            yield { type: 'delta', content: event.delta.text };
          } else if (event.delta.type === 'input_json_delta' && formatBlocks.has(event.index)) {
            yield { type: 'delta', content: event.delta.partial_json };
          }
        }

        yield { type: 'end', turn: anthropicTurn(await stream.finalMessage(), formatName) };
      } catch (err) {
        rethrow(err, signal);
      }
    },
  };
}

// ---------------------------------------------------------------------------
// OpenAI / Ollama / OpenAI-compatible adapter (uses openai SDK)
// ---------------------------------------------------------------------------

type OpenAIMessage = OpenAI.ChatCompletionMessageParam;

/** System text becomes the leading system message; tool results become tool messages. */
function toOpenAIMessages(request: AdapterRequest): OpenAIMessage[] {
  const out: OpenAIMessage[] = [];
  if (request.system) {
    out.push({ role: 'system', content: request.system });
  }
  for (const msg of request.messages) {
    if (typeof msg.content === 'string') {
      out.push(msg.role === 'user' ? { role: 'user', content: msg.content } : { role: 'assistant', content: msg.content });
      continue;
    }
    if (msg.role === 'assistant') {
      let text = '';
      const toolCalls: OpenAI.ChatCompletionMessageToolCall[] = [];
      for (const block of msg.content) {
        if (block.type === 'text') text += block.text;
        if (block.type === 'tool_use') {
          toolCalls.push({ id: block.id, type: 'function', function: { name: block.name, arguments: JSON.stringify(block.input) } });
        }
      }
      out.push(toolCalls.length > 0 ? { role: 'assistant', content: text || null, tool_calls: toolCalls } : { role: 'assistant', content: text });
      continue;
    }
    for (const block of msg.content) {
      if (block.type === 'tool_result') out.push({ role: 'tool', tool_call_id: block.tool_use_id, content: block.content });
      if (block.type === 'text') out.push({ role: 'user', content: block.text });
    }
  }
  return out;
}

function parseToolArguments(name: string, text: string): Record<string, unknown> {
  if (!text) return {};
  try {
    return toToolInput(JSON.parse(text));
  } catch (err) {
    log.warn({ err, tool: name }, 'tool call arguments are not valid JSON');
    return {};
  }
}

function normaliseFinishReason(reason: string | null | undefined): string {
  if (!reason || reason === 'stop') return 'end_turn';
  if (reason === 'tool_calls') return 'tool_use';
  return reason;
}

function openAIClientOptions(
  providerCfg: OpenAIProviderConfig | OllamaProviderConfig | OpenAICompatibleProviderConfig,
): { apiKey: string; baseURL?: string; organization?: string } {
  switch (providerCfg.provider) {
    case 'openai': {
      const apiKey = providerCfg.apiKey || process.env.OPENAI_API_KEY;
      if (!apiKey) {
        throw new Error('openai adapter: no credentials found');
      }
      return { apiKey, organization: providerCfg.organization };
    }
    case 'ollama':
      return { apiKey: 'not-needed', baseURL: providerCfg.baseURL ?? 'http://localhost:11434/v1' };
    case 'openai-compatible':
      return { apiKey: providerCfg.apiKey ?? 'not-needed', baseURL: providerCfg.baseURL };
  }
}

async function createOpenAIAdapter(
  providerCfg: OpenAIProviderConfig | OllamaProviderConfig | OpenAICompatibleProviderConfig,
): Promise<ProviderAdapter> {
  // Dynamic import, loaded on first use of the provider
  const { default: OpenAIClient } = await import('openai');

  const client = new OpenAIClient(openAIClientOptions(providerCfg));

  log.info({ provider: providerCfg.provider }, 'openai adapter: initialized');

  function baseParams(model: ModelDefinition, request: AdapterRequest) {
    const { settings } = request;
    const format = settings.responseFormat;
    const tools: OpenAI.ChatCompletionTool[] = activeTools(settings).map((t) => ({
      type: 'function',
      function: { name: t.name, description: t.description, parameters: t.input_schema },
    }));
    return {
      model: model.modelName,
      max_tokens: settings.maxTokens ?? model.maxTokens,
      messages: toOpenAIMessages(request),
      temperature: settings.temperature,
      user: settings.user,
      tools: tools.length > 0 ? tools : undefined,
      response_format: format
        ? {
            type: 'json_schema' as const,
            json_schema: { name: format.name, description: format.description, schema: format.schema, strict: true },
          }
        : undefined,
    };
  }

  return {
    async complete(model, request, signal) {
      try {
        const response = await client.chat.completions.create(baseParams(model, request), { signal });

        const choice = response.choices[0];
        if (!choice) {
          throw new Error('openai adapter: no choices in response');
        }

        return {
          content: choice.message.content ?? '',
          toolCalls: (choice.message.tool_calls ?? []).map((call) => ({
            id: call.id,
            name: call.function.name,
            input: parseToolArguments(call.function.name, call.function.arguments),
          })),
          modelId: response.model,
          stopReason: normaliseFinishReason(choice.finish_reason),
          usage: response.usage
            ? toUsage(response.usage.prompt_tokens, response.usage.completion_tokens)
            : undefined,
        };
      } catch (err) {
        rethrow(err, signal);
      }
    },

    async *completeStream(model, request, signal) {
      try {
        const stream = await client.chat.completions.create(
          { ...baseParams(model, request), stream: true, stream_options: { include_usage: true } },
          { signal },
        );

        let content = '';
        let modelId = model.modelName;
        let finishReason: string | null | undefined;
        let usage: UsageRecord | undefined;
        // Tool calls arrive in fragments keyed by index
        const calls = new Map<number, { id: string; name: string; arguments: string }>();

        for await (const chunk of stream) {
          modelId = chunk.model || modelId;
          if (chunk.usage) {
            usage = toUsage(chunk.usage.prompt_tokens, chunk.usage.completion_tokens);
          }
          const choice = chunk.choices[0];
          if (choice?.finish_reason) finishReason = choice.finish_reason;
          const delta = choice?.delta;
          for (const fragment of delta?.tool_calls ?? []) {
            const call = calls.get(fragment.index) ?? { id: '', name: '', arguments: '' };
            calls.set(fragment.index, call);
            if (fragment.id) call.id = fragment.id;
            if (fragment.function?.name) call.name += fragment.function.name;
            if (fragment.function?.arguments) call.arguments += fragment.function.arguments;
          }
          if (delta?.content) {
            content += delta.content;
            yield { type: 'delta', content: delta.content };
          }
        }

        const toolCalls = [...calls.entries()]
          .sort(([a], [b]) => a - b)
          .map(([, call]) => ({ id: call.id, name: call.name, input: parseToolArguments(call.name, call.arguments) }));
        yield { type: 'end', turn: { content, toolCalls, modelId, stopReason: normaliseFinishReason(finishReason), usage } };
      } catch (err) {
        rethrow(err, signal);
      }
    },
  };
}

// ---------------------------------------------------------------------------
// Tool loop helpers
// ---------------------------------------------------------------------------

/** The assistant turn that asked for tools, as it is echoed back to the model. */
function toolRequestMessage(turn: AdapterTurn): ChatMessage {
  const blocks: ChatContentBlock[] = [];
  if (turn.content) blocks.push({ type: 'text', text: turn.content });
  for (const call of turn.toolCalls) {
    blocks.push({ type: 'tool_use', id: call.id, name: call.name, input: call.input });
  }
  return { role: 'assistant', content: blocks };
}

/**
 * Run every requested tool, in order, so each call gets a matching result.
 * Unknown tools and handler failures are reported to the model; cancellation
 * propagates.
 */
async function runTools(calls: ToolCall[], tools: Tool[], signal: AbortSignal | undefined): Promise<ChatMessage> {
  const results: ChatContentBlock[] = [];

  for (const call of calls) {
    signal?.throwIfAborted();
    const tool = tools.find((t) => t.name === call.name);
    if (!tool) {
      log.warn({ tool: call.name }, 'model called an unknown tool');
      results.push({ type: 'tool_result', tool_use_id: call.id, content: `Unknown tool: ${call.name}`, is_error: true });
      continue;
    }

    log.info({ tool: call.name, input: call.input }, 'executing tool');
    try {
      const output = await withSpan(`tool.${call.name}`, { 'tool.name': call.name }, async () =>
        tool.handler(call.input, signal),
      );
      results.push({ type: 'tool_result', tool_use_id: call.id, content: output });
    } catch (err) {
      if (isAbortError(err)) throw err;
      const errorMsg = err instanceof Error ? err.message : String(err);
      log.error({ err, tool: call.name }, 'tool execution failed');
      results.push({ type: 'tool_result', tool_use_id: call.id, content: `Error: ${errorMsg}`, is_error: true });
    }
  }

  return { role: 'user', content: results };
}

// ---------------------------------------------------------------------------
// ModelRouter class
// ---------------------------------------------------------------------------

export class ModelRouter implements CompletionProvider {
  private adapters: Map<ModelProvider, ProviderAdapter> = new Map();
  private circuitBreakers: Map<ModelProvider, CircuitBreaker> = new Map();
  private config: ModelRouterConfig;

  private constructor(config: ModelRouterConfig) {
    this.config = config;
  }

  /** The resolved config for external inspection */
  get routerConfig(): ModelRouterConfig {
    return this.config;
  }

  /**
   * Factory: create and initialise a ModelRouter.
   * Eagerly creates the Anthropic adapter; others are lazy.
   */
  static async create(config: ModelRouterConfig): Promise<ModelRouter> {
    const router = new ModelRouter(config);

    const anthropicCfg = config.providers.anthropic;
    if (anthropicCfg && anthropicCfg.provider === 'anthropic') {
      router.adapters.set('anthropic', createAnthropicAdapter(anthropicCfg));
    }

    return router;
  }

  /** Current breaker state per provider that has been called */
  breakerStates(): Partial<Record<ModelProvider, string>> {
    const out: Partial<Record<ModelProvider, string>> = {};
    for (const [provider, cb] of this.circuitBreakers) {
      out[provider] = cb.currentState;
    }
    return out;
  }

  private getOrCreateBreaker(provider: ModelProvider): CircuitBreaker {
    let cb = this.circuitBreakers.get(provider);
    if (!cb) {
      cb = new CircuitBreaker({
        name: `model-router-${provider}`,
        failureThreshold: 5,
        resetTimeoutMs: 30_000,
      });
      this.circuitBreakers.set(provider, cb);
    }
    return cb;
  }

  // -----------------------------------------------------------------------
  // Model resolution
  // -----------------------------------------------------------------------

  private resolveModel(request: CompletionRequest): ModelDefinition {
    const role = request.settings.role ?? 'agent';
    const modelId = request.settings.modelOverride ?? this.config.roles[role] ?? this.config.roles.agent;

    const model = this.config.models.find((m) => m.id === modelId);
    if (!model) {
      throw new Error(`model-router: unknown model id '${modelId}' for role '${role}'`);
    }

    return model;
  }

  private async getAdapter(provider: ModelProvider): Promise<ProviderAdapter> {
    const existing = this.adapters.get(provider);
    if (existing) return existing;

    const providerCfg = this.config.providers[provider];
    if (!providerCfg) {
      throw new Error(`model-router: no provider config for '${provider}'`);
    }

    if (providerCfg.provider === 'anthropic') {
      const adapter = createAnthropicAdapter(providerCfg);
      this.adapters.set(provider, adapter);
      return adapter;
    }

    const adapter = await createOpenAIAdapter(providerCfg);
    this.adapters.set(provider, adapter);
    return adapter;
  }

  // -----------------------------------------------------------------------
  // Public API
  // -----------------------------------------------------------------------

  /** Non-streaming completion with fallback support. Cancellation skips the fallback chain. */
  async complete(request: CompletionRequest, signal?: AbortSignal): Promise<CompletionResponse> {
    const model = this.resolveModel(request);
    const modelsToTry = [model];

    if (this.config.fallbackChain) {
      for (const fbId of this.config.fallbackChain) {
        if (fbId === model.id) continue;
        const fbModel = this.config.models.find((m) => m.id === fbId);
        if (fbModel) modelsToTry.push(fbModel);
      }
    }

    let lastError: Error = new Error('All models in fallback chain failed');
    for (const m of modelsToTry) {
      const start = Date.now();
      try {
        const adapter = await this.getAdapter(m.provider);
        const cb = this.getOrCreateBreaker(m.provider);
        log.info({ model: m.modelName, provider: m.provider, role: request.settings.role ?? 'agent' }, 'routing completion request');
        const result = await this.completeWithTools(m, adapter, cb, request, signal);
        log.debug({ model: m.modelName, durationMs: Date.now() - start, usage: result.usage }, 'completion finished');
        return result;
      } catch (err) {
        if (isAbortError(err)) throw err;
        lastError = err instanceof Error ? err : new Error(String(err));
        log.warn(
          { err, model: m.modelName, provider: m.provider, durationMs: Date.now() - start },
          'completion request failed, trying fallback',
        );
      }
    }

    throw lastError;
  }

  /** Streaming completion with circuit breaker (no fallback). Tool rounds stream back to back. */
  async *completeStream(request: CompletionRequest, signal?: AbortSignal): AsyncGenerator<CompletionChunk> {
    const model = this.resolveModel(request);
    const adapter = await this.getAdapter(model.provider);
    const cb = this.getOrCreateBreaker(model.provider);
    log.info({ model: model.modelName, provider: model.provider, role: request.settings.role ?? 'agent' }, 'routing streaming completion request');

    const tools = activeTools(request.settings);
    const maxRounds = request.settings.maxToolRounds ?? DEFAULT_MAX_TOOL_ROUNDS;
    const messages: ChatMessage[] = [...request.messages];
    let usage: UsageRecord | undefined;

    for (let round = 1; ; round++) {
      let turn: AdapterTurn | undefined;
      const events = cb.executeStream(() => adapter.completeStream(model, { ...request, messages: [...messages] }, signal));
      for await (const event of events) {
        if (event.type === 'delta') {
          yield { content: event.content, done: false };
        } else {
          turn = event.turn;
        }
      }
      if (!turn) {
        throw new Error('model-router: stream ended without a final message');
      }
      usage = addUsage(usage, turn.usage);

      if (tools.length === 0 || turn.toolCalls.length === 0 || round >= maxRounds) {
        if (tools.length > 0 && turn.toolCalls.length > 0) {
          log.warn({ model: model.modelName, maxRounds }, 'tool rounds exhausted');
        }
        yield { content: '', done: true, modelId: turn.modelId, usage };
        return;
      }
      messages.push(toolRequestMessage(turn), await runTools(turn.toolCalls, tools, signal));
    }
  }

  /**
   * Call the model until it answers without asking for a tool, feeding each
   * round's tool results back. The reply joins the text of every round.
   */
  private async completeWithTools(
    model: ModelDefinition,
    adapter: ProviderAdapter,
    cb: CircuitBreaker,
    request: CompletionRequest,
    signal: AbortSignal | undefined,
  ): Promise<CompletionResponse> {
    const tools = activeTools(request.settings);
    const maxRounds = request.settings.maxToolRounds ?? DEFAULT_MAX_TOOL_ROUNDS;
    const messages: ChatMessage[] = [...request.messages];
    let content = '';
    let usage: UsageRecord | undefined;

    for (let round = 1; ; round++) {
      const turn = await cb.execute(() => adapter.complete(model, { ...request, messages: [...messages] }, signal));
      content += turn.content;
      usage = addUsage(usage, turn.usage);

      if (tools.length === 0 || turn.toolCalls.length === 0) {
        return { content, modelId: turn.modelId, stopReason: turn.stopReason, usage };
      }
      if (round >= maxRounds) {
        log.warn({ model: model.modelName, maxRounds }, 'tool rounds exhausted');
        return { content, modelId: turn.modelId, stopReason: 'max_tool_rounds', usage };
      }
      messages.push(toolRequestMessage(turn), await runTools(turn.toolCalls, tools, signal));
    }
  }
}

/**
 * Model Router types: provider-agnostic model configuration and the
 * completion contract consumed by LLM-backed agents.
 */

// ---------------------------------------------------------------------------
// Provider enum
// ---------------------------------------------------------------------------

export type ModelProvider = 'anthropic' | 'openai' | 'ollama' | 'openai-compatible';

// ---------------------------------------------------------------------------
// Provider credential configuration
// ---------------------------------------------------------------------------

export interface AnthropicProviderConfig {
  provider: 'anthropic';
  /** Standard API key (falls back to ANTHROPIC_API_KEY) */
  apiKey?: string;
  /** Override base URL */
  baseURL?: string;
}

export interface OpenAIProviderConfig {
  provider: 'openai';
  /** Falls back to OPENAI_API_KEY */
  apiKey?: string;
  organization?: string;
}

export interface OllamaProviderConfig {
  provider: 'ollama';
  /** Base URL for the Ollama server (default: http://localhost:11434/v1) */
  baseURL?: string;
}

export interface OpenAICompatibleProviderConfig {
  provider: 'openai-compatible';
  apiKey?: string;
  baseURL: string;
}

export type ProviderConfig =
  | AnthropicProviderConfig
  | OpenAIProviderConfig
  | OllamaProviderConfig
  | OpenAICompatibleProviderConfig;

// ---------------------------------------------------------------------------
// Model definition
// ---------------------------------------------------------------------------

export interface ModelDefinition {
  /** Unique id used to reference this model in roles/overrides (e.g. "gpt-4o") */
  id: string;
  /** Model string sent to the provider API */
  modelName: string;
  /** Which provider to use */
  provider: ModelProvider;
  /** Max tokens for this model's responses */
  maxTokens: number;
}

// ---------------------------------------------------------------------------
// Role assignments
// ---------------------------------------------------------------------------

/** Named roles that map to model IDs */
export interface ModelRoles {
  /** Specialized agents */
  agent: string;
  /** Router agent; falls back to agent */
  router?: string;
}

export type ModelRole = keyof ModelRoles;

// ---------------------------------------------------------------------------
// Top-level router configuration
// ---------------------------------------------------------------------------

export interface ModelRouterConfig {
  /** All available provider configurations keyed by provider name */
  providers: Partial<Record<ModelProvider, ProviderConfig>>;
  /** All available model definitions */
  models: ModelDefinition[];
  /** Role-to-model-id mapping */
  roles: ModelRoles;
  /** Ordered list of model IDs to try if the primary model fails */
  fallbackChain?: string[];
}

// ---------------------------------------------------------------------------
// Completion contract
// ---------------------------------------------------------------------------

/** A turn as the provider sees it; system text travels separately. */
export interface CompletionTurn {
  role: 'user' | 'assistant';
  content: string;
}

/** JSON schema constraint on the reply */
export interface JsonSchemaResponseFormat {
  type: 'json_schema';
  /** Schema name, [a-zA-Z0-9_-] only */
  name: string;
  description?: string;
  schema: Record<string, unknown>;
}

/** Tool definition (matches Anthropic format for simplicity) */
export interface ToolDefinition {
  /** [a-zA-Z0-9_-] only */
  name: string;
  description: string;
  input_schema: {
    type: 'object';
    properties?: Record<string, unknown>;
    required?: string[];
  };
}

/** Returns the text fed back to the model; a throw is reported to the model as an error result. */
export type ToolHandler = (input: Record<string, unknown>, signal?: AbortSignal) => Promise<string> | string;

export interface Tool extends ToolDefinition {
  handler: ToolHandler;
}

/**
 * How tools are used: `auto` advertises them and invokes whatever the model
 * calls, feeding results back until it answers; `none` leaves them out.
 */
export type ToolChoice = 'auto' | 'none';

export interface CompletionSettings {
  /** Which role to use for model selection (defaults to 'agent') */
  role?: ModelRole;
  /** Override the model ID for this specific request */
  modelOverride?: string;
  /** 0 is the most deterministic setting */
  temperature?: number;
  /** Maximum tokens in the response (defaults to the model's maxTokens) */
  maxTokens?: number;
  /** Structured-output constraint */
  responseFormat?: JsonSchemaResponseFormat;
  /** End-user identifier forwarded to providers that accept one */
  user?: string;
  tools?: Tool[];
  /** Defaults to 'auto' when tools are given */
  toolChoice?: ToolChoice;
  /** Model calls allowed per request while tools are in play (default 8) */
  maxToolRounds?: number;
}

export interface CompletionRequest {
  system?: string;
  messages: CompletionTurn[];
  settings: CompletionSettings;
}

/** Token usage, populated by each provider adapter */
export interface UsageRecord {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface CompletionResponse {
  /** Reply text; with tools, the text of every round joined in order */
  content: string;
  /** Model name the provider reports */
  modelId: string;
  /** Why the model stopped generating ('max_tool_rounds' when the tool loop hit its cap) */
  stopReason: string;
  /** Summed over every round of a tool loop */
  usage?: UsageRecord;
}

/**
 * One streamed fragment. The last chunk has `done: true` and carries the
 * aggregate metadata (model id, usage); its content may be empty.
 */
export interface CompletionChunk {
  content: string;
  done: boolean;
  modelId?: string;
  usage?: UsageRecord;
}

/** The chat-completion capability LLM-backed agents depend on */
export interface CompletionProvider {
  complete(request: CompletionRequest, signal?: AbortSignal): Promise<CompletionResponse>;
  completeStream(request: CompletionRequest, signal?: AbortSignal): AsyncIterable<CompletionChunk>;
}

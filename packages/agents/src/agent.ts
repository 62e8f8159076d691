import {
  isAbortError,
  logger,
  PreconditionError,
  SessionStateError,
  type CompletionChunk,
  type CompletionSettings,
  type Logger,
} from '@switchboard/shared';
import { ConversationHistory, toHistoryItem } from './history.js';
import { createMessage, newId, type AgentMessage, type ChatTurn, type NewMessage } from './message.js';
import type { MessageStore } from './store.js';
import { renderTemplate } from './template.js';

export const DEFAULT_SYSTEM_PROMPT = 'You are a helpful assistant.';

/** A logic-less template and the values it is rendered with */
export interface TemplatePrompt {
  template: string;
  data: Record<string, unknown>;
}

/** Literal text, a template, or a fully-formed turn. */
export type Prompt = string | TemplatePrompt | ChatTurn;

export interface SendOptions {
  /** Merged over the agent's default settings for this call only */
  settings?: CompletionSettings;
  signal?: AbortSignal;
}

export type ChunkHandler = (chunk: CompletionChunk) => void;

export interface Agent {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly systemPrompt: string;
  readonly history: ConversationHistory;
  readonly sessionId: string | undefined;

  /** Begin a session (fresh id unless one is given) with only the system prompt in history. */
  startSession(sessionId?: string): string;
  /** Switch session id without touching history. */
  setSession(sessionId: string): void;
  setSystemPrompt(text: string): void;
  setSystemPromptTemplate(template: string, data: Record<string, unknown>): void;
  restoreHistory(sessionId: string, signal?: AbortSignal): Promise<number>;

  send(prompt: Prompt, options?: SendOptions): Promise<AgentMessage>;
  stream(prompt: Prompt, onChunk: ChunkHandler, options?: SendOptions): Promise<AgentMessage>;
  /** Respond to the current history without adding a prompt turn. */
  reply(options?: SendOptions): Promise<AgentMessage>;
}

/** How a human proxy reaches the person behind it. */
export interface HumanChannel {
  waitForResponse(promptText: string, history: ConversationHistory, signal?: AbortSignal): Promise<string>;
  printMessage(text: string, mimeType: string): Promise<void>;
}

export interface HumanProxy extends Agent {
  printMessage(text: string, mimeType?: string): Promise<void>;
}

export interface AgentIdentity {
  id: string;
  name: string;
  description: string;
}

export interface AgentBaseOptions extends AgentIdentity {
  store: MessageStore;
  systemPrompt?: string;
}

function isTemplatePrompt(prompt: Prompt): prompt is TemplatePrompt {
  return typeof prompt === 'object' && 'template' in prompt;
}

/** Session, system prompt, history and persistence shared by every agent kind. */
export abstract class AgentBase implements Agent {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly history = new ConversationHistory();
  protected readonly store: MessageStore;
  protected readonly log: Logger;
  private _systemPrompt: string;
  private _sessionId: string | undefined;

  constructor(opts: AgentBaseOptions) {
    if (!opts.id.trim()) throw new PreconditionError('agent id is required', { operation: 'createAgent' });
    if (!opts.name.trim()) throw new PreconditionError('agent name is required', { operation: 'createAgent', agentId: opts.id });
    this.id = opts.id;
    this.name = opts.name;
    this.description = opts.description;
    this.store = opts.store;
    this._systemPrompt = opts.systemPrompt?.trim() ? opts.systemPrompt : DEFAULT_SYSTEM_PROMPT;
    this.log = logger.child({ module: 'agent', agentId: opts.id });
  }

  get systemPrompt(): string {
    return this._systemPrompt;
  }

  get sessionId(): string | undefined {
    return this._sessionId;
  }

  startSession(sessionId?: string): string {
    const id = sessionId ?? newId();
    this.setSession(id);
    this.history.clear();
    this.history.append(
      toHistoryItem(
        createMessage({ sessionId: id, agentId: this.id, agentName: this.name, role: 'system', content: this._systemPrompt }),
      ),
    );
    return id;
  }

  setSession(sessionId: string): void {
    if (!sessionId.trim()) {
      throw new PreconditionError('session id must not be empty', { operation: 'setSession', agentId: this.id });
    }
    this._sessionId = sessionId;
    this.log.info({ sessionId }, 'session set');
  }

  setSystemPrompt(text: string): void {
    if (!text.trim()) {
      throw new PreconditionError('system prompt must not be empty', { operation: 'setSystemPrompt', agentId: this.id });
    }
    this._systemPrompt = text;
    this.log.debug({ systemPrompt: text }, 'system prompt set');
  }

  setSystemPromptTemplate(template: string, data: Record<string, unknown>): void {
    this.setSystemPrompt(renderTemplate(template, data));
  }

  async restoreHistory(sessionId: string, signal?: AbortSignal): Promise<number> {
    this.setSession(sessionId);
    return this.history.restore(this.store, sessionId, this.id, signal);
  }

  abstract send(prompt: Prompt, options?: SendOptions): Promise<AgentMessage>;
  abstract stream(prompt: Prompt, onChunk: ChunkHandler, options?: SendOptions): Promise<AgentMessage>;
  abstract reply(options?: SendOptions): Promise<AgentMessage>;

  protected requireSession(operation: string): string {
    if (!this._sessionId) {
      throw new SessionStateError(`${operation} requires an active session; call startSession() or setSession() first`, {
        operation,
        agentId: this.id,
      });
    }
    return this._sessionId;
  }

  /** Resolve a prompt to a non-empty turn, rendering templates. */
  protected renderPrompt(prompt: Prompt, operation: string): ChatTurn {
    let turn: ChatTurn;
    if (typeof prompt === 'string') {
      turn = { role: 'user', content: prompt };
    } else if (isTemplatePrompt(prompt)) {
      turn = { role: 'user', content: renderTemplate(prompt.template, prompt.data) };
    } else {
      turn = prompt;
    }
    if (!turn.content.trim()) {
      throw new PreconditionError('prompt must not be empty', { operation, agentId: this.id });
    }
    return turn;
  }

  /** The prompt as this agent records it: authored under its own id. */
  protected promptMessage(sessionId: string, turn: ChatTurn): AgentMessage {
    return createMessage({
      sessionId,
      agentId: this.id,
      agentName: turn.name ?? this.name,
      role: turn.role,
      content: turn.content,
    });
  }

  protected responseMessage(sessionId: string, fields: Pick<NewMessage, 'role' | 'content' | 'modelId' | 'metadata'>): AgentMessage {
    return createMessage({ sessionId, agentId: this.id, agentName: this.name, ...fields });
  }

  /** The last turn a reply would answer; system-only or empty histories have none. */
  protected replyTarget(operation: string): ChatTurn {
    const last = this.history.last();
    if (!last || last.message.role === 'system') {
      throw new PreconditionError('reply requires a history ending in a non-system turn', { operation, agentId: this.id });
    }
    return last.turn;
  }

  /** Take back what a failed call appended, so history keeps matching the store. */
  protected rollback(messageIds: readonly string[]): void {
    for (const id of messageIds) {
      this.history.remove(id);
    }
  }

  protected logFailure(err: unknown, operation: string, sessionId: string | undefined): void {
    if (isAbortError(err)) {
      this.log.warn({ sessionId, operation }, `${operation} canceled`);
    } else {
      this.log.error({ err, sessionId, operation }, `${operation} failed`);
    }
  }
}

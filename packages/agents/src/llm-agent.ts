import {
  withSpan,
  type CompletionProvider,
  type CompletionRequest,
  type CompletionResponse,
  type CompletionSettings,
  type CompletionTurn,
  type UsageRecord,
} from '@switchboard/shared';
import { AgentBase, type AgentBaseOptions, type ChunkHandler, type Prompt, type SendOptions } from './agent.js';
import { toHistoryItem, type HistoryItem } from './history.js';
import type { AgentMessage } from './message.js';

export type MessageCompletedHandler = (message: AgentMessage, response: CompletionResponse) => void;

export interface LlmAgentOptions extends AgentBaseOptions {
  provider: CompletionProvider;
  /** Defaults for every call; SendOptions.settings override per call */
  settings?: CompletionSettings;
  onMessageCompleted?: MessageCompletedHandler;
}

/**
 * Project a history onto provider turns from the point of view of `selfId`.
 * Its own agent messages become assistant turns; everything else is a user
 * turn, prefixed with the author's name when another agent or a human wrote it.
 * System turns are dropped because the system prompt travels separately.
 */
export function toCompletionTurns(items: readonly HistoryItem[], selfId: string): CompletionTurn[] {
  const turns: CompletionTurn[] = [];
  for (const { message } of items) {
    if (message.role === 'system') continue;
    if (message.role === 'agent' && message.agentId === selfId) {
      turns.push({ role: 'assistant', content: message.content });
    } else if (message.role === 'agent' || message.role === 'human') {
      turns.push({ role: 'user', content: `[${message.agentName}] ${message.content}` });
    } else {
      turns.push({ role: 'user', content: message.content });
    }
  }
  return turns;
}

/** Agent whose turns come from a CompletionProvider. */
export class LlmAgent extends AgentBase {
  private readonly provider: CompletionProvider;
  private readonly settings: CompletionSettings;
  private readonly onMessageCompleted?: MessageCompletedHandler;

  constructor(opts: LlmAgentOptions) {
    super(opts);
    this.provider = opts.provider;
    this.settings = opts.settings ?? {};
    this.onMessageCompleted = opts.onMessageCompleted;
  }

  async send(prompt: Prompt, options: SendOptions = {}): Promise<AgentMessage> {
    return withSpan('agent.send', { 'agent.id': this.id }, async () => {
      const appended: string[] = [];
      try {
        const sessionId = this.requireSession('send');
        const turn = this.renderPrompt(prompt, 'send');
        const promptMessage = this.promptMessage(sessionId, turn);
        this.history.append({ turn, message: promptMessage });
        appended.push(promptMessage.id);

        const response = await this.provider.complete(this.buildRequest(options.settings), options.signal);
        const message = this.recordResponse(sessionId, response);
        appended.push(message.id);

        await this.store.saveMany([promptMessage, message], options.signal);
        return message;
      } catch (err) {
        this.rollback(appended);
        this.logFailure(err, 'send', this.sessionId);
        throw err;
      }
    });
  }

  async stream(prompt: Prompt, onChunk: ChunkHandler, options: SendOptions = {}): Promise<AgentMessage> {
    return withSpan('agent.stream', { 'agent.id': this.id }, async () => {
      const appended: string[] = [];
      try {
        const sessionId = this.requireSession('stream');
        const turn = this.renderPrompt(prompt, 'stream');
        const promptMessage = this.promptMessage(sessionId, turn);
        this.history.append({ turn, message: promptMessage });
        appended.push(promptMessage.id);

        const response = await this.collectStream(this.buildRequest(options.settings), onChunk, options.signal);
        const message = this.recordResponse(sessionId, response);
        appended.push(message.id);

        await this.store.saveMany([promptMessage, message], options.signal);
        return message;
      } catch (err) {
        this.rollback(appended);
        this.logFailure(err, 'stream', this.sessionId);
        throw err;
      }
    });
  }

  async reply(options: SendOptions = {}): Promise<AgentMessage> {
    return withSpan('agent.reply', { 'agent.id': this.id }, async () => {
      const appended: string[] = [];
      try {
        const sessionId = this.requireSession('reply');
        this.replyTarget('reply');

        const response = await this.provider.complete(this.buildRequest(options.settings), options.signal);
        const message = this.recordResponse(sessionId, response);
        appended.push(message.id);

        await this.store.save(message, options.signal);
        return message;
      } catch (err) {
        this.rollback(appended);
        this.logFailure(err, 'reply', this.sessionId);
        throw err;
      }
    });
  }

  private buildRequest(overrides?: CompletionSettings): CompletionRequest {
    return {
      system: this.systemPrompt,
      messages: toCompletionTurns(this.history.items(), this.id),
      settings: { ...this.settings, ...overrides },
    };
  }

  private async collectStream(
    request: CompletionRequest,
    onChunk: ChunkHandler,
    signal: AbortSignal | undefined,
  ): Promise<CompletionResponse> {
    let content = '';
    let modelId: string | undefined;
    let usage: UsageRecord | undefined;

    for await (const chunk of this.provider.completeStream(request, signal)) {
      signal?.throwIfAborted();
      content += chunk.content;
      if (chunk.modelId) modelId = chunk.modelId;
      if (chunk.usage) usage = chunk.usage;
      try {
        onChunk(chunk);
      } catch (err) {
        this.log.warn({ err }, 'chunk handler threw');
      }
    }

    return { content, modelId: modelId ?? '', stopReason: 'end_turn', usage };
  }

  /** Wrap the reply as an agent message, append it and notify the listener. */
  private recordResponse(sessionId: string, response: CompletionResponse): AgentMessage {
    const metadata: Record<string, unknown> = { stopReason: response.stopReason };
    if (response.usage) metadata.usage = response.usage;

    const message = this.responseMessage(sessionId, {
      role: 'agent',
      content: response.content,
      modelId: response.modelId || undefined,
      metadata,
    });
    this.history.append(toHistoryItem(message));
    this.log.info({ sessionId, messageId: message.id, modelId: message.modelId, usage: response.usage }, 'agent responded');

    if (this.onMessageCompleted) {
      try {
        this.onMessageCompleted(message, response);
      } catch (err) {
        this.log.warn({ err, messageId: message.id }, 'onMessageCompleted handler threw');
      }
    }
    return message;
  }
}

import { withSpan } from '@switchboard/shared';
import {
  AgentBase,
  type AgentBaseOptions,
  type ChunkHandler,
  type HumanChannel,
  type HumanProxy,
  type Prompt,
  type SendOptions,
} from './agent.js';
import { toHistoryItem } from './history.js';
import { DEFAULT_MIME_TYPE, type AgentMessage } from './message.js';

export const HUMAN_PROXY_MODEL_ID = 'human-proxy';

export interface HumanProxyAgentOptions extends AgentBaseOptions {
  channel: HumanChannel;
}

/** Stands in for a person: every turn blocks on the channel instead of a model. */
export class HumanProxyAgent extends AgentBase implements HumanProxy {
  private readonly channel: HumanChannel;

  constructor(opts: HumanProxyAgentOptions) {
    super(opts);
    this.channel = opts.channel;
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

        const answer = await this.channel.waitForResponse(turn.content, this.history, options.signal);
        const message = this.recordAnswer(sessionId, answer);
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

  /** Humans do not stream: the whole answer arrives as one final chunk. */
  async stream(prompt: Prompt, onChunk: ChunkHandler, options: SendOptions = {}): Promise<AgentMessage> {
    const message = await this.send(prompt, options);
    try {
      onChunk({ content: message.content, done: true, modelId: HUMAN_PROXY_MODEL_ID });
    } catch (err) {
      this.log.warn({ err }, 'chunk handler threw');
    }
    return message;
  }

  async reply(options: SendOptions = {}): Promise<AgentMessage> {
    return withSpan('agent.reply', { 'agent.id': this.id }, async () => {
      const appended: string[] = [];
      try {
        const sessionId = this.requireSession('reply');
        const target = this.replyTarget('reply');

        const answer = await this.channel.waitForResponse(target.content, this.history, options.signal);
        const message = this.recordAnswer(sessionId, answer);
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

  async printMessage(text: string, mimeType: string = DEFAULT_MIME_TYPE): Promise<void> {
    await this.channel.printMessage(text, mimeType);
  }

  private recordAnswer(sessionId: string, answer: string): AgentMessage {
    const message = this.responseMessage(sessionId, {
      role: 'human',
      content: answer,
      modelId: HUMAN_PROXY_MODEL_ID,
    });
    this.history.append(toHistoryItem(message));
    this.log.info({ sessionId, messageId: message.id }, 'human responded');
    return message;
  }
}

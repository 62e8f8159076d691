import { logger, PreconditionError } from '@switchboard/shared';
import { fromRecord, toTurn, type AgentMessage, type ChatTurn } from './message.js';
import type { MessageStore } from './store.js';

const log = logger.child({ module: 'history' });

export interface HistoryItem {
  readonly turn: ChatTurn;
  readonly message: AgentMessage;
}

export function toHistoryItem(message: AgentMessage): HistoryItem {
  return { turn: toTurn(message), message };
}

/**
 * Ordered conversation. Turns and messages are both projected from one item
 * list, so the two views always have equal length and matching order.
 * Message ids are unique within a history.
 */
export class ConversationHistory {
  private entries: HistoryItem[] = [];
  private readonly ids = new Set<string>();

  get length(): number {
    return this.entries.length;
  }

  has(messageId: string): boolean {
    return this.ids.has(messageId);
  }

  append(item: HistoryItem): void {
    if (this.ids.has(item.message.id)) {
      throw new PreconditionError(`message ${item.message.id} is already in the history`, {
        operation: 'append',
        messageId: item.message.id,
      });
    }
    this.entries.push(item);
    this.ids.add(item.message.id);
  }

  /** All-or-nothing: a duplicate id anywhere in `items` leaves the history untouched. */
  appendRange(items: Iterable<HistoryItem>): void {
    const batch = [...items];
    const seen = new Set<string>();
    for (const item of batch) {
      if (this.ids.has(item.message.id) || seen.has(item.message.id)) {
        throw new PreconditionError(`message ${item.message.id} is already in the history`, {
          operation: 'appendRange',
          messageId: item.message.id,
        });
      }
      seen.add(item.message.id);
    }
    for (const item of batch) {
      this.entries.push(item);
      this.ids.add(item.message.id);
    }
  }

  clear(): void {
    this.entries = [];
    this.ids.clear();
  }

  /** Returns false when the id is not present. */
  remove(messageId: string): boolean {
    if (!this.ids.has(messageId)) return false;
    this.entries = this.entries.filter((item) => item.message.id !== messageId);
    this.ids.delete(messageId);
    return true;
  }

  /**
   * Append the items whose message id is not present yet, in order.
   * Returns how many were added.
   */
  merge(source: ConversationHistory | Iterable<HistoryItem>): number {
    const items = source instanceof ConversationHistory ? source.items() : source;
    let added = 0;
    for (const item of items) {
      if (this.ids.has(item.message.id)) continue;
      this.entries.push(item);
      this.ids.add(item.message.id);
      added++;
    }
    return added;
  }

  /**
   * Replace the contents with the stored messages of one agent in one
   * session. Records that no longer parse are logged and skipped.
   */
  async restore(store: MessageStore, sessionId: string, agentId: string, signal?: AbortSignal): Promise<number> {
    const records = await store.getBySessionAndAgent(sessionId, agentId, signal);
    this.clear();
    for (const record of records) {
      try {
        this.append(toHistoryItem(fromRecord(record)));
      } catch (err) {
        log.error({ err, messageId: record.id, sessionId, agentId }, 'skipping unreadable message during restore');
      }
    }
    log.debug({ sessionId, agentId, restored: this.entries.length, stored: records.length }, 'history restored');
    return this.entries.length;
  }

  items(): readonly HistoryItem[] {
    return [...this.entries];
  }

  turns(): ChatTurn[] {
    return this.entries.map((item) => item.turn);
  }

  messages(): AgentMessage[] {
    return this.entries.map((item) => item.message);
  }

  last(): HistoryItem | undefined {
    return this.entries[this.entries.length - 1];
  }

  /** Markdown rendering: one `## name (role)` section per item, separated by rules. */
  transcript(): string {
    return this.entries
      .map(({ message }) => `## ${message.agentName} (${message.role})\n\n${message.content}`)
      .join('\n\n---\n\n');
  }
}

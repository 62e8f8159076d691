import type { AgentMessage, MessageRecord } from './message.js';

/**
 * Persistence for agent messages. List results are ordered by creation time
 * ascending, with insertion order breaking ties.
 *
 * Reads return raw records so callers decide what to do with a row that no
 * longer parses.
 */
export interface MessageStore {
  /** Insert, or update in place bumping version and updatedAt when the id exists. */
  save(message: AgentMessage, signal?: AbortSignal): Promise<MessageRecord>;
  /** Same as save for each message, in one transaction. */
  saveMany(messages: readonly AgentMessage[], signal?: AbortSignal): Promise<MessageRecord[]>;
  getById(id: string, signal?: AbortSignal): Promise<MessageRecord | undefined>;
  getBySession(sessionId: string, signal?: AbortSignal): Promise<MessageRecord[]>;
  getByAgent(agentId: string, signal?: AbortSignal): Promise<MessageRecord[]>;
  getBySessionAndAgent(sessionId: string, agentId: string, signal?: AbortSignal): Promise<MessageRecord[]>;
  /** Each delete returns the number of rows removed. */
  deleteBySession(sessionId: string, signal?: AbortSignal): Promise<number>;
  deleteByAgent(agentId: string, signal?: AbortSignal): Promise<number>;
  deleteBySessionAndAgent(sessionId: string, agentId: string, signal?: AbortSignal): Promise<number>;
}

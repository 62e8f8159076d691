import { randomUUID } from 'node:crypto';
import { PreconditionError } from '@switchboard/shared';

export const MESSAGE_ROLES = ['system', 'user', 'agent', 'human'] as const;

export type MessageRole = (typeof MESSAGE_ROLES)[number];

export const DEFAULT_MIME_TYPE = 'text/markdown';

export function isMessageRole(value: unknown): value is MessageRole {
  return typeof value === 'string' && MESSAGE_ROLES.some((r) => r === value);
}

/** A single conversational turn as agents exchange it. */
export interface ChatTurn {
  role: MessageRole;
  content: string;
  /** Display name of the author */
  name?: string;
}

/** A turn together with everything needed to persist and attribute it. */
export interface AgentMessage {
  /** 32 upper-case hex characters */
  readonly id: string;
  readonly sessionId: string;
  readonly agentId: string;
  readonly agentName: string;
  readonly role: MessageRole;
  readonly content: string;
  readonly mimeType: string;
  readonly modelId?: string;
  /** Token usage lives under `usage` */
  readonly metadata: Record<string, unknown>;
  readonly createdAt: string;
  readonly updatedAt: string;
  readonly version: number;
}

/** Row form of an AgentMessage: role as raw text, metadata as JSON text. */
export interface MessageRecord {
  id: string;
  sessionId: string;
  agentId: string;
  agentName: string;
  role: string;
  content: string;
  mimeType: string;
  modelId: string | null;
  metadata: string;
  createdAt: string;
  updatedAt: string;
  version: number;
}

export interface NewMessage {
  sessionId: string;
  agentId: string;
  agentName: string;
  role: MessageRole;
  content: string;
  mimeType?: string;
  modelId?: string;
  metadata?: Record<string, unknown>;
}

/** Fresh 32-hex identifier, used for both message and session ids. */
export function newId(): string {
  return randomUUID().replace(/-/g, '').toUpperCase();
}

export function createMessage(input: NewMessage): AgentMessage {
  if (!input.sessionId.trim()) {
    throw new PreconditionError('message requires a session id', { operation: 'createMessage', agentId: input.agentId });
  }
  if (!input.agentId.trim()) {
    throw new PreconditionError('message requires an agent id', { operation: 'createMessage', sessionId: input.sessionId });
  }
  if (!isMessageRole(input.role)) {
    throw new PreconditionError(`unknown message role '${String(input.role)}'`, { operation: 'createMessage' });
  }
  const now = new Date().toISOString();
  return {
    id: newId(),
    sessionId: input.sessionId,
    agentId: input.agentId,
    agentName: input.agentName,
    role: input.role,
    content: input.content,
    mimeType: input.mimeType ?? DEFAULT_MIME_TYPE,
    modelId: input.modelId,
    metadata: input.metadata ?? {},
    createdAt: now,
    updatedAt: now,
    version: 1,
  };
}

export function toTurn(message: AgentMessage): ChatTurn {
  return { role: message.role, content: message.content, name: message.agentName };
}

export function toRecord(message: AgentMessage): MessageRecord {
  return {
    id: message.id,
    sessionId: message.sessionId,
    agentId: message.agentId,
    agentName: message.agentName,
    role: message.role,
    content: message.content,
    mimeType: message.mimeType,
    modelId: message.modelId ?? null,
    metadata: JSON.stringify(message.metadata),
    createdAt: message.createdAt,
    updatedAt: message.updatedAt,
    version: message.version,
  };
}

function parseMetadata(record: MessageRecord): Record<string, unknown> {
  if (!record.metadata.trim()) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(record.metadata);
  } catch (err) {
    throw new PreconditionError('message metadata is not valid JSON', { operation: 'fromRecord', messageId: record.id }, { cause: err });
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new PreconditionError('message metadata is not a JSON object', { operation: 'fromRecord', messageId: record.id });
  }
  return { ...parsed };
}

/** Throws PreconditionError on an unknown role or metadata that is not a JSON object. */
export function fromRecord(record: MessageRecord): AgentMessage {
  const role = record.role.toLowerCase();
  if (!isMessageRole(role)) {
    throw new PreconditionError(`unknown message role '${record.role}'`, { operation: 'fromRecord', messageId: record.id });
  }
  return {
    id: record.id,
    sessionId: record.sessionId,
    agentId: record.agentId,
    agentName: record.agentName,
    role,
    content: record.content,
    mimeType: record.mimeType || DEFAULT_MIME_TYPE,
    modelId: record.modelId ?? undefined,
    metadata: parseMetadata(record),
    createdAt: record.createdAt,
    updatedAt: record.updatedAt,
    version: record.version,
  };
}

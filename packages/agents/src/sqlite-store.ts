import Database from 'better-sqlite3';
import { logger } from '@switchboard/shared';
import { toRecord, type AgentMessage, type MessageRecord } from './message.js';
import type { MessageStore } from './store.js';

const log = logger.child({ module: 'sqlite-store' });

const SELECT_COLUMNS = `
  id,
  session_id  AS sessionId,
  agent_id    AS agentId,
  agent_name  AS agentName,
  role,
  content,
  mime_type   AS mimeType,
  model_id    AS modelId,
  metadata,
  created_at  AS createdAt,
  updated_at  AS updatedAt,
  version
`;

type UpsertParams = MessageRecord & { now: string };

/** MessageStore over a single SQLite file (or `:memory:`). */
export class SqliteMessageStore implements MessageStore {
  private readonly db: Database.Database;
  private readonly upsertStmt: Database.Statement<UpsertParams>;
  private readonly byIdStmt: Database.Statement<[string], MessageRecord>;
  private readonly bySessionStmt: Database.Statement<[string], MessageRecord>;
  private readonly byAgentStmt: Database.Statement<[string], MessageRecord>;
  private readonly bySessionAndAgentStmt: Database.Statement<[string, string], MessageRecord>;
  private readonly saveManyTx: (messages: readonly AgentMessage[]) => MessageRecord[];

  constructor(path: string) {
    log.info({ path }, 'opening SQLite database');
    this.db = new Database(path);

    this.db.pragma('journal_mode = WAL');
    this.db.pragma('busy_timeout = 5000');

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS agent_messages (
        id          TEXT PRIMARY KEY,
        session_id  TEXT NOT NULL,
        agent_id    TEXT NOT NULL,
        agent_name  TEXT NOT NULL,
        role        TEXT NOT NULL,
        content     TEXT NOT NULL,
        mime_type   TEXT NOT NULL DEFAULT 'text/markdown',
        model_id    TEXT,
        metadata    TEXT NOT NULL DEFAULT '{}',
        created_at  TEXT NOT NULL,
        updated_at  TEXT NOT NULL,
        version     INTEGER NOT NULL DEFAULT 1
      )
    `);
    this.db.exec(`
      CREATE INDEX IF NOT EXISTS idx_agent_messages_session_agent
        ON agent_messages (session_id, agent_id)
    `);

    this.upsertStmt = this.db.prepare<UpsertParams>(`
      INSERT INTO agent_messages
        (id, session_id, agent_id, agent_name, role, content, mime_type, model_id, metadata, created_at, updated_at, version)
      VALUES
        (@id, @sessionId, @agentId, @agentName, @role, @content, @mimeType, @modelId, @metadata, @createdAt, @updatedAt, @version)
      ON CONFLICT(id) DO UPDATE SET
        session_id = excluded.session_id,
        agent_id   = excluded.agent_id,
        agent_name = excluded.agent_name,
        role       = excluded.role,
        content    = excluded.content,
        mime_type  = excluded.mime_type,
        model_id   = excluded.model_id,
        metadata   = excluded.metadata,
        updated_at = @now,
        version    = agent_messages.version + 1
    `);
    this.byIdStmt = this.db.prepare<[string], MessageRecord>(
      `SELECT ${SELECT_COLUMNS} FROM agent_messages WHERE id = ?`,
    );
    this.bySessionStmt = this.db.prepare<[string], MessageRecord>(
      `SELECT ${SELECT_COLUMNS} FROM agent_messages WHERE session_id = ? ORDER BY created_at, rowid`,
    );
    this.byAgentStmt = this.db.prepare<[string], MessageRecord>(
      `SELECT ${SELECT_COLUMNS} FROM agent_messages WHERE agent_id = ? ORDER BY created_at, rowid`,
    );
    this.bySessionAndAgentStmt = this.db.prepare<[string, string], MessageRecord>(
      `SELECT ${SELECT_COLUMNS} FROM agent_messages WHERE session_id = ? AND agent_id = ? ORDER BY created_at, rowid`,
    );

    this.saveManyTx = this.db.transaction((messages: readonly AgentMessage[]) =>
      messages.map((m) => this.upsert(m)),
    );
  }

  private upsert(message: AgentMessage): MessageRecord {
    const record = toRecord(message);
    this.upsertStmt.run({ ...record, now: new Date().toISOString() });
    const stored = this.byIdStmt.get(record.id);
    if (!stored) {
      throw new Error(`sqlite-store: message ${record.id} missing after save`);
    }
    return stored;
  }

  async save(message: AgentMessage, signal?: AbortSignal): Promise<MessageRecord> {
    signal?.throwIfAborted();
    const stored = this.upsert(message);
    if (stored.version > 1) {
      log.debug({ messageId: stored.id, version: stored.version }, 'message updated');
    }
    return stored;
  }

  async saveMany(messages: readonly AgentMessage[], signal?: AbortSignal): Promise<MessageRecord[]> {
    signal?.throwIfAborted();
    return this.saveManyTx(messages);
  }

  async getById(id: string, signal?: AbortSignal): Promise<MessageRecord | undefined> {
    signal?.throwIfAborted();
    return this.byIdStmt.get(id);
  }

  async getBySession(sessionId: string, signal?: AbortSignal): Promise<MessageRecord[]> {
    signal?.throwIfAborted();
    return this.bySessionStmt.all(sessionId);
  }

  async getByAgent(agentId: string, signal?: AbortSignal): Promise<MessageRecord[]> {
    signal?.throwIfAborted();
    return this.byAgentStmt.all(agentId);
  }

  async getBySessionAndAgent(sessionId: string, agentId: string, signal?: AbortSignal): Promise<MessageRecord[]> {
    signal?.throwIfAborted();
    return this.bySessionAndAgentStmt.all(sessionId, agentId);
  }

  async deleteBySession(sessionId: string, signal?: AbortSignal): Promise<number> {
    signal?.throwIfAborted();
    const { changes } = this.db.prepare('DELETE FROM agent_messages WHERE session_id = ?').run(sessionId);
    log.info({ sessionId, deleted: changes }, 'deleted session messages');
    return changes;
  }

  async deleteByAgent(agentId: string, signal?: AbortSignal): Promise<number> {
    signal?.throwIfAborted();
    const { changes } = this.db.prepare('DELETE FROM agent_messages WHERE agent_id = ?').run(agentId);
    log.info({ agentId, deleted: changes }, 'deleted agent messages');
    return changes;
  }

  async deleteBySessionAndAgent(sessionId: string, agentId: string, signal?: AbortSignal): Promise<number> {
    signal?.throwIfAborted();
    const { changes } = this.db
      .prepare('DELETE FROM agent_messages WHERE session_id = ? AND agent_id = ?')
      .run(sessionId, agentId);
    log.info({ sessionId, agentId, deleted: changes }, 'deleted session messages for agent');
    return changes;
  }

  close(): void {
    this.db.close();
  }
}

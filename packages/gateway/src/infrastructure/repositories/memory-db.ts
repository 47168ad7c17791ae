/**
 * @file packages/gateway/src/infrastructure/repositories/memory-db.ts
 * @description SQLite store for sessions, promoted state, rolling chat history and the retrieval corpus.
 */

import Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';
import {
  NESTED_PROMOTED_KEYS,
  PromotedStateSchema,
  isRecord,
  type ChatContext,
  type ChatRole,
  type ChatTurn,
  type PromotedState,
  type PromotedStatePatch,
  type RetrievalHit,
  type RetrievalStats,
} from '@chorus/shared';

const DAY_MS = 86_400_000;
const DIGEST_ENTRY_CHARS = 240;
const MAX_QUERY_LIMIT = 10;
export const MANUAL_NOTES_TAG = 'source:manual';

export interface MemoryDbOptions {
  /** Clock in epoch milliseconds. */
  now?: () => number;
  dedupeWindowSeconds?: number;
  maxSummaryChars?: number;
}

type MessageRow = {
  id: number;
  role: ChatRole;
  content: string;
  createdAt: number;
};

type RetrievalRow = {
  docId: string;
  title: string;
  content: string;
  tags: string;
  score: number;
  updatedAt: number | null;
};

const isChatRole = (value: string): value is ChatRole => value === 'user' || value === 'assistant';

/**
 * Turns free text into an FTS5 query of quoted tokens joined by OR, so
 * punctuation in user text never reaches the MATCH parser.
 */
export function toFtsQuery(text: string): string {
  const tokens = text.match(/[\p{L}\p{N}_]+/gu) ?? [];
  const unique = [...new Set(tokens.map((t) => t.toLowerCase()))];
  return unique.map((t) => `"${t}"`).join(' OR ');
}

/**
 * Splits a markdown document on `#` headings. Text before the first
 * heading lands in a "General" section; empty sections are dropped.
 */
export function parseMarkdownSections(markdown: string): Array<{ title: string; content: string }> {
  const sections: Array<{ title: string; content: string }> = [];
  let title = 'General';
  let lines: string[] = [];

  const flush = () => {
    if (lines.length > 0) sections.push({ title, content: lines.join('\n') });
  };

  for (const raw of markdown.split(/\r?\n/)) {
    const line = raw.trim();
    if (line.startsWith('#')) {
      flush();
      title = line.replace(/^#+/, '').trim();
      lines = [];
    } else if (line) {
      lines.push(line);
    }
  }
  flush();
  return sections;
}

/**
 * Encapsulates memory db behavior.
 */
export class MemoryDB {
  private db: Database.Database;
  private readonly now: () => number;
  private readonly dedupeWindowMs: number;
  private readonly maxSummaryChars: number;
  private fts = false;

  constructor(dbPath: string, options: MemoryDbOptions = {}) {
    this.now = options.now ?? Date.now;
    this.dedupeWindowMs = (options.dedupeWindowSeconds ?? 300) * 1000;
    this.maxSummaryChars = options.maxSummaryChars ?? 1800;
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');
    this.db.pragma('busy_timeout = 2000');
    this.db.pragma('foreign_keys = ON');
    this.migrate();
  }

  /**
   * Executes migrate.
   */
  private migrate(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS sessions (
        session_id TEXT PRIMARY KEY,
        created_at INTEGER NOT NULL,
        last_seen INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS promoted_state (
        key TEXT PRIMARY KEY,
        value_json TEXT NOT NULL,
        updated_at INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS chat_messages (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        session_id TEXT NOT NULL,
        persona TEXT NOT NULL,
        role TEXT NOT NULL,
        content TEXT NOT NULL,
        created_at INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS chat_messages_thread_idx
        ON chat_messages(session_id, persona, id);

      CREATE TABLE IF NOT EXISTS chat_summaries (
        session_id TEXT NOT NULL,
        persona TEXT NOT NULL,
        summary TEXT NOT NULL,
        updated_at INTEGER NOT NULL,
        PRIMARY KEY (session_id, persona)
      );

      CREATE TABLE IF NOT EXISTS retrieval_meta (
        doc_id TEXT PRIMARY KEY,
        updated_at INTEGER NOT NULL,
        size_chars INTEGER NOT NULL
      );
    `);

    try {
      this.db.exec(`
        CREATE VIRTUAL TABLE IF NOT EXISTS retrieval_fts
        USING fts5(doc_id UNINDEXED, title, content, tags);
      `);
      this.fts = true;
    } catch {
      // FTS5 is missing from this SQLite build; retrieval stays disabled
      this.fts = false;
    }
  }

  close(): void {
    this.db.close();
  }

  // ─── Sessions ───────────────────────────────────────────────

  /**
   * Records the session as seen now, creating it on first touch.
   * @param sessionId - Session id.
   */
  touchSession(sessionId: string): void {
    if (!sessionId) return;
    const now = this.now();
    this.db
      .prepare<[string, number, number]>(
        `INSERT INTO sessions (session_id, created_at, last_seen) VALUES (?, ?, ?)
         ON CONFLICT(session_id) DO UPDATE SET last_seen = excluded.last_seen`,
      )
      .run(sessionId, now, now);
  }

  /**
   * Deletes sessions idle for longer than `maxAgeDays` together with their
   * history and digests.
   * @returns Number of expired sessions.
   */
  expireStaleSessions(maxAgeDays: number): number {
    const cutoff = this.now() - maxAgeDays * DAY_MS;
    const expire = this.db.transaction((): number => {
      const stale = this.db
        .prepare<[number], { sessionId: string }>(
          'SELECT session_id as sessionId FROM sessions WHERE last_seen < ?',
        )
        .all(cutoff);
      for (const { sessionId } of stale) {
        this.db.prepare<[string]>('DELETE FROM chat_messages WHERE session_id = ?').run(sessionId);
        this.db.prepare<[string]>('DELETE FROM chat_summaries WHERE session_id = ?').run(sessionId);
        this.db.prepare<[string]>('DELETE FROM sessions WHERE session_id = ?').run(sessionId);
      }
      return stale.length;
    });
    return expire();
  }

  getSession(sessionId: string): { createdAt: number; lastSeen: number } | null {
    const row = this.db
      .prepare<[string], { createdAt: number; lastSeen: number }>(
        'SELECT created_at as createdAt, last_seen as lastSeen FROM sessions WHERE session_id = ?',
      )
      .get(sessionId);
    return row ?? null;
  }

  // ─── Promoted state ─────────────────────────────────────────

  /**
   * Retrieves the promoted-state document.
   */
  getPromotedState(): PromotedState {
    const rows = this.db
      .prepare<[], { key: string; valueJson: string }>(
        'SELECT key, value_json as valueJson FROM promoted_state',
      )
      .all();
    const doc: Record<string, unknown> = {};
    for (const row of rows) {
      try {
        doc[row.key] = JSON.parse(row.valueJson);
      } catch {
        doc[row.key] = row.valueJson;
      }
    }
    return PromotedStateSchema.parse(doc);
  }

  /**
   * Writes every top-level key of the document.
   */
  setPromotedState(state: Record<string, unknown>): void {
    const now = this.now();
    const stmt = this.db.prepare<[string, string, number]>(
      'INSERT OR REPLACE INTO promoted_state (key, value_json, updated_at) VALUES (?, ?, ?)',
    );
    const write = this.db.transaction(() => {
      for (const [key, value] of Object.entries(state)) {
        if (value === undefined) continue;
        stmt.run(key, JSON.stringify(value), now);
      }
    });
    write();
  }

  /**
   * Seeds the document when the store is empty.
   * @returns Whether anything was written.
   */
  seedPromotedState(defaults: PromotedState): boolean {
    const row = this.db
      .prepare<[], { count: number }>('SELECT COUNT(*) as count FROM promoted_state')
      .get();
    if (row && row.count > 0) return false;
    this.setPromotedState(defaults);
    return true;
  }

  /**
   * Shallow merge; the nested maps (`ttsOverrides`, `baseUrls`, `fishTts`,
   * `whisperStt`) merge one level deep so a patch never drops their siblings.
   * @returns The merged document.
   */
  patchPromotedState(patch: PromotedStatePatch): PromotedState {
    const apply = this.db.transaction((): PromotedState => {
      const state: Record<string, unknown> = { ...this.getPromotedState() };
      const nested: readonly string[] = NESTED_PROMOTED_KEYS;
      for (const [key, value] of Object.entries(patch)) {
        if (value === undefined) continue;
        const current = state[key];
        state[key] =
          nested.includes(key) && isRecord(current) && isRecord(value)
            ? { ...current, ...value }
            : value;
      }
      const merged = PromotedStateSchema.parse(state);
      const changed = Object.fromEntries(
        Object.keys(patch)
          .filter((key) => patch[key] !== undefined)
          .map((key) => [key, merged[key]]),
      );
      this.setPromotedState(changed);
      return merged;
    });
    return apply();
  }

  // ─── Chat history ───────────────────────────────────────────

  /**
   * Appends a message unless it is empty or repeats the last message of
   * the same role within the dedupe window.
   * @returns Whether a row was written.
   */
  addChatMessage(sessionId: string, persona: string, role: ChatRole, content: string): boolean {
    if (!content || !content.trim()) return false;
    const now = this.now();

    const write = this.db.transaction((): boolean => {
      const last = this.db
        .prepare<[string, string, string], { content: string; createdAt: number }>(
          `SELECT content, created_at as createdAt FROM chat_messages
           WHERE session_id = ? AND persona = ? AND role = ?
           ORDER BY id DESC LIMIT 1`,
        )
        .get(sessionId, persona, role);
      if (
        last &&
        last.content.trim() === content.trim() &&
        now - last.createdAt < this.dedupeWindowMs
      ) {
        return false;
      }
      this.db
        .prepare<[string, string, string, string, number]>(
          'INSERT INTO chat_messages (session_id, persona, role, content, created_at) VALUES (?, ?, ?, ?, ?)',
        )
        .run(sessionId, persona, role, content, now);
      return true;
    });
    return write();
  }

  /**
   * Newest `maxMessages` in chronological order, dropped from the oldest
   * end while messages plus digest exceed `maxChars`.
   */
  getChatContext(
    sessionId: string,
    persona: string,
    maxMessages: number,
    maxChars: number,
  ): ChatContext {
    const summary = this.getSummary(sessionId, persona);
    const rows = this.db
      .prepare<[string, string, number], MessageRow>(
        `SELECT id, role, content, created_at as createdAt FROM chat_messages
         WHERE session_id = ? AND persona = ?
         ORDER BY id DESC LIMIT ?`,
      )
      .all(sessionId, persona, Math.max(0, Math.trunc(maxMessages)));

    const messages: ChatTurn[] = rows
      .reverse()
      .filter((row) => isChatRole(row.role))
      .map((row) => ({ role: row.role, content: row.content }));

    let total = summary.length + messages.reduce((sum, m) => sum + m.content.length, 0);
    while (messages.length > 0 && total > maxChars) {
      const dropped = messages.shift();
      total -= dropped ? dropped.content.length : 0;
    }
    return { summary, messages };
  }

  /**
   * Folds everything but the newest `keepLast` messages into the digest
   * and deletes the folded rows.
   */
  trimHistory(sessionId: string, persona: string, keepLast: number): void {
    const keep = Math.max(0, Math.trunc(keepLast));

    const trim = this.db.transaction(() => {
      const rows = this.db
        .prepare<[string, string], MessageRow>(
          `SELECT id, role, content, created_at as createdAt FROM chat_messages
           WHERE session_id = ? AND persona = ? ORDER BY id ASC`,
        )
        .all(sessionId, persona);
      if (rows.length <= keep) return;

      const evicted = rows.slice(0, rows.length - keep);
      const digest = evicted
        .map((row) => {
          const content = row.content.trim().replace(/\n/g, ' ').slice(0, DIGEST_ENTRY_CHARS);
          return `${row.role}: ${content}`;
        })
        .join(' | ');

      const previous = this.getSummary(sessionId, persona);
      let combined = previous && digest ? `${previous} | ${digest}` : previous || digest;
      combined = combined.replace(/\n/g, ' ').trim();
      if (combined.length > this.maxSummaryChars) {
        combined = combined.slice(combined.length - this.maxSummaryChars);
      }

      this.db
        .prepare<[string, string, string, number]>(
          'INSERT OR REPLACE INTO chat_summaries (session_id, persona, summary, updated_at) VALUES (?, ?, ?, ?)',
        )
        .run(sessionId, persona, combined, this.now());

      const lastEvicted = evicted[evicted.length - 1];
      this.db
        .prepare<[string, string, number]>(
          'DELETE FROM chat_messages WHERE session_id = ? AND persona = ? AND id <= ?',
        )
        .run(sessionId, persona, lastEvicted.id);
    });
    trim();
  }

  /**
   * Deletes every message and digest of the session.
   */
  clearHistory(sessionId: string): void {
    const clear = this.db.transaction(() => {
      this.db.prepare<[string]>('DELETE FROM chat_messages WHERE session_id = ?').run(sessionId);
      this.db.prepare<[string]>('DELETE FROM chat_summaries WHERE session_id = ?').run(sessionId);
    });
    clear();
  }

  private getSummary(sessionId: string, persona: string): string {
    const row = this.db
      .prepare<[string, string], { summary: string }>(
        'SELECT summary FROM chat_summaries WHERE session_id = ? AND persona = ?',
      )
      .get(sessionId, persona);
    return row?.summary ?? '';
  }

  // ─── Retrieval corpus ───────────────────────────────────────

  retrievalAvailable(): boolean {
    return this.fts;
  }

  /**
   * Replaces the document wholesale and refreshes its ledger entry.
   */
  upsertRetrievalDoc(docId: string, title: string, content: string, tags: string): void {
    if (!docId) throw new Error('docId is required');
    this.requireFts();

    const upsert = this.db.transaction(() => {
      this.db.prepare<[string]>('DELETE FROM retrieval_fts WHERE doc_id = ?').run(docId);
      this.db
        .prepare<[string, string, string, string]>(
          'INSERT INTO retrieval_fts (doc_id, title, content, tags) VALUES (?, ?, ?, ?)',
        )
        .run(docId, title, content, tags);
      this.db
        .prepare<[string, number, number]>(
          'INSERT OR REPLACE INTO retrieval_meta (doc_id, updated_at, size_chars) VALUES (?, ?, ?)',
        )
        .run(docId, this.now(), title.length + content.length + tags.length);
    });
    upsert();
  }

  /**
   * @returns Whether a document was removed.
   */
  deleteRetrievalDoc(docId: string): boolean {
    if (!docId || !this.fts) return false;
    const remove = this.db.transaction((): boolean => {
      const fts = this.db.prepare<[string]>('DELETE FROM retrieval_fts WHERE doc_id = ?').run(docId);
      const meta = this.db.prepare<[string]>('DELETE FROM retrieval_meta WHERE doc_id = ?').run(docId);
      return fts.changes + meta.changes > 0;
    });
    return remove();
  }

  /**
   * @returns Number of documents removed.
   */
  purgeRetrieval(): number {
    if (!this.fts) return 0;
    const purge = this.db.transaction((): number => {
      this.db.prepare('DELETE FROM retrieval_fts').run();
      return this.db.prepare('DELETE FROM retrieval_meta').run().changes;
    });
    return purge();
  }

  /**
   * Removes the oldest documents until the corpus fits the ceiling.
   * @returns Number of documents removed.
   */
  pruneRetrievalToMaxChars(maxTotalChars: number): number {
    if (!this.fts || maxTotalChars <= 0) return 0;

    const prune = this.db.transaction((): number => {
      let total = this.totalChars();
      if (total <= maxTotalChars) return 0;

      const rows = this.db
        .prepare<[], { docId: string; sizeChars: number }>(
          `SELECT doc_id as docId, size_chars as sizeChars FROM retrieval_meta
           ORDER BY updated_at ASC, rowid ASC`,
        )
        .all();
      let removed = 0;
      for (const row of rows) {
        if (total <= maxTotalChars) break;
        this.db.prepare<[string]>('DELETE FROM retrieval_fts WHERE doc_id = ?').run(row.docId);
        this.db.prepare<[string]>('DELETE FROM retrieval_meta WHERE doc_id = ?').run(row.docId);
        total -= row.sizeChars;
        removed += 1;
      }
      return removed;
    });
    return prune();
  }

  /**
   * Ranked full-text search; lower bm25 scores rank first.
   */
  queryRetrieval(query: string, limit: number = 3): RetrievalHit[] {
    if (!this.fts) return [];
    const match = toFtsQuery(query ?? '');
    if (!match) return [];
    const capped = Math.max(1, Math.min(Math.trunc(limit), MAX_QUERY_LIMIT));

    return this.db
      .prepare<[string, number], RetrievalRow>(
        `SELECT f.doc_id as docId, f.title, f.content, f.tags,
                bm25(retrieval_fts) as score, m.updated_at as updatedAt
         FROM retrieval_fts f
         LEFT JOIN retrieval_meta m ON m.doc_id = f.doc_id
         WHERE retrieval_fts MATCH ?
         ORDER BY score
         LIMIT ?`,
      )
      .all(match, capped)
      .map((row) => ({ ...row, updatedAt: row.updatedAt ?? null }));
  }

  retrievalStats(): RetrievalStats {
    if (!this.fts) return { available: false, docs: 0, totalChars: 0 };
    const row = this.db
      .prepare<[], { docs: number; totalChars: number }>(
        'SELECT COUNT(*) as docs, COALESCE(SUM(size_chars), 0) as totalChars FROM retrieval_meta',
      )
      .get();
    return { available: true, docs: row?.docs ?? 0, totalChars: row?.totalChars ?? 0 };
  }

  /**
   * Replaces every manually synced note with the sections of `markdown`,
   * one document per `#` heading.
   * @returns Number of documents written.
   */
  syncFromMarkdown(markdown: string): number {
    if (!this.fts) return 0;
    const sections = parseMarkdownSections(markdown).filter((s) => s.content.trim());

    const sync = this.db.transaction((): number => {
      const stale = this.db
        .prepare<[string], { docId: string }>(
          'SELECT doc_id as docId FROM retrieval_fts WHERE tags LIKE ?',
        )
        .all(`%${MANUAL_NOTES_TAG}%`);
      for (const { docId } of stale) {
        this.db.prepare<[string]>('DELETE FROM retrieval_fts WHERE doc_id = ?').run(docId);
        this.db.prepare<[string]>('DELETE FROM retrieval_meta WHERE doc_id = ?').run(docId);
      }
      for (const section of sections) {
        const docId = `manual_${uuidv4().replace(/-/g, '').slice(0, 8)}`;
        this.upsertRetrievalDoc(docId, section.title, section.content, MANUAL_NOTES_TAG);
      }
      return sections.length;
    });
    return sync();
  }

  private totalChars(): number {
    const row = this.db
      .prepare<[], { total: number }>(
        'SELECT COALESCE(SUM(size_chars), 0) as total FROM retrieval_meta',
      )
      .get();
    return row?.total ?? 0;
  }

  private requireFts(): void {
    if (!this.fts) throw new Error('FTS5 is not available in this SQLite build');
  }
}

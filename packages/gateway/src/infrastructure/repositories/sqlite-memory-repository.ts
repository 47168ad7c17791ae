import { singleton, inject } from 'tsyringe';
import { mkdirSync } from 'node:fs';
import { dirname, join } from 'node:path';
import type {
  ChatContext,
  ChatRole,
  PromotedState,
  PromotedStatePatch,
  RetrievalHit,
  RetrievalStats,
} from '@chorus/shared';
import { MemoryDB } from './memory-db.js';
import { ConfigService } from '../config/config-service.js';
import { defaultPromotedState } from '../../config.js';
import { Logger } from '../../logger.js';
import type {
  MemoryRepository,
  RetrievalDocInput,
} from '../../domain/interfaces/memory-repository.interface.js';

const IN_MEMORY = ':memory:';

@singleton()
export class SqliteMemoryRepository implements MemoryRepository {
  private db: MemoryDB;

  constructor(
    @inject(ConfigService) private config: ConfigService,
    @inject(Logger) private logger: Logger,
  ) {
    const hub = this.config.getFullConfig();
    const dbPath = hub.dbPath ?? join(hub.dataPath, 'sqlite', 'chorus.db');
    if (dbPath !== IN_MEMORY) {
      mkdirSync(dirname(dbPath), { recursive: true });
    }
    this.logger.info({ dbPath }, 'Initializing SqliteMemoryRepository');
    this.db = new MemoryDB(dbPath, {
      dedupeWindowSeconds: hub.history.dedupeWindowSeconds,
      maxSummaryChars: hub.history.maxSummaryChars,
    });
    if (this.db.seedPromotedState(defaultPromotedState(hub))) {
      this.logger.info('Seeded default promoted state');
    }
    if (!this.db.retrievalAvailable()) {
      this.logger.warn('FTS5 unavailable; retrieval memory is disabled');
    }
  }

  async touchSession(sessionId: string): Promise<void> {
    this.db.touchSession(sessionId);
  }

  async expireStaleSessions(maxAgeDays: number): Promise<number> {
    return this.db.expireStaleSessions(maxAgeDays);
  }

  async getPromotedState(): Promise<PromotedState> {
    return this.db.getPromotedState();
  }

  async patchPromotedState(patch: PromotedStatePatch): Promise<PromotedState> {
    return this.db.patchPromotedState(patch);
  }

  async addChatMessage(
    sessionId: string,
    persona: string,
    role: ChatRole,
    content: string,
  ): Promise<boolean> {
    return this.db.addChatMessage(sessionId, persona, role, content);
  }

  async getChatContext(
    sessionId: string,
    persona: string,
    maxMessages: number,
    maxChars: number,
  ): Promise<ChatContext> {
    return this.db.getChatContext(sessionId, persona, maxMessages, maxChars);
  }

  async trimHistory(sessionId: string, persona: string, keepLast: number): Promise<void> {
    this.db.trimHistory(sessionId, persona, keepLast);
  }

  async clearHistory(sessionId: string): Promise<void> {
    this.db.clearHistory(sessionId);
  }

  retrievalAvailable(): boolean {
    return this.db.retrievalAvailable();
  }

  async upsertRetrievalDoc(doc: RetrievalDocInput): Promise<void> {
    this.db.upsertRetrievalDoc(doc.docId, doc.title, doc.content, doc.tags);
  }

  async deleteRetrievalDoc(docId: string): Promise<boolean> {
    return this.db.deleteRetrievalDoc(docId);
  }

  async purgeRetrieval(): Promise<number> {
    return this.db.purgeRetrieval();
  }

  async queryRetrieval(query: string, limit: number): Promise<RetrievalHit[]> {
    return this.db.queryRetrieval(query, limit);
  }

  async pruneRetrievalToMaxChars(maxTotalChars: number): Promise<number> {
    return this.db.pruneRetrievalToMaxChars(maxTotalChars);
  }

  async retrievalStats(): Promise<RetrievalStats> {
    return this.db.retrievalStats();
  }

  async syncFromMarkdown(markdown: string): Promise<number> {
    return this.db.syncFromMarkdown(markdown);
  }

  close(): void {
    this.db.close();
  }
}

import { singleton, inject } from 'tsyringe';
import type {
  ChatContext,
  PromotedState,
  PromotedStatePatch,
  RetrievalHit,
  RetrievalStats,
  RetrievalUpsertRequest,
} from '@chorus/shared';
import { Logger } from '../../logger.js';
import { ConfigService } from '../../infrastructure/config/config-service.js';
import {
  MEMORY_REPOSITORY,
  type MemoryRepository,
} from '../../domain/interfaces/memory-repository.interface.js';
import { AppError, errorMessage } from '../../domain/errors/app-error.js';

export interface UpsertResult {
  docId: string;
  prunedDocs: number;
}

export interface SweepResult {
  expiredSessions: number;
  prunedDocs: number;
}

/**
 * Memory policies on top of the repository: session upkeep, corpus
 * ceilings and the difference between administrative and hot-path calls.
 */
@singleton()
export class MemoryService {
  constructor(
    @inject(Logger) private logger: Logger,
    @inject(ConfigService) private configService: ConfigService,
    @inject(MEMORY_REPOSITORY) private memoryRepo: MemoryRepository,
  ) {}

  /**
   * Marks the session as seen and opportunistically expires stale ones.
   * Never throws.
   */
  public async touch(sessionId: string): Promise<void> {
    try {
      await this.memoryRepo.touchSession(sessionId);
      const expired = await this.memoryRepo.expireStaleSessions(
        this.configService.get('sessions').maxAgeDays,
      );
      if (expired > 0) this.logger.info({ expired }, 'Expired stale sessions');
    } catch (err) {
      this.logger.warn({ sessionId, err: errorMessage(err) }, 'Session touch failed');
    }
  }

  public async getPromotedState(): Promise<PromotedState> {
    return this.memoryRepo.getPromotedState();
  }

  public async patchPromotedState(patch: PromotedStatePatch): Promise<PromotedState> {
    return this.memoryRepo.patchPromotedState(patch);
  }

  public async getChatContext(sessionId: string, persona: string): Promise<ChatContext> {
    const { lastN, maxChars } = this.configService.get('history');
    return this.memoryRepo.getChatContext(sessionId, persona, lastN, maxChars);
  }

  public async recordTurn(
    sessionId: string,
    persona: string,
    userText: string,
    reply: string,
  ): Promise<void> {
    await this.memoryRepo.addChatMessage(sessionId, persona, 'user', userText);
    await this.memoryRepo.addChatMessage(sessionId, persona, 'assistant', reply);
    await this.memoryRepo.trimHistory(sessionId, persona, this.configService.get('history').lastN);
  }

  public async recordUserMessage(sessionId: string, persona: string, text: string): Promise<void> {
    await this.memoryRepo.addChatMessage(sessionId, persona, 'user', text);
  }

  public async recordReply(sessionId: string, persona: string, reply: string): Promise<void> {
    await this.memoryRepo.addChatMessage(sessionId, persona, 'assistant', reply);
    await this.memoryRepo.trimHistory(sessionId, persona, this.configService.get('history').lastN);
  }

  public async clearHistory(sessionId: string): Promise<void> {
    await this.memoryRepo.clearHistory(sessionId);
  }

  public retrievalAvailable(): boolean {
    return this.memoryRepo.retrievalAvailable();
  }

  /**
   * Upserts a document, then prunes the corpus back under its ceiling.
   * @throws AppError 400 when retrieval is unavailable, 413 when the document is too large.
   */
  public async upsertDoc(request: RetrievalUpsertRequest): Promise<UpsertResult> {
    this.requireRetrieval();
    const { maxDocChars } = this.configService.get('retrieval');
    if (maxDocChars > 0 && request.content.length > maxDocChars) {
      throw new AppError(
        `Retrieval doc too large (chars=${request.content.length} > max=${maxDocChars})`,
        413,
      );
    }

    await this.memoryRepo.upsertRetrievalDoc({
      docId: request.docId,
      title: request.title,
      content: request.content,
      tags: request.tags,
    });
    const prunedDocs = await this.pruneCorpus();
    if (prunedDocs > 0) {
      this.logger.info({ prunedDocs }, 'Pruned retrieval corpus');
    }
    return { docId: request.docId, prunedDocs };
  }

  public async deleteDoc(docId: string): Promise<boolean> {
    this.requireRetrieval();
    return this.memoryRepo.deleteRetrievalDoc(docId);
  }

  public async purgeDocs(): Promise<number> {
    this.requireRetrieval();
    return this.memoryRepo.purgeRetrieval();
  }

  public async queryDocs(query: string, limit: number): Promise<RetrievalHit[]> {
    if (!this.memoryRepo.retrievalAvailable()) return [];
    return this.memoryRepo.queryRetrieval(query, limit);
  }

  /**
   * Hits injected into prompts; empty when retrieval is unavailable or fails.
   */
  public async notesForPrompt(query: string): Promise<RetrievalHit[]> {
    if (!this.memoryRepo.retrievalAvailable()) return [];
    try {
      return await this.memoryRepo.queryRetrieval(
        query,
        this.configService.get('retrieval').queryLimit,
      );
    } catch (err) {
      this.logger.warn({ err: errorMessage(err) }, 'Retrieval query failed');
      return [];
    }
  }

  public async stats(): Promise<RetrievalStats> {
    return this.memoryRepo.retrievalStats();
  }

  /**
   * Replaces the manually maintained notes with the sections of a markdown document.
   */
  public async syncNotes(markdown: string): Promise<number> {
    this.requireRetrieval();
    const count = await this.memoryRepo.syncFromMarkdown(markdown);
    await this.pruneCorpus();
    return count;
  }

  /**
   * Scheduled upkeep: expires idle sessions and enforces the corpus ceiling.
   */
  public async sweep(): Promise<SweepResult> {
    const expiredSessions = await this.memoryRepo.expireStaleSessions(
      this.configService.get('sessions').maxAgeDays,
    );
    const prunedDocs = await this.pruneCorpus();
    return { expiredSessions, prunedDocs };
  }

  /**
   * Trims the retrieval corpus to `retrieval.maxTotalChars`, oldest first.
   */
  public async pruneCorpus(): Promise<number> {
    const { maxTotalChars } = this.configService.get('retrieval');
    if (!this.memoryRepo.retrievalAvailable() || maxTotalChars <= 0) return 0;
    return this.memoryRepo.pruneRetrievalToMaxChars(maxTotalChars);
  }

  public close(): void {
    this.memoryRepo.close();
  }

  private requireRetrieval(): void {
    if (!this.memoryRepo.retrievalAvailable()) {
      throw new AppError('Retrieval store is unavailable (FTS5 not enabled in SQLite)', 400);
    }
  }
}

import type {
  ChatContext,
  ChatRole,
  PromotedState,
  PromotedStatePatch,
  RetrievalHit,
  RetrievalStats,
} from '@chorus/shared';

/** Injection token of the memory repository. */
export const MEMORY_REPOSITORY = 'MemoryRepository';

export interface RetrievalDocInput {
  docId: string;
  title: string;
  content: string;
  tags: string;
}

export interface MemoryRepository {
  // Sessions
  touchSession(sessionId: string): Promise<void>;
  expireStaleSessions(maxAgeDays: number): Promise<number>;

  // Promoted state
  getPromotedState(): Promise<PromotedState>;
  patchPromotedState(patch: PromotedStatePatch): Promise<PromotedState>;

  // Chat history
  addChatMessage(sessionId: string, persona: string, role: ChatRole, content: string): Promise<boolean>;
  getChatContext(
    sessionId: string,
    persona: string,
    maxMessages: number,
    maxChars: number,
  ): Promise<ChatContext>;
  trimHistory(sessionId: string, persona: string, keepLast: number): Promise<void>;
  clearHistory(sessionId: string): Promise<void>;

  // Retrieval corpus
  retrievalAvailable(): boolean;
  upsertRetrievalDoc(doc: RetrievalDocInput): Promise<void>;
  deleteRetrievalDoc(docId: string): Promise<boolean>;
  purgeRetrieval(): Promise<number>;
  queryRetrieval(query: string, limit: number): Promise<RetrievalHit[]>;
  pruneRetrievalToMaxChars(maxTotalChars: number): Promise<number>;
  retrievalStats(): Promise<RetrievalStats>;
  syncFromMarkdown(markdown: string): Promise<number>;

  close(): void;
}

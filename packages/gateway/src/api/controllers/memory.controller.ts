/**
 * @file packages/gateway/src/api/controllers/memory.controller.ts
 * @description Promoted state, retrieval corpus and history endpoints.
 */

import { FastifyRequest } from 'fastify';
import { singleton, inject } from 'tsyringe';
import { z } from 'zod';
import {
  DEFAULT_SESSION_ID,
  PromotedStatePatchSchema,
  RetrievalQueryRequestSchema,
  RetrievalUpsertRequestSchema,
} from '@chorus/shared';
import { Logger } from '../../logger.js';
import { MemoryService } from '../../application/services/memory-service.js';

const DocParamsSchema = z.object({ docId: z.string().min(1) });
const HistoryClearSchema = z.object({
  sessionId: z.string().trim().min(1).default(DEFAULT_SESSION_ID),
});

@singleton()
export class MemoryController {
  constructor(
    @inject(Logger) private logger: Logger,
    @inject(MemoryService) private memory: MemoryService,
  ) {}

  public async getPromoted() {
    return { promoted: await this.memory.getPromotedState() };
  }

  public async patchPromoted(request: FastifyRequest) {
    const patch = PromotedStatePatchSchema.parse(request.body ?? {});
    const promoted = await this.memory.patchPromotedState(patch);
    this.logger.info({ keys: Object.keys(patch) }, 'Promoted state patched');
    return { ok: true, promoted };
  }

  public async upsertDoc(request: FastifyRequest) {
    const body = RetrievalUpsertRequestSchema.parse(request.body);
    const result = await this.memory.upsertDoc(body);
    return { ok: true, ...result };
  }

  public async deleteDoc(request: FastifyRequest) {
    const { docId } = DocParamsSchema.parse(request.params);
    const deleted = await this.memory.deleteDoc(docId);
    return { ok: true, docId, deleted };
  }

  public async purgeDocs() {
    const deleted = await this.memory.purgeDocs();
    this.logger.warn({ deleted }, 'Retrieval corpus purged');
    return { ok: true, deleted };
  }

  public async queryDocs(request: FastifyRequest) {
    const { query, limit } = RetrievalQueryRequestSchema.parse(request.body);
    return { hits: await this.memory.queryDocs(query, limit) };
  }

  public async stats() {
    return this.memory.stats();
  }

  public async clearHistory(request: FastifyRequest) {
    const { sessionId } = HistoryClearSchema.parse(request.body ?? {});
    await this.memory.clearHistory(sessionId);
    return { ok: true, sessionId };
  }
}

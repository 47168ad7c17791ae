/**
 * @file packages/gateway/src/api/routes/memory.routes.ts
 * @description Memory routes; corpus writes sit behind the admin guard.
 */

import { FastifyInstance } from 'fastify';
import { container } from 'tsyringe';
import { MemoryController } from '../controllers/memory.controller.js';
import { requireAdmin } from '../middleware/admin-guard.js';

export async function memoryRoutes(app: FastifyInstance) {
  const controller = container.resolve(MemoryController);
  const admin = { preHandler: requireAdmin };

  app.get('/api/memory/promoted', () => controller.getPromoted());
  app.patch('/api/memory/promoted', (req) => controller.patchPromoted(req));

  app.post('/api/memory/retrieval/upsert', admin, (req) => controller.upsertDoc(req));
  app.delete('/api/memory/retrieval/:docId', admin, (req) => controller.deleteDoc(req));
  app.post('/api/memory/retrieval/purge', admin, () => controller.purgeDocs());
  app.post('/api/memory/retrieval/query', (req) => controller.queryDocs(req));
  app.get('/api/memory/retrieval/stats', () => controller.stats());

  app.post('/api/memory/history/clear', (req) => controller.clearHistory(req));
}

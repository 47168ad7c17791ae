/**
 * @file packages/gateway/src/api/routes/health.routes.ts
 * @description Defines API route registration and endpoint wiring.
 */

import { FastifyInstance } from 'fastify';
import { container } from 'tsyringe';
import { HealthController } from '../controllers/health.controller.js';

export async function healthRoutes(app: FastifyInstance) {
  const controller = container.resolve(HealthController);

  app.get('/health', () => controller.check());
  app.get('/api/time', (req) => controller.time(req));
}

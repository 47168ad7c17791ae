import { FastifyInstance } from 'fastify';
import { container } from 'tsyringe';
import { AskController } from '../controllers/ask.controller.js';

export async function askRoutes(app: FastifyInstance) {
  const controller = container.resolve(AskController);

  app.post('/api/ask', (req) => controller.ask(req));
  app.post('/api/ask/stream', (req, reply) => controller.stream(req, reply));
}

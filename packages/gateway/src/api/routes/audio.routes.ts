import { FastifyInstance } from 'fastify';
import { container } from 'tsyringe';
import { AudioController } from '../controllers/audio.controller.js';

export async function audioRoutes(app: FastifyInstance) {
  const controller = container.resolve(AudioController);

  app.get('/api/audio/:id', (req, reply) => controller.fetch(req, reply));
}

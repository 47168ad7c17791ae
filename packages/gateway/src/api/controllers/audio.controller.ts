import { FastifyRequest, FastifyReply } from 'fastify';
import { singleton, inject } from 'tsyringe';
import { z } from 'zod';
import { AudioBlobCache } from '../../infrastructure/cache/audio-blob-cache.js';
import { AppError } from '../../domain/errors/app-error.js';

const AudioParamsSchema = z.object({ id: z.string().min(1) });

@singleton()
export class AudioController {
  constructor(@inject(AudioBlobCache) private cache: AudioBlobCache) {}

  public async fetch(request: FastifyRequest, reply: FastifyReply) {
    const { id } = AudioParamsSchema.parse(request.params);
    const blob = await this.cache.get(id);
    if (!blob) throw new AppError('Audio not found', 404);
    return reply
      .header('Content-Type', blob.mime)
      .header('Cache-Control', 'no-store')
      .send(blob.bytes);
  }
}

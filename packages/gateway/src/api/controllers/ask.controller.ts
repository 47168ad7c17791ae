/**
 * @file packages/gateway/src/api/controllers/ask.controller.ts
 * @description Ask endpoints: one JSON response, or a server-sent event stream.
 */

import type { OutgoingHttpHeaders } from 'node:http';
import { FastifyRequest, FastifyReply } from 'fastify';
import { singleton, inject } from 'tsyringe';
import { z } from 'zod';
import { AskRequestSchema, serializeSseEvent, type StreamEvent } from '@chorus/shared';
import { Logger } from '../../logger.js';
import { FanoutCoordinator, type AskOptions } from '../../domain/logic/fanout-coordinator.js';
import { errorMessage } from '../../domain/errors/app-error.js';

const FALSE_FLAGS = new Set(['0', 'false', 'no', 'off']);

const AskQuerySchema = z.object({
  execute: z
    .string()
    .optional()
    .transform((value) => value === undefined || !FALSE_FLAGS.has(value.trim().toLowerCase())),
});

export const SSE_HEADERS = {
  'Content-Type': 'text/event-stream; charset=utf-8',
  'Cache-Control': 'no-cache',
  Connection: 'keep-alive',
  'X-Accel-Buffering': 'no',
} as const;

/**
 * The part of the raw response the stream writer needs.
 */
export interface SseSink {
  readonly writableEnded: boolean;
  writeHead(statusCode: number, headers: OutgoingHttpHeaders): unknown;
  write(chunk: string): unknown;
  end(): unknown;
  once(event: 'close', listener: () => void): unknown;
}

const CLIENT_GONE = Symbol('client-gone');

/**
 * Writes events as SSE blocks until the stream finishes or the client
 * disconnects. On disconnect the iteration is abandoned at once instead of
 * waiting for the next event.
 */
export async function writeSseStream(
  sink: SseSink,
  headers: OutgoingHttpHeaders,
  events: AsyncIterable<StreamEvent>,
  logger: Logger,
): Promise<void> {
  const closed = new Promise<typeof CLIENT_GONE>((resolve) => {
    sink.once('close', () => resolve(CLIENT_GONE));
  });
  const iterator = events[Symbol.asyncIterator]();

  sink.writeHead(200, headers);
  try {
    for (;;) {
      const next = await Promise.race([iterator.next(), closed]);
      if (next === CLIENT_GONE) {
        logger.info('Ask stream client disconnected');
        iterator.return?.().catch((err: unknown) => {
          logger.warn({ err: errorMessage(err) }, 'Ask stream cleanup failed');
        });
        break;
      }
      if (next.done) break;
      sink.write(serializeSseEvent(next.value));
    }
  } catch (err) {
    logger.error({ err: errorMessage(err) }, 'Ask stream aborted');
  } finally {
    if (!sink.writableEnded) sink.end();
  }
}

@singleton()
export class AskController {
  constructor(
    @inject(Logger) private logger: Logger,
    @inject(FanoutCoordinator) private coordinator: FanoutCoordinator,
  ) {}

  public async ask(request: FastifyRequest) {
    const body = AskRequestSchema.parse(request.body);
    return this.coordinator.ask(body, this.options(request));
  }

  /**
   * Resolution errors surface as ordinary JSON errors; once the stream has
   * started, failures are reported inside it.
   */
  public async stream(request: FastifyRequest, reply: FastifyReply) {
    const body = AskRequestSchema.parse(request.body);
    const events = await this.coordinator.stream(body, this.options(request));

    // Hijacking skips fastify's header flush, so carry over what hooks
    // such as CORS have already set.
    const headers = { ...reply.getHeaders(), ...SSE_HEADERS };
    reply.hijack();
    await writeSseStream(reply.raw, headers, events, this.logger);
  }

  private options(request: FastifyRequest): AskOptions {
    return { execute: AskQuerySchema.parse(request.query ?? {}).execute };
  }
}

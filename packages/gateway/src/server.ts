import Fastify, { type FastifyInstance } from 'fastify';
import websocket from '@fastify/websocket';
import cors from '@fastify/cors';
import { container } from 'tsyringe';
import { serializeBroadcastFrame, type BroadcastFrame } from '@chorus/shared';
import type { WebSocket } from 'ws';
import { Logger } from './logger.js';
import { errorHandler } from './api/middleware/error.middleware.js';
import { healthRoutes } from './api/routes/health.routes.js';
import { askRoutes } from './api/routes/ask.routes.js';
import { audioRoutes } from './api/routes/audio.routes.js';
import { memoryRoutes } from './api/routes/memory.routes.js';
import { BroadcastBus, type BroadcastSubscription } from './infrastructure/events/broadcast-bus.js';
import { errorMessage } from './domain/errors/app-error.js';

export interface ServerConfig {
  port: number;
  host: string;
  corsOrigins: string[];
}

const SOCKET_OPEN = 1;

/**
 * Hub server: Fastify + WebSocket.
 * Serves the ask, audio and memory API, and pushes every completed reply
 * to passive listeners on `/ws/broadcast`.
 */
export class HubServer {
  private app: FastifyInstance = Fastify({ logger: false });
  private ready = false;

  constructor(private config: ServerConfig) {}

  /**
   * Registers plugins and routes without listening; tests drive the
   * returned instance with `inject`.
   */
  async build(): Promise<FastifyInstance> {
    if (this.ready) return this.app;

    await this.app.register(websocket);
    await this.app.register(cors, {
      origin: this.config.corsOrigins,
      methods: ['GET', 'POST', 'PATCH', 'DELETE'],
    });
    this.app.setErrorHandler(errorHandler);

    // ─── REST Routes ────────────────────────────────────────
    await this.app.register(healthRoutes);
    await this.app.register(askRoutes);
    await this.app.register(audioRoutes);
    await this.app.register(memoryRoutes);

    // ─── WebSocket Route ────────────────────────────────────
    const bus = container.resolve(BroadcastBus);
    const logger = container.resolve(Logger);
    this.app.get('/ws/broadcast', { websocket: true }, (socket) => {
      const subscription = bus.subscribe();
      this.sendFrame(socket, { type: 'hello', subscribers: bus.subscriberCount });

      socket.on('close', () => bus.unsubscribe(subscription.id));
      this.pump(socket, subscription).catch((err: unknown) => {
        logger.warn({ subscriberId: subscription.id, err: errorMessage(err) }, 'Broadcast delivery failed');
        bus.unsubscribe(subscription.id);
      });
    });

    await this.app.ready();
    this.ready = true;
    return this.app;
  }

  async start(): Promise<void> {
    await this.build();
    await this.app.listen({ port: this.config.port, host: this.config.host });
    container.resolve(Logger).info(
      { host: this.config.host, port: this.config.port },
      'Hub listening',
    );
  }

  async stop(): Promise<void> {
    await this.app.close();
  }

  /** Forwards summaries until the subscription's channel closes. */
  private async pump(socket: WebSocket, subscription: BroadcastSubscription): Promise<void> {
    for await (const summary of subscription.channel) {
      if (socket.readyState !== SOCKET_OPEN) break;
      this.sendFrame(socket, { type: 'reply', summary });
    }
  }

  private sendFrame(socket: WebSocket, frame: BroadcastFrame): void {
    socket.send(serializeBroadcastFrame(frame));
  }
}

import { timingSafeEqual } from 'node:crypto';
import { FastifyRequest } from 'fastify';
import { container } from 'tsyringe';
import { ConfigService } from '../../infrastructure/config/config-service.js';
import { AppError } from '../../domain/errors/app-error.js';

export const ADMIN_TOKEN_HEADER = 'x-admin-token';

const sameToken = (presented: string, expected: string): boolean => {
  const a = Buffer.from(presented);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
};

/**
 * preHandler for administrative memory routes. Hidden entirely while
 * disabled; otherwise the header must match the configured token.
 */
export async function requireAdmin(request: FastifyRequest): Promise<void> {
  const { enabled, token } = container.resolve(ConfigService).get('admin');
  if (!enabled) throw new AppError('Not Found', 404);

  const presented = request.headers[ADMIN_TOKEN_HEADER];
  if (!token || typeof presented !== 'string' || !sameToken(presented, token)) {
    throw new AppError('Forbidden', 403);
  }
}

/**
 * Fastify application factory
 */

import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import type { ExerciseRepository } from './db/repositories';
import { healthRoutes } from './routes/health';
import { exerciseRoutes } from './routes/exercises';

export interface BuildAppOptions {
  repository: ExerciseRepository;
  /** Pino logger for requests; `false` disables request logging */
  logger?: FastifyBaseLogger | false;
  corsOrigin?: string;
}

export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const app = Fastify({
    logger: options.logger ?? false,
  });

  await app.register(cors, {
    origin: options.corsOrigin ?? 'http://localhost:3000',
  });

  await app.register(healthRoutes, { prefix: '/api', repository: options.repository });
  await app.register(exerciseRoutes, { prefix: '/api', repository: options.repository });

  return app;
}

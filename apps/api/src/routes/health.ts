import type { FastifyInstance, FastifyPluginOptions } from 'fastify';
import type { ExerciseRepository } from '../db/repositories';

export interface HealthRoutesOptions extends FastifyPluginOptions {
  repository: ExerciseRepository;
}

export async function healthRoutes(fastify: FastifyInstance, options: HealthRoutesOptions) {
  const { repository } = options;

  fastify.get('/health', async (_request, _reply) => {
    fastify.log.debug('Health check requested');

    return {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      service: 'exercise-log-api',
      version: '0.1.0',
    };
  });

  fastify.get('/health/ready', async (_request, reply) => {
    fastify.log.debug('Readiness check requested');

    const pool = repository.status();
    const ready = !pool.closed;

    return reply.status(ready ? 200 : 503).send({
      status: ready ? 'ready' : 'unavailable',
      checks: {
        database: ready ? 'ok' : 'closed',
      },
      pool,
    });
  });
}

/**
 * Exercise Routes
 *
 * API endpoints over the exercise repository: list, lookup, create, delete.
 */

import type { FastifyInstance, FastifyPluginOptions, FastifyReply } from 'fastify';
import { z } from 'zod';
import {
  isRepositoryError,
  toErrorPayload,
  type ExerciseRepository,
  type RepositoryErrorKind,
} from '../db/repositories';
import { createExercise } from '../models/exercise';
import { logFailure, logSuccess, type LogContext } from '../utils/logger';

export interface ExerciseRoutesOptions extends FastifyPluginOptions {
  repository: ExerciseRepository;
}

// Difficulty is accepted as any unsigned byte and clamped by the model
const createExerciseSchema = z.object({
  id: z.string().min(1).max(200).optional(),
  name: z.string(),
  description: z.string().nullish(),
  muscleGroups: z.array(z.string()).optional().default([]),
  equipmentNeeded: z.string().nullish(),
  difficultyLevel: z.number().int().min(0).max(255),
});

type CreateExerciseBody = z.infer<typeof createExerciseSchema>;

const STATUS_BY_KIND: Record<RepositoryErrorKind, number> = {
  InvalidInput: 400,
  ExerciseNotFound: 404,
  PoolError: 503,
  DatabaseError: 500,
};

/**
 * Map an error to a response. Client errors are not logged as failures.
 */
function sendError(
  app: FastifyInstance,
  reply: FastifyReply,
  operation: string,
  error: unknown,
  context: LogContext = {}
): FastifyReply {
  if (error instanceof z.ZodError) {
    return reply.status(400).send({
      success: false,
      error: 'Validation error',
      details: error.errors,
    });
  }

  if (isRepositoryError(error)) {
    const status = STATUS_BY_KIND[error.kind];
    if (status >= 500) {
      logFailure(app.log, operation, error, context);
    }
    return reply.status(status).send({
      success: false,
      error: error.message,
      details: toErrorPayload(error),
    });
  }

  logFailure(app.log, operation, error, context);
  return reply.status(500).send({
    success: false,
    error: 'Internal server error',
  });
}

export async function exerciseRoutes(app: FastifyInstance, options: ExerciseRoutesOptions) {
  const { repository } = options;

  /**
   * List all exercises, sorted by name
   * GET /api/exercises
   */
  app.get('/exercises', async (_request, reply) => {
    try {
      const exercises = await repository.getAllExercises();
      logSuccess(app.log, 'Exercises listed', { count: exercises.length });

      return reply.send({
        success: true,
        data: exercises,
      });
    } catch (error) {
      return sendError(app, reply, 'List exercises', error);
    }
  });

  /**
   * Get a single exercise
   * GET /api/exercises/:id
   */
  app.get<{ Params: { id: string } }>('/exercises/:id', async (request, reply) => {
    const { id } = request.params;
    try {
      const exercise = await repository.getExercise(id);

      return reply.send({
        success: true,
        data: exercise,
      });
    } catch (error) {
      return sendError(app, reply, 'Get exercise', error, { id });
    }
  });

  /**
   * Create an exercise
   * POST /api/exercises
   */
  app.post('/exercises', async (request, reply) => {
    try {
      const body: CreateExerciseBody = createExerciseSchema.parse(request.body);
      const exercise = createExercise(body);

      await repository.addExercise(exercise);
      logSuccess(app.log, 'Exercise created', { exerciseId: exercise.id, name: exercise.name });

      return reply.status(201).send({
        success: true,
        data: exercise,
      });
    } catch (error) {
      return sendError(app, reply, 'Create exercise', error);
    }
  });

  /**
   * Delete an exercise
   * DELETE /api/exercises/:id
   */
  app.delete<{ Params: { id: string } }>('/exercises/:id', async (request, reply) => {
    const { id } = request.params;
    try {
      const deleted = await repository.deleteExercise(id);

      if (!deleted) {
        return reply.status(404).send({
          success: false,
          data: { deleted },
          error: 'Exercise not found',
        });
      }

      logSuccess(app.log, 'Exercise deleted', { exerciseId: id });
      return reply.send({
        success: true,
        data: { deleted },
      });
    } catch (error) {
      return sendError(app, reply, 'Delete exercise', error, { id });
    }
  });
}

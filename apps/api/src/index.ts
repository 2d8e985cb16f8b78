/**
 * Exercise library public API
 *
 * Entry points consumed by client bindings and by the HTTP server.
 */

export {
  ExerciseRepository,
  createExerciseRepository,
  createInMemoryRepository,
  type ExerciseRepositoryOptions,
} from './db/repositories/exercise-repository';
export {
  DatabaseError,
  ExerciseNotFoundError,
  InvalidInputError,
  PoolError,
  RepositoryError,
  isRepositoryError,
  toErrorPayload,
  type ErrorPayload,
  type ExerciseRepositoryError,
  type RepositoryErrorKind,
} from './db/repositories/errors';
export type { PoolStatus } from './db/connection';
export {
  MAX_DIFFICULTY,
  MIN_DIFFICULTY,
  clampDifficulty,
  createExercise,
  difficultyDescription,
  muscleGroupCount,
  requiresEquipment,
  validateExercise,
  type DifficultyDescription,
  type Exercise,
  type ExerciseInput,
} from './models/exercise';
export { initializeLogging, type Logger, type LoggingOptions } from './utils/logger';
export { loadConfig, type AppConfig } from './config';

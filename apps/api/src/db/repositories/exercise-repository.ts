/**
 * Exercise Repository
 *
 * Handles database operations for exercises. Every call takes one connection
 * from the repository's own pool for its duration; there is no transaction
 * spanning calls.
 */

import { asc, eq } from 'drizzle-orm';
import { z } from 'zod';
import { ConnectionPool, IN_MEMORY, type Db, type PoolStatus } from '../connection';
import { createExercisesTable, exercises, type ExerciseRow, type NewExerciseRow } from '../schema';
import type { Exercise } from '../../models/exercise';
import { initializeLogging, logFailure, logOperation, logSuccess, type OperationLogger } from '../../utils/logger';
import { DatabaseError, ExerciseNotFoundError, describeError } from './errors';

export interface ExerciseRepositoryOptions {
  maxConnections?: number;
  acquireTimeoutMillis?: number;
  logger?: OperationLogger;
}

const muscleGroupsSchema = z.array(z.string());

/**
 * Decode a stored row back into an exercise
 */
function toExercise(row: ExerciseRow): Exercise {
  let decoded: unknown;
  try {
    decoded = JSON.parse(row.muscleGroups);
  } catch (error) {
    throw new DatabaseError(
      `Failed to decode muscle groups for exercise '${row.id}': ${describeError(error)}`,
      { cause: error }
    );
  }

  const muscleGroups = muscleGroupsSchema.safeParse(decoded);
  if (!muscleGroups.success) {
    throw new DatabaseError(`Failed to decode muscle groups for exercise '${row.id}': not a list of strings`);
  }

  return Object.freeze({
    id: row.id,
    name: row.name,
    description: row.description,
    muscleGroups: Object.freeze(muscleGroups.data),
    equipmentNeeded: row.equipmentNeeded,
    difficultyLevel: row.difficultyLevel,
  });
}

export class ExerciseRepository {
  private constructor(
    private readonly pool: ConnectionPool,
    private readonly log: OperationLogger
  ) {}

  /**
   * Open a repository on `filename` and make sure the exercises table exists.
   */
  static async open(filename: string, options: ExerciseRepositoryOptions = {}): Promise<ExerciseRepository> {
    const log = options.logger ?? initializeLogging().child({ component: 'exercise-repository' });

    if (filename.trim().length === 0) {
      throw new DatabaseError('Database path must not be empty');
    }

    let pool: ConnectionPool;
    try {
      pool = new ConnectionPool({
        filename,
        max: options.maxConnections,
        acquireTimeoutMillis: options.acquireTimeoutMillis,
      });
    } catch (error) {
      const failure = new DatabaseError(`Failed to create connection pool: ${describeError(error)}`, { cause: error });
      logFailure(log, 'Open repository', failure, { filename });
      throw failure;
    }

    const repository = new ExerciseRepository(pool, log);
    try {
      await repository.initializeSchema();
    } catch (error) {
      await pool.close();
      throw error;
    }

    log.info({ filename, maxConnections: pool.max }, '✅ ExerciseRepository initialized');
    return repository;
  }

  /**
   * Insert a new exercise. A duplicate id fails with a DatabaseError.
   */
  async addExercise(exercise: Exercise): Promise<void> {
    await this.execute('Add exercise', { exerciseId: exercise.id, name: exercise.name }, (db) => {
      const row: NewExerciseRow = {
        id: exercise.id,
        name: exercise.name,
        description: exercise.description,
        muscleGroups: JSON.stringify(exercise.muscleGroups),
        equipmentNeeded: exercise.equipmentNeeded,
        difficultyLevel: exercise.difficultyLevel,
      };
      try {
        db.insert(exercises).values(row).run();
      } catch (error) {
        throw new DatabaseError(`Failed to insert exercise: ${describeError(error)}`, { cause: error });
      }
    });
  }

  /**
   * Get an exercise by ID. Fails with ExerciseNotFoundError when absent.
   */
  async getExercise(id: string): Promise<Exercise> {
    return this.execute('Get exercise', { exerciseId: id }, (db) => {
      let row: ExerciseRow | undefined;
      try {
        row = db.select().from(exercises).where(eq(exercises.id, id)).get();
      } catch (error) {
        throw new DatabaseError(`Failed to query exercise: ${describeError(error)}`, { cause: error });
      }

      if (!row) {
        throw new ExerciseNotFoundError(id);
      }
      return toExercise(row);
    });
  }

  /**
   * Get all exercises, sorted by name
   */
  async getAllExercises(): Promise<Exercise[]> {
    return this.execute('Get all exercises', {}, (db) => {
      let rows: ExerciseRow[];
      try {
        rows = db.select().from(exercises).orderBy(asc(exercises.name)).all();
      } catch (error) {
        throw new DatabaseError(`Failed to query exercises: ${describeError(error)}`, { cause: error });
      }
      return rows.map(toExercise);
    });
  }

  /**
   * Delete an exercise by ID.
   * Returns true if a row was removed, false if none matched.
   */
  async deleteExercise(id: string): Promise<boolean> {
    const deleted = await this.execute('Delete exercise', { exerciseId: id }, (db) => {
      try {
        return db.delete(exercises).where(eq(exercises.id, id)).run().changes > 0;
      } catch (error) {
        throw new DatabaseError(`Failed to delete exercise: ${describeError(error)}`, { cause: error });
      }
    });

    if (!deleted) {
      this.log.warn({ exerciseId: id }, `⚠️ Exercise not found for deletion: ${id}`);
    }
    return deleted;
  }

  status(): PoolStatus {
    return this.pool.status();
  }

  async close(): Promise<void> {
    await this.pool.close();
    this.log.info('ExerciseRepository closed');
  }

  private async initializeSchema(): Promise<void> {
    await this.execute('Create exercises table', {}, (db) => {
      try {
        db.run(createExercisesTable);
      } catch (error) {
        throw new DatabaseError(`Failed to create table: ${describeError(error)}`, { cause: error });
      }
    });
  }

  /**
   * Run one unit of work on a pooled connection, logging start, outcome and
   * duration. Errors are logged and rethrown unchanged; the duration includes
   * any wait for a connection.
   */
  private async execute<T>(
    operation: string,
    context: Record<string, unknown>,
    work: (db: Db) => T
  ): Promise<T> {
    const startedAt = Date.now();
    logOperation(this.log, operation, context);

    try {
      const result = await this.pool.withConnection((connection) => work(connection.db));
      logSuccess(this.log, operation, context, Date.now() - startedAt);
      return result;
    } catch (error) {
      logFailure(this.log, operation, error, context, Date.now() - startedAt);
      throw error;
    }
  }
}

/**
 * Create an ExerciseRepository with a SQLite database at the specified path
 */
export async function createExerciseRepository(
  path: string,
  options?: ExerciseRepositoryOptions
): Promise<ExerciseRepository> {
  const log = options?.logger ?? initializeLogging();
  log.info({ path }, `📂 Creating file-based exercise repository at: ${path}`);
  return ExerciseRepository.open(path, options);
}

/**
 * Create an ExerciseRepository backed by a private in-memory database.
 * Its contents disappear when the repository is closed.
 */
export async function createInMemoryRepository(options?: ExerciseRepositoryOptions): Promise<ExerciseRepository> {
  const log = options?.logger ?? initializeLogging();
  log.info('🧠 Creating in-memory exercise repository');
  return ExerciseRepository.open(IN_MEMORY, options);
}

/**
 * Repository Errors
 *
 * Closed set of errors raised by the exercise repository. Every error carries
 * a literal `kind` so callers can branch with a `switch` instead of matching
 * on message text.
 */

export type RepositoryErrorKind = 'DatabaseError' | 'ExerciseNotFound' | 'InvalidInput' | 'PoolError';

export abstract class RepositoryError extends Error {
  abstract readonly kind: RepositoryErrorKind;

  protected constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Unexpected failure from the storage engine: I/O, constraint violations,
 * rows that cannot be decoded.
 */
export class DatabaseError extends RepositoryError {
  readonly kind = 'DatabaseError' as const;

  constructor(readonly reason: string, options?: { cause?: unknown }) {
    super(`Database error: ${reason}`, options);
  }
}

/**
 * No exercise with the requested id. An expected outcome of a point lookup.
 */
export class ExerciseNotFoundError extends RepositoryError {
  readonly kind = 'ExerciseNotFound' as const;

  constructor(readonly id: string) {
    super(`Exercise not found with id: ${id}`);
  }
}

export class InvalidInputError extends RepositoryError {
  readonly kind = 'InvalidInput' as const;

  constructor(readonly reason: string) {
    super(`Invalid input: ${reason}`);
  }
}

/**
 * A connection could not be acquired from the pool (timeout, closed pool,
 * or a new connection failed to open).
 */
export class PoolError extends RepositoryError {
  readonly kind = 'PoolError' as const;

  constructor(readonly reason: string, options?: { cause?: unknown }) {
    super(`Connection pool error: ${reason}`, options);
  }
}

export type ExerciseRepositoryError = DatabaseError | ExerciseNotFoundError | InvalidInputError | PoolError;

/**
 * Serializable error shape handed to clients
 */
export type ErrorPayload =
  | { type: 'DatabaseError'; message: string }
  | { type: 'ExerciseNotFound'; id: string }
  | { type: 'InvalidInput'; message: string }
  | { type: 'PoolError'; message: string };

export function isRepositoryError(value: unknown): value is ExerciseRepositoryError {
  return (
    value instanceof DatabaseError ||
    value instanceof ExerciseNotFoundError ||
    value instanceof InvalidInputError ||
    value instanceof PoolError
  );
}

export function toErrorPayload(error: ExerciseRepositoryError): ErrorPayload {
  switch (error.kind) {
    case 'DatabaseError':
      return { type: 'DatabaseError', message: error.reason };
    case 'ExerciseNotFound':
      return { type: 'ExerciseNotFound', id: error.id };
    case 'InvalidInput':
      return { type: 'InvalidInput', message: error.reason };
    case 'PoolError':
      return { type: 'PoolError', message: error.reason };
  }
}

/**
 * Message of an unknown thrown value
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

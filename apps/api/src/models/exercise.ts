/**
 * Exercise Model
 *
 * Immutable value object for a single exercise. Difficulty is normalized into
 * the 1-10 band at construction instead of being rejected.
 */

import { randomUUID } from 'crypto';
import { InvalidInputError } from '../db/repositories/errors';
import { initializeLogging, type Logger } from '../utils/logger';

export const MIN_DIFFICULTY = 1;
export const MAX_DIFFICULTY = 10;

export interface Exercise {
  readonly id: string;
  readonly name: string;
  readonly description: string | null;
  readonly muscleGroups: readonly string[];
  readonly equipmentNeeded: string | null;
  readonly difficultyLevel: number;
}

/**
 * Caller-supplied fields for a new exercise
 */
export interface ExerciseInput {
  id?: string;
  name: string;
  description?: string | null;
  muscleGroups?: readonly string[];
  equipmentNeeded?: string | null;
  difficultyLevel: number;
}

let modelLogger: Logger | null = null;

function getLogger(): Logger {
  if (!modelLogger) {
    modelLogger = initializeLogging().child({ component: 'exercise-model' });
  }
  return modelLogger;
}

export type DifficultyDescription = 'Very Easy' | 'Easy' | 'Moderate' | 'Hard' | 'Very Hard' | 'Unknown';

export function clampDifficulty(value: number): number {
  if (Number.isNaN(value)) {
    throw new InvalidInputError('Difficulty level must be a number');
  }
  return Math.min(MAX_DIFFICULTY, Math.max(MIN_DIFFICULTY, Math.trunc(value)));
}

/**
 * Create an exercise, generating an id when none is given.
 */
export function createExercise(input: ExerciseInput): Exercise {
  const log = getLogger();
  const difficultyLevel = clampDifficulty(input.difficultyLevel);
  const muscleGroups = Object.freeze([...(input.muscleGroups ?? [])]);

  if (difficultyLevel !== input.difficultyLevel) {
    log.warn(
      { requested: input.difficultyLevel, difficultyLevel, name: input.name },
      `⚠️ Difficulty level ${input.difficultyLevel} clamped to ${difficultyLevel} for exercise '${input.name}'`
    );
  }
  if (muscleGroups.length === 0) {
    log.warn({ name: input.name }, `⚠️ Exercise '${input.name}' created with no muscle groups`);
  }

  const exercise: Exercise = Object.freeze({
    id: input.id ?? randomUUID(),
    name: input.name,
    description: input.description ?? null,
    muscleGroups,
    equipmentNeeded: input.equipmentNeeded ?? null,
    difficultyLevel,
  });

  log.debug(
    { exerciseId: exercise.id, difficultyLevel },
    `Created exercise: ${exercise.name}`
  );

  return exercise;
}

/**
 * Stricter check than construction: non-blank name, at least one muscle
 * group, difficulty inside the band.
 */
export function validateExercise(exercise: Exercise): void {
  if (exercise.name.trim().length === 0) {
    throw new InvalidInputError('Exercise name cannot be empty');
  }

  if (exercise.muscleGroups.length === 0) {
    throw new InvalidInputError('Exercise must target at least one muscle group');
  }

  if (
    !Number.isInteger(exercise.difficultyLevel) ||
    exercise.difficultyLevel < MIN_DIFFICULTY ||
    exercise.difficultyLevel > MAX_DIFFICULTY
  ) {
    throw new InvalidInputError(
      `Difficulty level must be between ${MIN_DIFFICULTY} and ${MAX_DIFFICULTY}, got ${exercise.difficultyLevel}`
    );
  }
}

export function difficultyDescription(exercise: Exercise): DifficultyDescription {
  const level = exercise.difficultyLevel;

  if (level === 1 || level === 2) return 'Very Easy';
  if (level === 3 || level === 4) return 'Easy';
  if (level === 5 || level === 6) return 'Moderate';
  if (level === 7 || level === 8) return 'Hard';
  if (level === 9 || level === 10) return 'Very Hard';
  return 'Unknown';
}

export function requiresEquipment(exercise: Exercise): boolean {
  return exercise.equipmentNeeded !== null;
}

export function muscleGroupCount(exercise: Exercise): number {
  return exercise.muscleGroups.length;
}

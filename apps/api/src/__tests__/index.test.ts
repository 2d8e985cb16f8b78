/**
 * Public API Tests
 *
 * Drives the library the way a client binding would: only through the
 * package entry point.
 */

import { describe, it, expect } from 'vitest';
import {
  ExerciseNotFoundError,
  createExercise,
  createInMemoryRepository,
  initializeLogging,
  toErrorPayload,
} from '../index';

describe('public API', () => {
  it('should support the full add / list / get / delete cycle', async () => {
    initializeLogging();
    const repository = await createInMemoryRepository();

    try {
      await repository.addExercise(createExercise({ id: 'a', name: 'Squat', difficultyLevel: 15 }));
      await repository.addExercise(createExercise({ id: 'b', name: 'Curl', difficultyLevel: 0 }));

      const all = await repository.getAllExercises();
      expect(all.map((exercise) => [exercise.name, exercise.difficultyLevel])).toEqual([
        ['Curl', 1],
        ['Squat', 10],
      ]);

      expect(await repository.deleteExercise('a')).toBe(true);

      const error = await repository.getExercise('a').catch((caught: unknown) => caught);
      expect(error).toBeInstanceOf(ExerciseNotFoundError);
      if (error instanceof ExerciseNotFoundError) {
        expect(toErrorPayload(error)).toEqual({ type: 'ExerciseNotFound', id: 'a' });
      }
    } finally {
      await repository.close();
    }
  });
});

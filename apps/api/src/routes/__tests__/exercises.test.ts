/**
 * Exercise Routes Tests
 *
 * Integration tests for the exercise API endpoints, backed by an in-memory
 * repository.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildApp } from '../../app';
import { createInMemoryRepository, type ExerciseRepository } from '../../db/repositories';
import { createExercise } from '../../models/exercise';

describe('Exercise Routes', () => {
  let repository: ExerciseRepository;
  let app: FastifyInstance;

  beforeEach(async () => {
    repository = await createInMemoryRepository();
    app = await buildApp({ repository });
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
    await repository.close();
  });

  describe('POST /api/exercises', () => {
    it('should create an exercise with clamped difficulty', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/exercises',
        payload: {
          id: 'a',
          name: 'Squat',
          muscleGroups: ['Quadriceps', 'Glutes'],
          equipmentNeeded: 'Barbell',
          difficultyLevel: 15,
        },
      });

      expect(response.statusCode).toBe(201);
      const body = JSON.parse(response.body);
      expect(body).toEqual({
        success: true,
        data: {
          id: 'a',
          name: 'Squat',
          description: null,
          muscleGroups: ['Quadriceps', 'Glutes'],
          equipmentNeeded: 'Barbell',
          difficultyLevel: 10,
        },
      });
      expect((await repository.getExercise('a')).difficultyLevel).toBe(10);
    });

    it('should generate an id when none is given', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/exercises',
        payload: { name: 'Curl', difficultyLevel: 0 },
      });

      expect(response.statusCode).toBe(201);
      const body = JSON.parse(response.body);
      expect(typeof body.data.id).toBe('string');
      expect(body.data.muscleGroups).toEqual([]);
      expect(body.data.difficultyLevel).toBe(1);
      expect((await repository.getExercise(body.data.id)).name).toBe('Curl');
    });

    it('should return 400 for a missing name', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/exercises',
        payload: { difficultyLevel: 3 },
      });

      expect(response.statusCode).toBe(400);
      const body = JSON.parse(response.body);
      expect(body.success).toBe(false);
      expect(body.error).toBe('Validation error');
    });

    it('should return 400 for a difficulty outside the byte range', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/exercises',
        payload: { name: 'Clean', difficultyLevel: 300 },
      });

      expect(response.statusCode).toBe(400);
      await expect(repository.getAllExercises()).resolves.toEqual([]);
    });

    it('should return 500 with a DatabaseError payload for a duplicate id', async () => {
      await repository.addExercise(createExercise({ id: 'dup', name: 'Row', difficultyLevel: 4 }));

      const response = await app.inject({
        method: 'POST',
        url: '/api/exercises',
        payload: { id: 'dup', name: 'Row', difficultyLevel: 4 },
      });

      expect(response.statusCode).toBe(500);
      const body = JSON.parse(response.body);
      expect(body.success).toBe(false);
      expect(body.details.type).toBe('DatabaseError');
      expect(body.details.message).toBe('Failed to insert exercise: UNIQUE constraint failed: exercises.id');
    });
  });

  describe('GET /api/exercises', () => {
    it('should return an empty list', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/exercises' });

      expect(response.statusCode).toBe(200);
      expect(JSON.parse(response.body)).toEqual({ success: true, data: [] });
    });

    it('should return exercises sorted by name', async () => {
      await repository.addExercise(createExercise({ id: 'a', name: 'Squat', difficultyLevel: 15 }));
      await repository.addExercise(createExercise({ id: 'b', name: 'Curl', difficultyLevel: 0 }));

      const response = await app.inject({ method: 'GET', url: '/api/exercises' });

      const body = JSON.parse(response.body);
      expect(body.data.map((exercise: { name: string }) => exercise.name)).toEqual(['Curl', 'Squat']);
    });

    it('should return 503 when the pool is closed', async () => {
      await repository.close();

      const response = await app.inject({ method: 'GET', url: '/api/exercises' });

      expect(response.statusCode).toBe(503);
      expect(JSON.parse(response.body)).toEqual({
        success: false,
        error: 'Connection pool error: Connection pool is closed',
        details: { type: 'PoolError', message: 'Connection pool is closed' },
      });
    });
  });

  describe('GET /api/exercises/:id', () => {
    it('should return a stored exercise', async () => {
      await repository.addExercise(
        createExercise({ id: 'bench', name: 'Bench Press', muscleGroups: ['Chest'], difficultyLevel: 6 })
      );

      const response = await app.inject({ method: 'GET', url: '/api/exercises/bench' });

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.body);
      expect(body.data.name).toBe('Bench Press');
      expect(body.data.muscleGroups).toEqual(['Chest']);
    });

    it('should return 404 with an ExerciseNotFound payload', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/exercises/nope' });

      expect(response.statusCode).toBe(404);
      expect(JSON.parse(response.body)).toEqual({
        success: false,
        error: 'Exercise not found with id: nope',
        details: { type: 'ExerciseNotFound', id: 'nope' },
      });
    });
  });

  describe('DELETE /api/exercises/:id', () => {
    it('should delete once and report 404 afterwards', async () => {
      await repository.addExercise(createExercise({ id: 'gone', name: 'Dip', difficultyLevel: 5 }));

      const first = await app.inject({ method: 'DELETE', url: '/api/exercises/gone' });
      const second = await app.inject({ method: 'DELETE', url: '/api/exercises/gone' });

      expect(first.statusCode).toBe(200);
      expect(JSON.parse(first.body)).toEqual({ success: true, data: { deleted: true } });
      expect(second.statusCode).toBe(404);
      expect(JSON.parse(second.body)).toEqual({
        success: false,
        data: { deleted: false },
        error: 'Exercise not found',
      });
    });
  });
});

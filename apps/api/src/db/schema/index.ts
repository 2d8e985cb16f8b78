import { sql } from 'drizzle-orm';
import { integer, sqliteTable, text } from 'drizzle-orm/sqlite-core';

// Exercises table; muscle groups are stored as a JSON array of strings
export const exercises = sqliteTable('exercises', {
  id: text('id').primaryKey(),
  name: text('name').notNull(),
  description: text('description'),
  muscleGroups: text('muscle_groups').notNull(),
  equipmentNeeded: text('equipment_needed'),
  difficultyLevel: integer('difficulty_level').notNull(),
});

export type ExerciseRow = typeof exercises.$inferSelect;
export type NewExerciseRow = typeof exercises.$inferInsert;

// Forward-only bootstrap, run on every repository creation
export const createExercisesTable = sql`
  CREATE TABLE IF NOT EXISTS exercises (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    description TEXT,
    muscle_groups TEXT NOT NULL,
    equipment_needed TEXT,
    difficulty_level INTEGER NOT NULL
  )
`;

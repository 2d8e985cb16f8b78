/**
 * Repository Exports
 *
 * Central export point for the database repositories.
 */

export * from './exercise-repository';
export * from './errors';

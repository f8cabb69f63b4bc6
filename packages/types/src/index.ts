/**
 * @stepweave/types
 * Shared types for the workflow engine and its collaborators
 */

export * from './db';
export * from './api';

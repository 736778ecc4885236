// src/index.ts
// Package entry: semantic segmentation engine and query resolution pipeline

export * from './errors';
export * from './config';
export * from './utils';
export * from './rag';
export * from './llm';
export * from './pipeline';
export * from './tickets';
export { openDatabase, runMigrations } from './db/database';
export type { SqliteDatabase } from './db/database';
export { createCopilot } from './copilot';
export type { Copilot, CopilotOverrides } from './copilot';

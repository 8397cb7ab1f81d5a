// Re-export all schema tables for use by Drizzle Kit (config) and the db module.
export * from './user.js';
export * from './base-uri.js';
export * from './dataset.js';
export * from './permission.js';

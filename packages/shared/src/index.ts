export * from './constants/index.js';

export type * from './types/api.js';
export type * from './types/base-uri.js';
export type * from './types/dataset.js';
export type * from './types/user.js';

export * from './validation/dataset.js';
export * from './validation/permissions.js';
export * from './validation/user.js';

export * from './api.js';
export * from './format.js';
export * from './sections.js';
export * from './options.js';
export type * from './types/database.js';
export type * from './types/episode-guide.js';
export * from './schemas/index.js';

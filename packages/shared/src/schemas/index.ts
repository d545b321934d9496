export * from './common.schema.js';
export * from './section.schema.js';
export * from './item.schema.js';
export * from './template.schema.js';
export * from './episode-guide.schema.js';
export * from './recording.schema.js';
export * from './podcast.schema.js';
export * from './option.schema.js';

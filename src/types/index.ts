export type * from './search.types.js';
export type * from './config.types.js';

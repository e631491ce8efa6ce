export * from './constants/index.js';
export * from './schemas/index.js';
export * from './geo/index.js';
export * from './errors.js';

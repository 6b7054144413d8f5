export * from './types.js';
export * from './constants.js';
export * from './schemas.js';
export * from './package-name.js';

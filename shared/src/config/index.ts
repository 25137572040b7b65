export * from './env.js';
export * from './constants.js';

export * from './task.js';
export * from './config.js';
export * from './exit-codes.js';

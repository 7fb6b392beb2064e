export * from './build.js';
export * from './list.js';
export * from './serve.js';

export * from './distribution.js';
export * from './service.js';

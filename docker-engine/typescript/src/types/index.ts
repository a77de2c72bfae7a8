export * from './swarm.js';
export * from './registry.js';
export * from './service.js';

export * from './deployment.js';
export * from './remote.js';

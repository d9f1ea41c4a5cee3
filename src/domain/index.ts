export * from './descriptor.js';
export * from './errors.js';
export * from './models/index.js';
export * from './events/index.js';

export * from './base.js';
export * from './catalogue.js';
export * from './names.js';

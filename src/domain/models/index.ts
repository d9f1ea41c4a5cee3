export * from './accounts.js';
export * from './advisories.js';
export * from './checks.js';
export * from './commits.js';
export * from './deployments.js';
export * from './hooks.js';
export * from './issues.js';
export * from './permissions.js';
export * from './pull-requests.js';
export * from './releases.js';
export * from './repository.js';

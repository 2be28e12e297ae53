/**
 * Domain model exports.
 */

export * from './audit';
export * from './compliance';
export * from './deployment';
export * from './errors';
export * from './events';
export * from './jurisdiction';
export * from './residency';
export * from './routing';
export * from './sovereign-model';

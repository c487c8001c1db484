/**
 * Domain model exports.
 */

export * from './artifact';
export * from './credentials';
export * from './deployment';
export * from './errors';
export * from './events';
export * from './pipeline';
export * from './run';

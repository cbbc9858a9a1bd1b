/**
 * Domain model exports.
 */

export * from './artifact';
export * from './errors';
export * from './notification';
export * from './pipeline';
export * from './repository';
export * from './result';
export * from './task';

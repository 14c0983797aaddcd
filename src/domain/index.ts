/**
 * Domain model exports.
 */

export * from './errors';
export * from './reconciliation';
export * from './remote';
export * from './request';
export * from './result';

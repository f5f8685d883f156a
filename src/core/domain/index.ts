/**
 * Domain Layer Index
 * Core business logic - No external dependencies
 */

export * from './entities';
export * from './value-objects';
export * from './interfaces';
export * from './constants';
export * from './errors';
export * from './utils';

/**
 * Image reference detection and normalization
 */

export * from './reference';
export * from './errors';
export * from './validation';
export * from './parser';
export * from './normalizer';
export * from './registry-matcher';
export * from './registry-mappings';
export * from './path-patterns';
export * from './detector';
export * from './path-strategy';

/**
 * Metadata Module
 *
 * Component and topic descriptors, and the representations derived from them.
 */

export * from './loader.js';
export * from './schema.js';

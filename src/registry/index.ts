/**
 * Registry Module
 */

export * from './client.js';
export * from './registrar.js';

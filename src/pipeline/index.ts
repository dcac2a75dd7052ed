/**
 * Pipeline Module
 */

export * from './synthetic.js';
export * from './stats.js';
export * from './strategies.js';
export * from './producer.js';
export * from './consumer.js';

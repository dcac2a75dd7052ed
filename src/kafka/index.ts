/**
 * Kafka Module
 *
 * Topic provisioning, the broker bridge and the kafkajs adapters behind it.
 */

export * from './config.js';
export * from './lane.js';
export * from './bridge.js';
export * from './provisioner.js';
export * from './client.js';
export * from './factory.js';

/**
 * busbench - Telemetry Bus Benchmarking Harness
 *
 * Provisions topics, registers Avro schemas and drives a producer or consumer
 * loop against a Kafka broker, measuring throughput and end-to-end delay.
 *
 * @packageDocumentation
 */

// Types
export * from './types.js';

// Errors
export * from './lib/errors.js';

// Config
export { loadConfig } from './lib/config.js';
export type { BusBenchConfig, RegistryConfig, RunConfig } from './lib/config.js';
export { createLogger } from './lib/logger.js';

// Metadata
export * from './metadata/index.js';

// Broker
export * from './kafka/index.js';

// Schema registry
export * from './registry/index.js';

// Pipelines
export * from './pipeline/index.js';

// Runtime
export * from './runtime.js';

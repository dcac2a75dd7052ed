/**
 * busbench Configuration
 * Environment-based configuration loader
 */

import { join } from 'path';

export interface RegistryConfig {
  url: string;
}

export interface RunConfig {
  /** First segment of every wire topic name */
  topicNamespace: string;
  componentsDir: string;
  pollTimeoutMs: number;
  listTopicsTimeoutMs: number;
  flushTimeoutMs: number;
  /** Pause before a producer process exits */
  finalDelayMs: number;
}

export interface BusBenchConfig {
  registry: RegistryConfig;
  run: RunConfig;
}

export function optionalEnv(name: string, defaultValue: string): string {
  return process.env[name] ?? defaultValue;
}

export function intEnv(name: string, defaultValue: number): number {
  const parsed = parseInt(optionalEnv(name, String(defaultValue)), 10);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

export function loadConfig(): BusBenchConfig {
  return {
    registry: {
      url: optionalEnv('SCHEMA_REGISTRY_URL', 'http://schema-registry:8081'),
    },
    run: {
      topicNamespace: optionalEnv('BUSBENCH_TOPIC_NAMESPACE', 'telemetry'),
      componentsDir: optionalEnv('BUSBENCH_COMPONENTS_DIR', join(process.cwd(), 'components')),
      pollTimeoutMs: intEnv('BUSBENCH_POLL_TIMEOUT_MS', 100),
      listTopicsTimeoutMs: intEnv('BUSBENCH_LIST_TOPICS_TIMEOUT_MS', 10000),
      flushTimeoutMs: intEnv('BUSBENCH_FLUSH_TIMEOUT_MS', 30000),
      finalDelayMs: intEnv('BUSBENCH_FINAL_DELAY_MS', 1000),
    },
  };
}

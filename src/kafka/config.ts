/**
 * Kafka Configuration
 *
 * Client, producer and consumer settings for the benchmark clients.
 */

import { logLevel, type ConsumerConfig, type KafkaConfig, type ProducerConfig, type SASLOptions } from 'kafkajs';

import { intEnv, optionalEnv } from '../lib/config.js';

export interface BusBenchKafkaConfig {
  kafka: KafkaConfig;
  producer: ProducerConfig;
  consumer: Omit<ConsumerConfig, 'groupId'>;
  /** 1 waits for the leader's ack, 0 does not wait */
  acks: 0 | 1;
  /** Applied to every topic the provisioner creates */
  replicationFactor: number;
}

export interface KafkaConfigOverrides {
  noWaitAck?: boolean;
}

const CLIENT_LOG_LEVELS: Record<string, logLevel> = {
  nothing: logLevel.NOTHING,
  error: logLevel.ERROR,
  warn: logLevel.WARN,
  info: logLevel.INFO,
  debug: logLevel.DEBUG,
};

/** Comma-separated host:port list; blanks are dropped */
export function parseBrokers(value: string): string[] {
  return value
    .split(',')
    .map((broker) => broker.trim())
    .filter((broker) => broker.length > 0);
}

function saslFromEnv(): SASLOptions | undefined {
  const username = process.env['KAFKA_SASL_USERNAME'];
  const password = process.env['KAFKA_SASL_PASSWORD'];
  if (!username || !password) return undefined;
  return { mechanism: 'plain', username, password };
}

function clientLogLevel(): logLevel {
  return CLIENT_LOG_LEVELS[optionalEnv('KAFKA_LOG_LEVEL', 'error').toLowerCase()] ?? logLevel.ERROR;
}

/**
 * Get Kafka configuration from environment
 */
export function getKafkaConfig(overrides: KafkaConfigOverrides = {}): BusBenchKafkaConfig {
  const brokers = parseBrokers(optionalEnv('KAFKA_BROKERS', ''));

  return {
    kafka: {
      clientId: optionalEnv('KAFKA_CLIENT_ID', 'busbench'),
      brokers: brokers.length > 0 ? brokers : ['broker:29092'],
      ssl: process.env['KAFKA_SSL'] === 'true',
      sasl: saslFromEnv(),
      connectionTimeout: intEnv('KAFKA_CONNECTION_TIMEOUT', 10000),
      requestTimeout: intEnv('KAFKA_REQUEST_TIMEOUT', 30000),
      logLevel: clientLogLevel(),
      // A benchmark run should fail fast rather than ride out a long outage
      retry: {
        initialRetryTime: 100,
        retries: intEnv('KAFKA_RETRIES', 5),
        maxRetryTime: 5000,
      },
    },

    producer: {
      allowAutoTopicCreation: false,
      // Sends are strictly sequential; one request in flight keeps ordering
      maxInFlightRequests: 1,
      idempotent: false,
    },

    consumer: {
      sessionTimeout: 30000,
      heartbeatInterval: 3000,
      // Latency over batching: answer a fetch as soon as one byte is there
      minBytes: 1,
      maxWaitTimeInMs: 100,
      allowAutoTopicCreation: false,
    },

    acks: overrides.noWaitAck ? 0 : 1,
    replicationFactor: intEnv('BUSBENCH_REPLICATION_FACTOR', 1),
  };
}

/**
 * Configuration Tests
 */

import { join } from 'path';

import { logLevel } from 'kafkajs';

import { getKafkaConfig, parseBrokers } from '../../src/kafka/config.js';
import { loadConfig } from '../../src/lib/config.js';

describe('Configuration', () => {
  const savedEnv = { ...process.env };

  afterEach(() => {
    process.env = { ...savedEnv };
  });

  describe('loadConfig', () => {
    it('should fall back to defaults', () => {
      delete process.env['SCHEMA_REGISTRY_URL'];
      delete process.env['BUSBENCH_COMPONENTS_DIR'];

      const config = loadConfig();

      expect(config.registry.url).toBe('http://schema-registry:8081');
      expect(config.run).toEqual({
        topicNamespace: 'telemetry',
        componentsDir: join(process.cwd(), 'components'),
        pollTimeoutMs: 100,
        listTopicsTimeoutMs: 10000,
        flushTimeoutMs: 30000,
        finalDelayMs: 1000,
      });
    });

    it('should read overrides from the environment', () => {
      process.env['SCHEMA_REGISTRY_URL'] = 'http://localhost:18081';
      process.env['BUSBENCH_TOPIC_NAMESPACE'] = 'bench';
      process.env['BUSBENCH_COMPONENTS_DIR'] = '/srv/components';
      process.env['BUSBENCH_POLL_TIMEOUT_MS'] = '25';
      process.env['BUSBENCH_FINAL_DELAY_MS'] = '0';

      const config = loadConfig();

      expect(config.registry.url).toBe('http://localhost:18081');
      expect(config.run.topicNamespace).toBe('bench');
      expect(config.run.componentsDir).toBe('/srv/components');
      expect(config.run.pollTimeoutMs).toBe(25);
      expect(config.run.finalDelayMs).toBe(0);
    });

    it('should ignore integers that do not parse', () => {
      process.env['BUSBENCH_FLUSH_TIMEOUT_MS'] = 'soon';

      expect(loadConfig().run.flushTimeoutMs).toBe(30000);
    });
  });

  describe('parseBrokers', () => {
    it('should trim entries and drop blanks', () => {
      expect(parseBrokers(' kafka-1:9092, ,kafka-2:9092 ')).toEqual(['kafka-1:9092', 'kafka-2:9092']);
    });
  });

  describe('getKafkaConfig', () => {
    it('should split the broker list', () => {
      process.env['KAFKA_BROKERS'] = 'kafka-1:9092,kafka-2:9092';

      expect(getKafkaConfig().kafka.brokers).toEqual(['kafka-1:9092', 'kafka-2:9092']);
    });

    it('should default to the compose broker', () => {
      delete process.env['KAFKA_BROKERS'];

      expect(getKafkaConfig().kafka.brokers).toEqual(['broker:29092']);
    });

    it('should fall back to the compose broker when the list is blank', () => {
      process.env['KAFKA_BROKERS'] = ' , ';

      expect(getKafkaConfig().kafka.brokers).toEqual(['broker:29092']);
    });

    it('should read the replication factor', () => {
      expect(getKafkaConfig().replicationFactor).toBe(1);

      process.env['BUSBENCH_REPLICATION_FACTOR'] = '3';
      expect(getKafkaConfig().replicationFactor).toBe(3);
    });

    it('should map the client log level and default to errors only', () => {
      process.env['KAFKA_LOG_LEVEL'] = 'DEBUG';
      expect(getKafkaConfig().kafka.logLevel).toBe(logLevel.DEBUG);

      process.env['KAFKA_LOG_LEVEL'] = 'chatty';
      expect(getKafkaConfig().kafka.logLevel).toBe(logLevel.ERROR);
    });

    it('should wait for the leader ack unless told not to', () => {
      expect(getKafkaConfig().acks).toBe(1);
      expect(getKafkaConfig({ noWaitAck: true }).acks).toBe(0);
    });

    it('should keep one request in flight', () => {
      expect(getKafkaConfig().producer).toMatchObject({ maxInFlightRequests: 1, allowAutoTopicCreation: false });
    });

    it('should only configure SASL with both credentials', () => {
      process.env['KAFKA_SASL_USERNAME'] = 'test-user';
      expect(getKafkaConfig().kafka.sasl).toBeUndefined();

      process.env['KAFKA_SASL_PASSWORD'] = 'test-secret';
      expect(getKafkaConfig().kafka.sasl).toEqual({
        mechanism: 'plain',
        username: 'test-user',
        password: 'test-secret',
      });
    });
  });
});

/**
 * Kafka Client Factory
 *
 * Creates connected kafkajs clients wrapped in the broker ports.
 */

import { Kafka } from 'kafkajs';
import type { Logger } from 'pino';

import type { BrokerConsumer, BrokerProducer } from './bridge.js';
import { KafkaAdminClient, KafkaConsumerClient, KafkaProducerClient } from './client.js';
import type { BusBenchKafkaConfig } from './config.js';
import type { BrokerAdmin } from './provisioner.js';

export class KafkaClientFactory {
  private readonly kafka: Kafka;

  constructor(
    private readonly config: BusBenchKafkaConfig,
    private readonly logger: Logger
  ) {
    this.kafka = new Kafka(config.kafka);
  }

  /**
   * Run fn with a connected admin client, disconnecting afterwards
   */
  async withAdmin<T>(fn: (admin: BrokerAdmin) => Promise<T>): Promise<T> {
    const admin = this.kafka.admin();
    await admin.connect();

    try {
      return await fn(new KafkaAdminClient(admin));
    } finally {
      await admin.disconnect();
    }
  }

  async createProducer(): Promise<BrokerProducer> {
    const producer = this.kafka.producer(this.config.producer);
    await producer.connect();
    this.logger.info({ acks: this.config.acks }, 'Producer connected');
    return new KafkaProducerClient(producer, this.config.acks);
  }

  async createConsumer(groupId: string, maxHistoryRead: number): Promise<BrokerConsumer> {
    const consumer = this.kafka.consumer({ ...this.config.consumer, groupId });
    const admin = this.kafka.admin();
    await Promise.all([consumer.connect(), admin.connect()]);
    this.logger.info({ groupId }, 'Consumer connected');

    const client = new KafkaConsumerClient(consumer, admin, { maxHistoryRead, logger: this.logger });
    consumer.on(consumer.events.CRASH, (event) => client.handleCrash(event.payload.error));
    consumer.on(consumer.events.GROUP_JOIN, (event) => client.handleGroupJoin(event.payload.memberAssignment));
    return client;
  }
}

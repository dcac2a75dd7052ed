/**
 * busbench Runtime
 *
 * Startup sequence shared by the entry points: load metadata, provision
 * topics, register schemas, then hand a lane-owned broker client to one
 * pipeline. The environment is injected so the whole sequence can run
 * against in-process stand-ins.
 */

import { v4 as uuidv4 } from 'uuid';

import { loadConfig, type BusBenchConfig } from './lib/config.js';
import { ConfigurationError } from './lib/errors.js';
import { createLogger, type Logger } from './lib/logger.js';
import { sleep } from './lib/timeout.js';
import { ReadBridge, WriteBridge, type BrokerConsumer, type BrokerProducer } from './kafka/bridge.js';
import { getKafkaConfig } from './kafka/config.js';
import { KafkaClientFactory } from './kafka/factory.js';
import { ClientLane } from './kafka/lane.js';
import { TopicProvisioner, type BrokerAdmin } from './kafka/provisioner.js';
import { getTopic, loadComponent } from './metadata/loader.js';
import { ConsumerPipeline, type ConsumedMessage } from './pipeline/consumer.js';
import { ProducerPipeline } from './pipeline/producer.js';
import { parsePostProcessStrategy, parseValidationStrategy } from './pipeline/strategies.js';
import { ConfluentRegistryClient, type SchemaRegistryClient } from './registry/client.js';
import { SchemaRegistrar } from './registry/registrar.js';
import type { Clock, ConsumerReport, ProducerReport, TopicDescriptor } from './types.js';

// ============================================================================
// Environment
// ============================================================================

export interface BenchEnvironment {
  config: BusBenchConfig;
  logger: Logger;
  clock: Clock;
  registry: SchemaRegistryClient;
  replicationFactor: number;
  withAdmin<T>(fn: (admin: BrokerAdmin) => Promise<T>): Promise<T>;
  createProducer(): Promise<BrokerProducer>;
  createConsumer(groupId: string, maxHistoryRead: number): Promise<BrokerConsumer>;
  sleep(ms: number): Promise<void>;
  /** Written to private_origin */
  pid: number;
}

/** Wall-clock seconds with sub-millisecond resolution */
export const wallClock: Clock = () => (performance.timeOrigin + performance.now()) / 1000;

export interface KafkaEnvironmentOptions {
  noWaitAck?: boolean;
  logger?: Logger;
  config?: BusBenchConfig;
}

export function createKafkaEnvironment(options: KafkaEnvironmentOptions = {}): BenchEnvironment {
  const config = options.config ?? loadConfig();
  const logger = options.logger ?? createLogger('busbench');
  const kafkaConfig = getKafkaConfig({ noWaitAck: options.noWaitAck });
  const factory = new KafkaClientFactory(kafkaConfig, logger);

  return {
    config,
    logger,
    clock: wallClock,
    registry: new ConfluentRegistryClient(config.registry.url),
    replicationFactor: kafkaConfig.replicationFactor,
    withAdmin: (fn) => factory.withAdmin(fn),
    createProducer: () => factory.createProducer(),
    createConsumer: (groupId, maxHistoryRead) => factory.createConsumer(groupId, maxHistoryRead),
    sleep,
    pid: process.pid,
  };
}

// ============================================================================
// Shared Startup
// ============================================================================

function loadTopics(env: BenchEnvironment, componentName: string, logicalNames: string[]): TopicDescriptor[] {
  const component = loadComponent(componentName, {
    componentsDir: env.config.run.componentsDir,
    topicNamespace: env.config.run.topicNamespace,
  });
  env.logger.debug({ component: component.name, topics: [...component.topics.keys()] }, 'Loaded component');
  return logicalNames.map((name) => getTopic(component, name));
}

async function provision(env: BenchEnvironment, topics: TopicDescriptor[], partitions: number): Promise<void> {
  await env.withAdmin((admin) =>
    new TopicProvisioner(admin, env.logger).ensureTopics(
      topics.map((topic) => topic.wireName),
      {
        partitions,
        replicationFactor: env.replicationFactor,
        listTopicsTimeoutMs: env.config.run.listTopicsTimeoutMs,
      }
    )
  );
}

function checkPartitions(partitions: number): void {
  if (!Number.isInteger(partitions) || partitions < 1) {
    throw new ConfigurationError(`Invalid partition count ${partitions}`);
  }
}

// ============================================================================
// Produce
// ============================================================================

export interface ProduceOptions {
  component: string;
  topic: string;
  count: number;
  index: number;
  validation: string;
  partitions?: number;
}

export async function runProduce(options: ProduceOptions, env: BenchEnvironment): Promise<ProducerReport> {
  const validation = parseValidationStrategy(options.validation);
  const partitions = options.partitions ?? 1;
  checkPartitions(partitions);

  const [topic] = loadTopics(env, options.component, [options.topic]);
  if (!topic) {
    throw new ConfigurationError('No topic requested');
  }
  const pipeline = new ProducerPipeline(topic, {
    count: options.count,
    index: options.index,
    validation,
    origin: env.pid,
  });

  await provision(env, [topic], partitions);
  const registration = await new SchemaRegistrar(env.registry, env.logger).register(topic);

  const producer = await env.createProducer();
  const lane = new ClientLane(producer, { name: 'producer-lane' });
  let report: ProducerReport;
  try {
    report = await pipeline.run({
      registration,
      registry: env.registry,
      writer: new WriteBridge(lane, { flushTimeoutMs: env.config.run.flushTimeoutMs }),
      clock: env.clock,
      logger: env.logger,
    });
  } finally {
    await lane.close();
    await producer.disconnect();
  }

  // Lets a reader started alongside finish before this process exits
  await env.sleep(env.config.run.finalDelayMs);
  return report;
}

// ============================================================================
// Consume
// ============================================================================

export interface ConsumeOptions {
  component: string;
  topics: string[];
  count: number;
  time: boolean;
  maxHistoryRead: number;
  partitions: number;
  postProcess: string;
  onMessage?: (message: ConsumedMessage) => void;
}

export async function runConsume(options: ConsumeOptions, env: BenchEnvironment): Promise<ConsumerReport> {
  const postProcess = parsePostProcessStrategy(options.postProcess);
  if (options.time && options.count === 1) {
    throw new ConfigurationError('Timing needs more than one message');
  }
  if (!Number.isInteger(options.maxHistoryRead) || options.maxHistoryRead < 0) {
    throw new ConfigurationError(`Invalid max history read ${options.maxHistoryRead}`);
  }
  checkPartitions(options.partitions);

  const topics = loadTopics(env, options.component, [...new Set(options.topics)]);
  const pipeline = new ConsumerPipeline(topics, {
    count: options.count,
    postProcess,
    onMessage: options.time ? undefined : options.onMessage,
  });

  await provision(env, topics, options.partitions);
  const registrations = await new SchemaRegistrar(env.registry, env.logger).registerAll(topics);

  const groupId = `busbench-${uuidv4()}`;
  const consumer = await env.createConsumer(groupId, options.maxHistoryRead);
  const lane = new ClientLane(consumer, { name: 'consumer-lane' });
  const reader = new ReadBridge(lane, { pollTimeoutMs: env.config.run.pollTimeoutMs });

  try {
    await lane.run((client) => client.subscribe(pipeline.wireNames));
    return await pipeline.run({
      registrations,
      registry: env.registry,
      reader,
      clock: env.clock,
      logger: env.logger,
    });
  } finally {
    reader.close();
    await lane.close();
    await consumer.disconnect();
  }
}

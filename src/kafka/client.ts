/**
 * kafkajs Adapters
 *
 * Implementations of the admin and data-plane ports on top of kafkajs.
 * The consumer side turns kafkajs' push-based eachMessage loop into poll().
 */

import {
  ConfigResourceTypes,
  type Admin,
  type Consumer,
  type IMemberAssignment,
  type Producer,
} from 'kafkajs';
import type { Logger } from 'pino';

import { describeError } from '../lib/errors.js';
import { withTimeout } from '../lib/timeout.js';
import type { BrokerMessage, DeliveryCallback } from '../types.js';
import type { BrokerConsumer, BrokerProducer } from './bridge.js';
import type { BrokerAdmin, NewTopicSpec, TopicError, TopicResults } from './provisioner.js';

const UNKNOWN_TOPIC_OR_PARTITION = 3;

// ============================================================================
// Error Helpers
// ============================================================================

function toTopicError(error: unknown): TopicError {
  let unknownTopic = false;
  if (typeof error === 'object' && error !== null) {
    if ('type' in error && error.type === 'UNKNOWN_TOPIC_OR_PARTITION') unknownTopic = true;
    if ('code' in error && error.code === UNKNOWN_TOPIC_OR_PARTITION) unknownTopic = true;
  }
  return { unknownTopic, message: describeError(error) };
}

/**
 * Per-topic errors carried by a kafkajs aggregate error (createTopics)
 */
function topicErrorsOf(error: unknown): { topic: string; error: TopicError }[] {
  if (typeof error !== 'object' || error === null || !('errors' in error)) return [];
  if (!Array.isArray(error.errors)) return [];

  const result: { topic: string; error: TopicError }[] = [];
  for (const item of error.errors) {
    if (typeof item === 'object' && item !== null && 'topic' in item && typeof item.topic === 'string') {
      result.push({ topic: item.topic, error: toTopicError(item) });
    }
  }
  return result;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

// ============================================================================
// Admin
// ============================================================================

export type KafkaAdmin = Pick<Admin, 'describeConfigs' | 'listTopics' | 'createTopics'>;

export class KafkaAdminClient implements BrokerAdmin {
  constructor(private readonly admin: KafkaAdmin) {}

  async describeConfigs(names: string[]): Promise<TopicResults> {
    // One request per topic: kafkajs fails the whole request on the first bad resource
    const entries = await Promise.all(
      names.map(async (name): Promise<[string, TopicError | null]> => {
        try {
          const response = await this.admin.describeConfigs({
            resources: [{ type: ConfigResourceTypes.TOPIC, name }],
            includeSynonyms: false,
          });
          const resource = response.resources[0];
          if (resource && resource.errorCode !== 0) {
            return [
              name,
              {
                unknownTopic: resource.errorCode === UNKNOWN_TOPIC_OR_PARTITION,
                message: resource.errorMessage || `error code ${resource.errorCode}`,
              },
            ];
          }
          return [name, null];
        } catch (error) {
          return [name, toTopicError(error)];
        }
      })
    );
    return new Map(entries);
  }

  async listTopics(timeoutMs: number): Promise<string[]> {
    return withTimeout(
      this.admin.listTopics(),
      timeoutMs,
      () => new Error(`listTopics timed out after ${timeoutMs}ms`)
    );
  }

  async createTopics(specs: NewTopicSpec[]): Promise<TopicResults> {
    const results: TopicResults = new Map(specs.map((spec) => [spec.name, null]));

    try {
      await this.admin.createTopics({
        waitForLeaders: true,
        topics: specs.map((spec) => ({
          topic: spec.name,
          numPartitions: spec.partitions,
          replicationFactor: spec.replicationFactor,
        })),
      });
    } catch (error) {
      const perTopic = topicErrorsOf(error);
      if (perTopic.length === 0) {
        const shared = toTopicError(error);
        for (const spec of specs) results.set(spec.name, shared);
      } else {
        for (const entry of perTopic) results.set(entry.topic, entry.error);
      }
    }

    return results;
  }
}

// ============================================================================
// Producer
// ============================================================================

export type KafkaProducer = Pick<Producer, 'send' | 'disconnect'>;

export class KafkaProducerClient implements BrokerProducer {
  private readonly inFlight = new Set<Promise<void>>();

  constructor(
    private readonly producer: KafkaProducer,
    private readonly acks: 0 | 1 = 1
  ) {}

  produce(topic: string, value: Buffer, onDelivery: DeliveryCallback): void {
    const sent: Promise<void> = this.producer
      .send({ topic, acks: this.acks, messages: [{ value }] })
      .then(
        (metadata) => {
          const first = metadata[0];
          onDelivery(null, {
            topic,
            partition: first?.partition ?? -1,
            offset: first?.offset ?? first?.baseOffset,
          });
        },
        (error: unknown) => onDelivery(toError(error), null)
      )
      .finally(() => this.inFlight.delete(sent));

    this.inFlight.add(sent);
  }

  async flush(timeoutMs: number): Promise<void> {
    if (this.inFlight.size === 0) return;
    await withTimeout(
      Promise.all([...this.inFlight]),
      timeoutMs,
      () => new Error(`flush timed out after ${timeoutMs}ms`)
    );
  }

  async disconnect(): Promise<void> {
    await this.producer.disconnect();
  }
}

// ============================================================================
// Consumer
// ============================================================================

interface HandoffEntry<T> {
  item: T;
  release: () => void;
}

/**
 * Hands items from a pushing producer to a polling taker. offer() resolves
 * only once the item has been taken, which holds the pusher back.
 */
export class MessageHandoff<T> {
  private readonly entries: HandoffEntry<T>[] = [];
  private waiter: ((entry: HandoffEntry<T> | null) => void) | null = null;
  private closed = false;

  get size(): number {
    return this.entries.length;
  }

  offer(item: T): Promise<void> {
    if (this.closed) return Promise.resolve();

    return new Promise<void>((release) => {
      const entry = { item, release: () => release() };
      const waiter = this.waiter;
      if (waiter) {
        this.waiter = null;
        waiter(entry);
      } else {
        this.entries.push(entry);
      }
    });
  }

  async take(timeoutMs: number): Promise<T | null> {
    const queued = this.entries.shift();
    if (queued) {
      queued.release();
      return queued.item;
    }
    if (this.closed) return null;

    const entry = await new Promise<HandoffEntry<T> | null>((resolve) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        resolve(null);
      }, timeoutMs);
      this.waiter = (next) => {
        clearTimeout(timer);
        resolve(next);
      };
    });

    if (!entry) return null;
    entry.release();
    return entry.item;
  }

  close(): void {
    this.closed = true;
    for (const entry of this.entries.splice(0)) entry.release();
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.(null);
  }
}

/**
 * First offset to read so that at most maxHistory earlier messages are replayed
 */
export function historyStartOffset(low: string, high: string, maxHistory: number): string {
  const start = BigInt(high) - BigInt(maxHistory);
  const floor = BigInt(low);
  return (start > floor ? start : floor).toString();
}

export interface KafkaConsumerClientOptions {
  /** 0 starts at the latest offset; otherwise replay up to this many messages per partition */
  maxHistoryRead: number;
  logger: Logger;
}

export type KafkaConsumer = Pick<Consumer, 'subscribe' | 'run' | 'seek' | 'disconnect'>;

export type KafkaOffsetsAdmin = Pick<Admin, 'fetchTopicOffsets' | 'disconnect'>;

/** Start offset per topic, then per partition */
type HistoryStarts = Map<string, Map<number, string>>;

/**
 * Consumer port on kafkajs. The owner forwards the consumer's CRASH and
 * GROUP_JOIN events to handleCrash() and handleGroupJoin().
 */
export class KafkaConsumerClient implements BrokerConsumer {
  private readonly handoff = new MessageHandoff<BrokerMessage>();
  private readonly logger: Logger;
  private historyStarts: HistoryStarts | null = null;
  private historyApplied = false;

  constructor(
    private readonly consumer: KafkaConsumer,
    private readonly admin: KafkaOffsetsAdmin,
    private readonly options: KafkaConsumerClientOptions
  ) {
    this.logger = options.logger.child({ component: 'consumer-client' });
  }

  async subscribe(topics: string[]): Promise<void> {
    // Watermarks are read before the group is joined so the seek can happen
    // inside the join handler, ahead of the first fetch
    if (this.options.maxHistoryRead > 0) {
      this.historyStarts = await this.loadHistoryStarts(topics);
    }

    await this.consumer.subscribe({ topics, fromBeginning: false });
    await this.consumer.run({
      eachMessage: async ({ topic, partition, message }) => {
        await this.handoff.offer({ topic, partition, offset: message.offset, value: message.value });
      },
    });
    this.logger.info({ topics }, 'Subscribed');
  }

  poll(timeoutMs: number): Promise<BrokerMessage | null> {
    return this.handoff.take(timeoutMs);
  }

  async disconnect(): Promise<void> {
    this.handoff.close();
    await this.consumer.disconnect();
    await this.admin.disconnect();
  }

  handleCrash(error: Error): void {
    this.fail('*', `consumer crashed: ${error.message}`);
  }

  /**
   * Seek every assigned partition to its history start. Runs synchronously,
   * once, on the first join.
   */
  handleGroupJoin(assignment: IMemberAssignment): void {
    const starts = this.historyStarts;
    if (!starts || this.historyApplied) return;
    this.historyApplied = true;

    for (const [topic, partitions] of Object.entries(assignment)) {
      const byPartition = starts.get(topic);
      if (!byPartition) continue;
      for (const partition of partitions) {
        const offset = byPartition.get(partition);
        if (offset === undefined) continue;
        this.consumer.seek({ topic, partition, offset });
        this.logger.debug({ topic, partition, offset }, 'Seeking for history');
      }
    }
  }

  private fail(topic: string, reason: string): void {
    this.logger.error({ topic, reason }, 'Consumer error');
    void this.handoff.offer({ topic, partition: -1, offset: '-1', value: null, error: reason });
  }

  private async loadHistoryStarts(topics: string[]): Promise<HistoryStarts> {
    const starts: HistoryStarts = new Map();
    for (const topic of topics) {
      const offsets = await this.admin.fetchTopicOffsets(topic);
      starts.set(
        topic,
        new Map<number, string>(
          offsets.map((entry) => [
            entry.partition,
            historyStartOffset(entry.low, entry.high, this.options.maxHistoryRead),
          ])
        )
      );
    }
    return starts;
  }
}

/**
 * Consumer Pipeline
 *
 * Reads messages in broker order, stamps their receive time and tracks the
 * send-to-receive delay. A count of 0 reads until the process is stopped.
 */

import type { Logger } from 'pino';

import { ConfigurationError, MessageError, describeError } from '../lib/errors.js';
import { resolveFields } from '../metadata/schema.js';
import type { DecodedMessage, SchemaRegistryClient } from '../registry/client.js';
import {
  RESERVED_FIELDS,
  type BrokerMessage,
  type Clock,
  type ConsumerReport,
  type FieldMap,
  type SchemaRegistration,
  type TopicDescriptor,
} from '../types.js';
import { DelayStats, messagesPerSecond } from './stats.js';
import {
  createPostProcessor,
  type PostProcessStrategy,
  type PostProcessor,
  type Processed,
} from './strategies.js';

export interface MessageReader {
  read(): Promise<BrokerMessage>;
}

export interface ConsumedMessage {
  /** 1-based position in this run */
  index: number;
  topic: TopicDescriptor;
  data: FieldMap;
  processed: Processed;
  delaySeconds: number;
}

export interface ConsumerPipelineOptions {
  /** 0 means no limit */
  count: number;
  postProcess: PostProcessStrategy;
  onMessage?: (message: ConsumedMessage) => void;
}

export interface ConsumerRunContext {
  /** Keyed by wire topic name */
  registrations: ReadonlyMap<string, SchemaRegistration>;
  registry: SchemaRegistryClient;
  reader: MessageReader;
  clock: Clock;
  logger: Logger;
}

interface TopicRoute {
  topic: TopicDescriptor;
  processor: PostProcessor;
}

export class ConsumerPipeline {
  private readonly options: ConsumerPipelineOptions;
  private readonly routes = new Map<string, TopicRoute>();

  constructor(topics: readonly TopicDescriptor[], options: ConsumerPipelineOptions) {
    if (topics.length === 0) {
      throw new ConfigurationError('At least one topic is required');
    }
    if (!Number.isInteger(options.count) || options.count < 0) {
      throw new ConfigurationError(`Invalid message count ${options.count}`);
    }

    this.options = options;
    for (const topic of topics) {
      // Not every post-processor reads the fields; unsupported types still fail here
      resolveFields(topic);
      this.routes.set(topic.wireName, {
        topic,
        processor: createPostProcessor(options.postProcess, topic),
      });
    }
  }

  get wireNames(): string[] {
    return [...this.routes.keys()];
  }

  async run(context: ConsumerRunContext): Promise<ConsumerReport> {
    const { registrations, registry, reader, clock } = context;
    const logger = context.logger.child({ component: 'consumer' });
    const stats = new DelayStats();
    const mismatched = new Set<string>();
    const limit = this.options.count;

    logger.info({ topics: this.wireNames, count: limit, postProcess: this.options.postProcess }, 'Reading');

    let received = 0;
    let start: number | undefined;

    for (;;) {
      const message = await reader.read();
      const route = this.routes.get(message.topic);
      if (!route) {
        throw new MessageError(message.topic, 'message from a topic that was not subscribed');
      }
      if (!message.value) {
        throw new MessageError(message.topic, 'empty payload', { offset: message.offset });
      }

      let decoded: DecodedMessage;
      try {
        decoded = await registry.decode(message.value);
      } catch (error) {
        throw new MessageError(message.topic, `decode failed: ${describeError(error)}`, {
          partition: message.partition,
          offset: message.offset,
        });
      }

      const data = decoded.message;
      const rcvStamp = clock();
      data[RESERVED_FIELDS.rcvStamp] = rcvStamp;

      const sndStamp = data[RESERVED_FIELDS.sndStamp];
      if (typeof sndStamp !== 'number') {
        throw new MessageError(message.topic, `missing ${RESERVED_FIELDS.sndStamp}`, { offset: message.offset });
      }
      const delaySeconds = rcvStamp - sndStamp;
      stats.add(delaySeconds);

      const expected = registrations.get(message.topic);
      if (expected && expected.schemaId !== decoded.schemaId && !mismatched.has(message.topic)) {
        mismatched.add(message.topic);
        logger.warn(
          { topic: message.topic, expected: expected.schemaId, actual: decoded.schemaId },
          'Message written with a different schema'
        );
      }

      const processed = route.processor.apply(data);
      received++;
      this.options.onMessage?.({ index: received, topic: route.topic, data, processed, delaySeconds });

      if (limit > 0 && received >= limit) break;
      // Timing starts once the first message is fully processed
      if (received === 1) start = clock();
    }

    const elapsedSeconds = start === undefined ? 0 : clock() - start;
    const report: ConsumerReport = {
      topics: this.wireNames,
      count: received,
      elapsedSeconds,
      messagesPerSecond: messagesPerSecond(received - 1, elapsedSeconds),
      delay: stats.summary(),
    };
    return report;
  }
}

/**
 * Producer Pipeline
 *
 * Publishes N copies of the synthetic record for one topic, one at a time,
 * and measures throughput from the first dispatch to the last ack.
 */

import type { Logger } from 'pino';

import { ConfigurationError, ValidationError } from '../lib/errors.js';
import type { SchemaRegistryClient } from '../registry/client.js';
import {
  RESERVED_FIELDS,
  type Clock,
  type DeliveryReport,
  type FieldMap,
  type ProducerReport,
  type SchemaRegistration,
  type TopicDescriptor,
} from '../types.js';
import { messagesPerSecond } from './stats.js';
import { createValidator, type ValidationStrategy, type Validator } from './strategies.js';
import { deriveSyntheticData } from './synthetic.js';

export interface MessageWriter {
  publish(topic: string, value: Buffer): Promise<DeliveryReport>;
}

export interface ProducerPipelineOptions {
  count: number;
  /** Written to private_index for indexed components */
  index: number;
  validation: ValidationStrategy;
  /** Written to private_origin */
  origin: number;
}

export interface ProducerRunContext {
  registration: SchemaRegistration;
  registry: SchemaRegistryClient;
  writer: MessageWriter;
  clock: Clock;
  logger: Logger;
}

export class ProducerPipeline {
  readonly topic: TopicDescriptor;
  private readonly options: ProducerPipelineOptions;
  private readonly baseData: FieldMap;
  private readonly validator: Validator;

  /**
   * Derives the synthetic record and compiles the validator; both fail with
   * a ConfigurationError before anything touches the network.
   */
  constructor(topic: TopicDescriptor, options: ProducerPipelineOptions) {
    if (!Number.isInteger(options.count) || options.count < 0) {
      throw new ConfigurationError(`Invalid message count ${options.count}`);
    }
    this.topic = topic;
    this.options = options;
    this.baseData = deriveSyntheticData(topic);
    this.validator = createValidator(options.validation, topic);

    this.baseData[RESERVED_FIELDS.identity] = topic.isIndexed
      ? `${topic.componentName}:${options.index}`
      : topic.componentName;
    this.baseData[RESERVED_FIELDS.origin] = options.origin;
  }

  /** A copy of the record every message starts from */
  get syntheticData(): FieldMap {
    return { ...this.baseData };
  }

  async run(context: ProducerRunContext): Promise<ProducerReport> {
    const { registration, registry, writer, clock } = context;
    const logger = context.logger.child({ component: 'producer', topic: this.topic.wireName });
    const data: FieldMap = { ...this.baseData };

    logger.info(
      { count: this.options.count, validation: this.validator.kind, schemaId: registration.schemaId },
      'Publishing'
    );

    const start = clock();
    for (let seqNum = 1; seqNum <= this.options.count; seqNum++) {
      data[RESERVED_FIELDS.seqNum] = seqNum;
      if (this.topic.isIndexed) {
        data[RESERVED_FIELDS.index] = this.options.index;
      }
      data[RESERVED_FIELDS.sndStamp] = clock();

      let payload: FieldMap;
      try {
        payload = this.validator.apply(data);
      } catch (error) {
        logger.error({ err: error, seqNum }, 'Validation failed');
        if (error instanceof ValidationError) {
          throw new ValidationError(`${error.message} (message ${seqNum})`, { ...error.details, seqNum });
        }
        throw error;
      }

      const value = await registry.encode(registration.schemaId, payload);
      await writer.publish(this.topic.wireName, value);
    }
    const elapsedSeconds = clock() - start;

    const report: ProducerReport = {
      topic: this.topic.wireName,
      count: this.options.count,
      elapsedSeconds,
      messagesPerSecond: messagesPerSecond(this.options.count, elapsedSeconds),
    };
    logger.info(report, `Wrote ${report.messagesPerSecond.toFixed(1)} messages/second`);
    return report;
  }
}

/**
 * Schema Registrar
 *
 * Registers each topic's Avro schema once, before any traffic, and hands out
 * the resulting schema ids for the rest of the run.
 */

import type { Logger } from 'pino';

import { NotFoundError, RegistryError } from '../lib/errors.js';
import { makeAvroSchema } from '../metadata/schema.js';
import type { SchemaRegistration, TopicDescriptor } from '../types.js';
import type { SchemaRegistryClient } from './client.js';

export class SchemaRegistrar {
  private readonly registry: SchemaRegistryClient;
  private readonly logger: Logger;
  private readonly bySubject = new Map<string, SchemaRegistration>();

  constructor(registry: SchemaRegistryClient, logger: Logger) {
    this.registry = registry;
    this.logger = logger.child({ component: 'registrar' });
  }

  /**
   * Register one topic's schema; repeated calls for the same subject reuse
   * the first registration
   */
  async register(topic: TopicDescriptor): Promise<SchemaRegistration> {
    const cached = this.bySubject.get(topic.subject);
    if (cached) return cached;

    const schema = makeAvroSchema(topic);
    let schemaId: number;
    try {
      schemaId = await this.registry.register(schema, topic.subject);
    } catch (error) {
      throw new RegistryError(topic.subject, error);
    }

    const registration = { subject: topic.subject, schemaId };
    this.bySubject.set(topic.subject, registration);
    this.logger.info(registration, 'Registered schema');
    return registration;
  }

  /**
   * Register topics one after another, keyed by wire name
   */
  async registerAll(topics: readonly TopicDescriptor[]): Promise<Map<string, SchemaRegistration>> {
    const registrations = new Map<string, SchemaRegistration>();
    for (const topic of topics) {
      registrations.set(topic.wireName, await this.register(topic));
    }
    return registrations;
  }

  get(topic: TopicDescriptor): SchemaRegistration {
    const registration = this.bySubject.get(topic.subject);
    if (!registration) {
      throw new NotFoundError('Schema registration', topic.subject);
    }
    return registration;
  }
}

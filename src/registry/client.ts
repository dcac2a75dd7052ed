/**
 * Schema Registry Client
 *
 * Port used by the registrar and the pipelines, plus its implementation on
 * the Confluent schema registry (Avro, Confluent wire format).
 */

import { SchemaRegistry, SchemaType } from '@kafkajs/confluent-schema-registry';

import type { AvroRecordSchema } from '../metadata/schema.js';
import type { FieldMap, FieldValue } from '../types.js';

export interface DecodedMessage {
  schemaId: number;
  message: FieldMap;
}

export interface SchemaRegistryClient {
  /** Idempotent: the same schema under the same subject yields the same id */
  register(schema: AvroRecordSchema, subject: string): Promise<number>;
  encode(schemaId: number, data: FieldMap): Promise<Buffer>;
  decode(buffer: Buffer): Promise<DecodedMessage>;
}

// ============================================================================
// Wire Format
// ============================================================================

const MAGIC_BYTE = 0;
const HEADER_LENGTH = 5;

/**
 * Schema id from a Confluent-framed payload: magic byte, then a big-endian int32
 */
export function readSchemaId(buffer: Buffer): number {
  if (buffer.length < HEADER_LENGTH || buffer[0] !== MAGIC_BYTE) {
    throw new Error('Payload is not in the schema registry wire format');
  }
  return buffer.readInt32BE(1);
}

export function frameHeader(schemaId: number): Buffer {
  const header = Buffer.alloc(HEADER_LENGTH);
  header.writeUInt8(MAGIC_BYTE, 0);
  header.writeInt32BE(schemaId, 1);
  return header;
}

// ============================================================================
// Decoded Value Checks
// ============================================================================

function isScalar(value: unknown): value is boolean | number | string {
  return typeof value === 'boolean' || typeof value === 'number' || typeof value === 'string';
}

export function isFieldValue(value: unknown): value is FieldValue {
  if (isScalar(value)) return true;
  if (!Array.isArray(value)) return false;
  if (value.length === 0) return true;
  const kind = typeof value[0];
  return isScalar(value[0]) && value.every((item) => typeof item === kind);
}

export function toFieldMap(value: unknown): FieldMap {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new Error('Decoded payload is not a record');
  }
  const result: FieldMap = {};
  for (const [name, field] of Object.entries(value)) {
    if (!isFieldValue(field)) {
      throw new Error(`Decoded field ${name} has an unsupported value`);
    }
    result[name] = field;
  }
  return result;
}

// ============================================================================
// Confluent Registry
// ============================================================================

export class ConfluentRegistryClient implements SchemaRegistryClient {
  private readonly registry: SchemaRegistry;

  constructor(url: string) {
    this.registry = new SchemaRegistry({ host: url });
  }

  async register(schema: AvroRecordSchema, subject: string): Promise<number> {
    const { id } = await this.registry.register(
      { type: SchemaType.AVRO, schema: JSON.stringify(schema) },
      { subject }
    );
    return id;
  }

  encode(schemaId: number, data: FieldMap): Promise<Buffer> {
    return this.registry.encode(schemaId, data);
  }

  async decode(buffer: Buffer): Promise<DecodedMessage> {
    const schemaId = readSchemaId(buffer);
    const decoded: unknown = await this.registry.decode(buffer);
    return { schemaId, message: toFieldMap(decoded) };
  }
}

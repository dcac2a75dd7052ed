/**
 * Topic Schemas
 *
 * Everything derived from a topic's field list: the Avro wire schema, the
 * default instance, the custom validator and the two structured-record
 * representations (a generated class and a zod model).
 */

import { z } from 'zod';

import { ConfigurationError, InvalidFieldError, UnsupportedFieldTypeError } from '../lib/errors.js';
import {
  RESERVED_FIELDS,
  isScalarType,
  type FieldDescriptor,
  type FieldMap,
  type FieldValue,
  type ScalarType,
  type TopicDescriptor,
} from '../types.js';

// ============================================================================
// Types
// ============================================================================

/** float fields are carried as Avro double */
type AvroPrimitive = 'boolean' | 'int' | 'long' | 'double' | 'string';

export interface AvroArray {
  type: 'array';
  items: AvroPrimitive;
}

export interface AvroField {
  name: string;
  type: AvroPrimitive | AvroArray;
  default: FieldValue;
  doc?: string;
}

export interface AvroRecordSchema {
  type: 'record';
  name: string;
  namespace: string;
  fields: AvroField[];
}

/** A field with its type resolved against the supported scalar set */
export interface ResolvedField {
  name: string;
  type: ScalarType;
  count?: number;
  default: FieldValue;
  description?: string;
}

export interface DataRecord {
  readonly [field: string]: FieldValue;
}

export type DataClass = new (data: Readonly<FieldMap>) => DataRecord;

export type ZodModel = z.ZodType<FieldMap, z.ZodTypeDef, unknown>;

type FieldSchema = z.ZodType<FieldValue, z.ZodTypeDef, unknown>;

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

const AVRO_TYPES: Record<ScalarType, AvroPrimitive> = {
  boolean: 'boolean',
  int: 'int',
  long: 'long',
  float: 'double',
  double: 'double',
  string: 'string',
};

const SCALAR_DEFAULTS: Record<ScalarType, boolean | number | string> = {
  boolean: false,
  int: 0,
  long: 0,
  float: 0,
  double: 0,
  string: '',
};

// ============================================================================
// Field Resolution
// ============================================================================

function reservedFields(topic: TopicDescriptor): ResolvedField[] {
  const fields: ResolvedField[] = [
    { name: RESERVED_FIELDS.sndStamp, type: 'double', default: 0, description: 'Time of publication (s)' },
    { name: RESERVED_FIELDS.rcvStamp, type: 'double', default: 0, description: 'Time of receipt (s)' },
    { name: RESERVED_FIELDS.seqNum, type: 'long', default: 0, description: 'Sequence number' },
    { name: RESERVED_FIELDS.identity, type: 'string', default: '', description: 'Publisher identity' },
    { name: RESERVED_FIELDS.origin, type: 'long', default: 0, description: 'Publisher process id' },
  ];
  if (topic.isIndexed) {
    fields.push({ name: RESERVED_FIELDS.index, type: 'long', default: 0, description: 'Component index' });
  }
  return fields;
}

function defaultFor(type: ScalarType, field: FieldDescriptor): FieldValue {
  if (field.default !== undefined) {
    return field.default;
  }
  const scalar = SCALAR_DEFAULTS[type];
  if (field.count === undefined) {
    return scalar;
  }
  switch (type) {
    case 'boolean':
      return new Array<boolean>(field.count).fill(false);
    case 'string':
      return new Array<string>(field.count).fill('');
    default:
      return new Array<number>(field.count).fill(0);
  }
}

export function resolveField(topic: TopicDescriptor, field: FieldDescriptor): ResolvedField {
  if (!isScalarType(field.type)) {
    throw new UnsupportedFieldTypeError(topic.logicalName, field.name, field.type);
  }
  const resolved: ResolvedField = {
    name: field.name,
    type: field.type,
    count: field.count,
    default: defaultFor(field.type, field),
    description: field.description,
  };
  const problem = fieldProblem(resolved, resolved.default);
  if (problem) {
    throw new ConfigurationError(`Bad default for ${topic.logicalName}.${field.name}: ${problem}`);
  }
  return resolved;
}

/**
 * Reserved fields followed by the topic's own fields, in declaration order.
 * Throws UnsupportedFieldTypeError for any type outside the scalar set.
 */
export function resolveFields(topic: TopicDescriptor): ResolvedField[] {
  return [...reservedFields(topic), ...topic.fields.map((field) => resolveField(topic, field))];
}

// ============================================================================
// Avro
// ============================================================================

export function makeAvroSchema(topic: TopicDescriptor): AvroRecordSchema {
  return {
    type: 'record',
    name: topic.logicalName,
    namespace: topic.wireName.slice(0, topic.wireName.length - topic.logicalName.length - 1),
    fields: resolveFields(topic).map((field) => {
      const primitive = AVRO_TYPES[field.type];
      const avroField: AvroField = {
        name: field.name,
        type: field.count === undefined ? primitive : { type: 'array', items: primitive },
        default: field.default,
      };
      if (field.description) {
        avroField.doc = field.description;
      }
      return avroField;
    }),
  };
}

// ============================================================================
// Defaults
// ============================================================================

function copyValue(value: FieldValue): FieldValue {
  return Array.isArray(value) ? value.slice() : value;
}

export function makeDefaults(topic: TopicDescriptor): FieldMap {
  const defaults: FieldMap = {};
  for (const field of resolveFields(topic)) {
    defaults[field.name] = copyValue(field.default);
  }
  return defaults;
}

// ============================================================================
// Custom Validation
// ============================================================================

function scalarProblem(type: ScalarType, value: unknown): string | null {
  switch (type) {
    case 'boolean':
      return typeof value === 'boolean' ? null : `expected boolean, got ${typeof value}`;
    case 'int':
      if (typeof value !== 'number' || !Number.isInteger(value)) return 'expected an integer';
      return value < INT32_MIN || value > INT32_MAX ? `${value} out of int32 range` : null;
    case 'long':
      return typeof value === 'number' && Number.isSafeInteger(value) ? null : 'expected a safe integer';
    case 'float':
    case 'double':
      return typeof value === 'number' ? null : `expected number, got ${typeof value}`;
    case 'string':
      return typeof value === 'string' ? null : `expected string, got ${typeof value}`;
  }
}

function fieldProblem(field: ResolvedField, value: unknown): string | null {
  if (field.count === undefined) {
    return Array.isArray(value) ? 'expected a scalar, got an array' : scalarProblem(field.type, value);
  }
  if (!Array.isArray(value)) {
    return `expected an array of ${field.count}`;
  }
  if (value.length !== field.count) {
    return `expected ${field.count} elements, got ${value.length}`;
  }
  for (let i = 0; i < value.length; i++) {
    const problem = scalarProblem(field.type, value[i]);
    if (problem) return `[${i}] ${problem}`;
  }
  return null;
}

export type FieldValidator = (data: Readonly<FieldMap>) => void;

/**
 * Build the custom validator for a topic. The returned function throws
 * InvalidFieldError on the first bad or unknown field and never mutates data.
 */
export function makeValidator(topic: TopicDescriptor): FieldValidator {
  const fields = new Map(resolveFields(topic).map((field) => [field.name, field]));

  return (data) => {
    for (const [name, value] of Object.entries(data)) {
      const field = fields.get(name);
      if (!field) {
        throw new InvalidFieldError(topic.logicalName, name, 'unknown field');
      }
      const problem = fieldProblem(field, value);
      if (problem) {
        throw new InvalidFieldError(topic.logicalName, name, problem);
      }
    }
  };
}

export function validateData(topic: TopicDescriptor, data: Readonly<FieldMap>): void {
  makeValidator(topic)(data);
}

// ============================================================================
// Structured Records
// ============================================================================

/**
 * Generate a record class for a topic. Construction rejects unexpected field
 * names and fills missing ones from the defaults; values are not type-checked.
 */
export function makeDataClass(topic: TopicDescriptor): DataClass {
  const defaults = makeDefaults(topic);
  const names = Object.keys(defaults);
  const known = new Set(names);
  const label = topic.logicalName;

  class TopicRecord {
    [field: string]: FieldValue;

    constructor(data: Readonly<FieldMap>) {
      for (const key of Object.keys(data)) {
        if (!known.has(key)) {
          throw new InvalidFieldError(label, key, 'unexpected field');
        }
      }
      for (const name of names) {
        this[name] = data[name] ?? defaults[name];
      }
    }
  }

  Object.defineProperty(TopicRecord, 'name', { value: topic.logicalName });
  return TopicRecord;
}

function numberSchema(type: 'int' | 'long' | 'float' | 'double'): z.ZodNumber {
  switch (type) {
    case 'int':
      return z.number().int().gte(INT32_MIN).lte(INT32_MAX);
    case 'long':
      return z.number().int();
    default:
      return z.number();
  }
}

function fieldSchema(field: ResolvedField): FieldSchema {
  const { type, count } = field;
  let schema: FieldSchema;
  switch (type) {
    case 'boolean':
      schema = count === undefined ? z.boolean() : z.array(z.boolean()).length(count);
      break;
    case 'string':
      schema = count === undefined ? z.string() : z.array(z.string()).length(count);
      break;
    default: {
      const number = numberSchema(type);
      schema = count === undefined ? number : z.array(number).length(count);
    }
  }
  return schema.default(field.default);
}

export function makeZodModel(topic: TopicDescriptor): ZodModel {
  const shape: Record<string, FieldSchema> = {};
  for (const field of resolveFields(topic)) {
    shape[field.name] = fieldSchema(field);
  }
  return z.object(shape);
}

/**
 * Synthetic Data
 *
 * Builds the base record the producer publishes: every topic field set to a
 * fixed non-default value for its type.
 */

import { makeDefaults, resolveField, type ResolvedField } from '../metadata/schema.js';
import type { FieldMap, FieldValue, TopicDescriptor } from '../types.js';

export const SYNTHETIC_STRING = 'a short string';

function syntheticScalar(field: ResolvedField): boolean | number | string {
  switch (field.type) {
    case 'boolean':
      return true;
    case 'int':
    case 'long':
      return 1;
    case 'float':
    case 'double':
      return 1.1;
    case 'string':
      return SYNTHETIC_STRING;
  }
}

export function syntheticValue(field: ResolvedField): FieldValue {
  if (field.count === undefined) {
    return syntheticScalar(field);
  }
  switch (field.type) {
    case 'boolean':
      return new Array<boolean>(field.count).fill(true);
    case 'string':
      return new Array<string>(field.count).fill(SYNTHETIC_STRING);
    default:
      return new Array<number>(field.count).fill(field.type === 'int' || field.type === 'long' ? 1 : 1.1);
  }
}

/**
 * Defaults for the reserved fields, synthetic values for the topic's own.
 * Throws UnsupportedFieldTypeError (a ConfigurationError) without touching
 * the network.
 */
export function deriveSyntheticData(topic: TopicDescriptor): FieldMap {
  const data = makeDefaults(topic);
  for (const field of topic.fields) {
    data[field.name] = syntheticValue(resolveField(topic, field));
  }
  return data;
}

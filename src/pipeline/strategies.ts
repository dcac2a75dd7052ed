/**
 * Materializers
 *
 * The producer's validation strategies and the consumer's post-processing
 * strategies. Each is picked once at startup and compiled per topic; a
 * strategy may reject or reshape a payload but never adds or drops messages.
 */

import { ConfigurationError, InvalidFieldError } from '../lib/errors.js';
import {
  makeDataClass,
  makeValidator,
  makeZodModel,
  type DataRecord,
  type ZodModel,
} from '../metadata/schema.js';
import type { FieldMap, FieldValue, TopicDescriptor } from '../types.js';

export const VALIDATION_STRATEGIES = [
  'none',
  'custom',
  'dataclass',
  'dataclass_and_decode',
  'zod',
  'zod_and_decode',
] as const;

export type ValidationStrategy = (typeof VALIDATION_STRATEGIES)[number];

export const POSTPROCESS_STRATEGIES = ['none', 'dataclass', 'zod', 'namespace'] as const;

export type PostProcessStrategy = (typeof POSTPROCESS_STRATEGIES)[number];

function parseStrategy<T extends string>(kind: string, allowed: readonly T[], name: string): T {
  const match = allowed.find((candidate) => candidate === name);
  if (match === undefined) {
    throw new ConfigurationError(`Unsupported ${kind} strategy "${name}"`, { allowed: [...allowed] });
  }
  return match;
}

export function parseValidationStrategy(name: string): ValidationStrategy {
  return parseStrategy('validation', VALIDATION_STRATEGIES, name);
}

export function parsePostProcessStrategy(name: string): PostProcessStrategy {
  return parseStrategy('post-processing', POSTPROCESS_STRATEGIES, name);
}

// ============================================================================
// Shared
// ============================================================================

function parseWithModel(model: ZodModel, topic: TopicDescriptor, data: FieldMap): FieldMap {
  const result = model.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new InvalidFieldError(
      topic.logicalName,
      issue ? issue.path.join('.') : '<record>',
      issue ? issue.message : 'invalid record'
    );
  }
  return result.data;
}

/**
 * Dynamically-typed attribute bag
 */
export class Namespace {
  [attribute: string]: FieldValue;

  constructor(data: Readonly<FieldMap>) {
    Object.assign(this, data);
  }
}

// ============================================================================
// Validation (producer)
// ============================================================================

export interface Validator {
  readonly kind: ValidationStrategy;
  /** Payload to serialize; throws ValidationError on a bad field */
  apply(data: FieldMap): FieldMap;
}

export function createValidator(kind: ValidationStrategy, topic: TopicDescriptor): Validator {
  switch (kind) {
    case 'none':
      return { kind, apply: (data) => data };

    case 'custom': {
      const validate = makeValidator(topic);
      return {
        kind,
        apply: (data) => {
          validate(data);
          return data;
        },
      };
    }

    case 'dataclass': {
      const TopicRecord = makeDataClass(topic);
      return {
        kind,
        apply: (data) => {
          new TopicRecord(data);
          return data;
        },
      };
    }

    case 'dataclass_and_decode': {
      const TopicRecord = makeDataClass(topic);
      return { kind, apply: (data) => ({ ...new TopicRecord(data) }) };
    }

    case 'zod': {
      const model = makeZodModel(topic);
      return {
        kind,
        apply: (data) => {
          parseWithModel(model, topic, data);
          return data;
        },
      };
    }

    case 'zod_and_decode': {
      const model = makeZodModel(topic);
      return { kind, apply: (data) => parseWithModel(model, topic, data) };
    }
  }
}

// ============================================================================
// Post-processing (consumer)
// ============================================================================

export type Processed = FieldMap | DataRecord | Namespace;

export interface PostProcessor {
  readonly kind: PostProcessStrategy;
  apply(data: FieldMap): Processed;
}

export function createPostProcessor(kind: PostProcessStrategy, topic: TopicDescriptor): PostProcessor {
  switch (kind) {
    case 'none':
      return { kind, apply: (data) => data };

    case 'dataclass': {
      const TopicRecord = makeDataClass(topic);
      return { kind, apply: (data) => new TopicRecord(data) };
    }

    case 'zod': {
      const model = makeZodModel(topic);
      return { kind, apply: (data) => parseWithModel(model, topic, data) };
    }

    case 'namespace':
      return { kind, apply: (data) => new Namespace(data) };
  }
}

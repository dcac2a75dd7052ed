/**
 * Component Metadata Loader
 *
 * Reads component definitions (one JSON file per component) and turns them
 * into immutable descriptors. This is the only place topic names are derived.
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';

import { ConfigurationError, NotFoundError, describeError } from '../lib/errors.js';
import type { ComponentDescriptor, FieldDescriptor, TopicDescriptor } from '../types.js';

// ============================================================================
// Definition File Schema
// ============================================================================

const fieldValueSchema = z.union([
  z.boolean(),
  z.number(),
  z.string(),
  z.array(z.boolean()),
  z.array(z.number()),
  z.array(z.string()),
]);

const fieldSchema = z.object({
  name: z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/),
  type: z.string().min(1),
  count: z.number().int().positive().optional(),
  default: fieldValueSchema.optional(),
  description: z.string().optional(),
  units: z.string().optional(),
});

const topicSchema = z.object({
  description: z.string().optional(),
  fields: z.array(fieldSchema),
});

const componentSchema = z.object({
  name: z.string().min(1),
  indexed: z.boolean().default(false),
  topics: z.record(topicSchema),
});

export type ComponentDefinition = z.infer<typeof componentSchema>;

export interface LoaderOptions {
  componentsDir: string;
  topicNamespace: string;
}

// ============================================================================
// Naming
// ============================================================================

export function wireTopicName(namespace: string, component: string, logicalName: string): string {
  return `${namespace}.${component}.${logicalName}`;
}

export function subjectName(wireName: string): string {
  return `${wireName}-value`;
}

// ============================================================================
// Loading
// ============================================================================

export function parseComponent(
  raw: unknown,
  options: Pick<LoaderOptions, 'topicNamespace'>
): ComponentDescriptor {
  const result = componentSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigurationError(
      `Invalid component definition at ${issue?.path.join('.') ?? '<root>'}: ${issue?.message ?? 'unknown'}`
    );
  }

  const definition = result.data;
  const topics = new Map<string, TopicDescriptor>();

  for (const [logicalName, topic] of Object.entries(definition.topics)) {
    const seen = new Set<string>();
    const fields: FieldDescriptor[] = [];

    for (const field of topic.fields) {
      if (field.name.startsWith('private_')) {
        throw new ConfigurationError(`Field name ${logicalName}.${field.name} uses the reserved prefix`);
      }
      if (seen.has(field.name)) {
        throw new ConfigurationError(`Duplicate field ${logicalName}.${field.name}`);
      }
      seen.add(field.name);
      fields.push(Object.freeze({ ...field }));
    }

    const wireName = wireTopicName(options.topicNamespace, definition.name, logicalName);
    topics.set(
      logicalName,
      Object.freeze({
        componentName: definition.name,
        logicalName,
        wireName,
        subject: subjectName(wireName),
        isIndexed: definition.indexed,
        fields: Object.freeze(fields),
      })
    );
  }

  return Object.freeze({
    name: definition.name,
    isIndexed: definition.indexed,
    topics,
  });
}

export function loadComponent(name: string, options: LoaderOptions): ComponentDescriptor {
  const path = join(options.componentsDir, `${name}.json`);

  let text: string;
  try {
    text = readFileSync(path, 'utf8');
  } catch (error) {
    throw new NotFoundError('Component', name, { path, reason: describeError(error) });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`Component file is not valid JSON: ${path}`, {
      reason: describeError(error),
    });
  }

  const component = parseComponent(raw, options);
  if (component.name !== name) {
    throw new ConfigurationError(`Component file ${path} defines "${component.name}", expected "${name}"`);
  }
  return component;
}

export function getTopic(component: ComponentDescriptor, logicalName: string): TopicDescriptor {
  const topic = component.topics.get(logicalName);
  if (!topic) {
    throw new NotFoundError('Topic', `${component.name}.${logicalName}`, {
      available: [...component.topics.keys()],
    });
  }
  return topic;
}

/**
 * busbench Core Types
 * Telemetry bus benchmarking harness
 */

// ============================================================================
// Field Values
// ============================================================================

export type ScalarValue = boolean | number | string;

export type FieldValue = ScalarValue | boolean[] | number[] | string[];

/** One decoded (or to-be-encoded) message, keyed by field name */
export type FieldMap = Record<string, FieldValue>;

/** Scalar types a topic field may carry */
export const SCALAR_TYPES = ['boolean', 'int', 'long', 'float', 'double', 'string'] as const;

export type ScalarType = (typeof SCALAR_TYPES)[number];

export function isScalarType(type: string): type is ScalarType {
  return SCALAR_TYPES.some((candidate) => candidate === type);
}

// ============================================================================
// Metadata
// ============================================================================

export interface FieldDescriptor {
  name: string;
  /** Raw type name as reported by the component definition */
  type: string;
  /** Fixed array length; absent for scalars */
  count?: number;
  default?: FieldValue;
  description?: string;
  units?: string;
}

export interface TopicDescriptor {
  componentName: string;
  /** Name used on the command line, e.g. evt_summaryState */
  logicalName: string;
  /** Broker-facing topic name */
  wireName: string;
  /** Schema registry subject */
  subject: string;
  isIndexed: boolean;
  fields: readonly FieldDescriptor[];
}

export interface ComponentDescriptor {
  name: string;
  isIndexed: boolean;
  topics: ReadonlyMap<string, TopicDescriptor>;
}

// ============================================================================
// Reserved Fields
// ============================================================================

export const RESERVED_FIELDS = {
  sndStamp: 'private_sndStamp',
  rcvStamp: 'private_rcvStamp',
  seqNum: 'private_seqNum',
  identity: 'private_identity',
  origin: 'private_origin',
  index: 'private_index',
} as const;

// ============================================================================
// Registry
// ============================================================================

export interface SchemaRegistration {
  subject: string;
  schemaId: number;
}

// ============================================================================
// Broker Data Plane
// ============================================================================

export interface BrokerMessage {
  topic: string;
  partition: number;
  offset: string;
  value: Buffer | null;
  /** Set when the broker client reports a per-message failure */
  error?: string;
}

export interface DeliveryReport {
  topic: string;
  partition: number;
  offset?: string;
}

export type DeliveryCallback = (error: Error | null, report: DeliveryReport | null) => void;

// ============================================================================
// Reports
// ============================================================================

export interface DelaySummary {
  count: number;
  mean: number;
  stdev: number;
  min: number;
  max: number;
}

export interface ProducerReport {
  topic: string;
  count: number;
  elapsedSeconds: number;
  messagesPerSecond: number;
}

export interface ConsumerReport {
  topics: string[];
  count: number;
  elapsedSeconds: number;
  messagesPerSecond: number;
  delay: DelaySummary;
}

/** Seconds since the epoch, as a float */
export type Clock = () => number;

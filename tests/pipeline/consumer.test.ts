/**
 * Consumer Pipeline Tests
 */

import { ReadBridge, type BrokerConsumer } from '../../src/kafka/bridge.js';
import { ClientLane } from '../../src/kafka/lane.js';
import { ConfigurationError, MessageError, UnsupportedFieldTypeError } from '../../src/lib/errors.js';
import { getTopic, loadComponent } from '../../src/metadata/loader.js';
import { makeDefaults } from '../../src/metadata/schema.js';
import { ConsumerPipeline, type ConsumedMessage, type ConsumerPipelineOptions } from '../../src/pipeline/consumer.js';
import { Namespace } from '../../src/pipeline/strategies.js';
import { SchemaRegistrar } from '../../src/registry/registrar.js';
import type { FieldMap, SchemaRegistration, TopicDescriptor } from '../../src/types.js';
import {
  FIXTURE_COMPONENTS_DIR,
  FakeBroker,
  FakeConsumer,
  InMemoryRegistry,
  ROOT_COMPONENTS_DIR,
  silentLogger,
  steppingClock,
} from '../helpers/fakes.js';

describe('ConsumerPipeline', () => {
  const test = loadComponent('Test', { componentsDir: ROOT_COMPONENTS_DIR, topicNamespace: 'telemetry' });
  const scalars = getTopic(test, 'evt_scalars');
  const arrays = getTopic(test, 'evt_arrays');

  let broker: FakeBroker;
  let registry: InMemoryRegistry;
  let registrations: Map<string, SchemaRegistration>;

  beforeEach(async () => {
    broker = new FakeBroker();
    registry = new InMemoryRegistry();
    registrations = await new SchemaRegistrar(registry, silentLogger()).registerAll([scalars, arrays]);
  });

  async function produce(topic: TopicDescriptor, seqNum: number, sndStamp: number): Promise<void> {
    const registration = registrations.get(topic.wireName);
    if (!registration) throw new Error(`no registration for ${topic.wireName}`);
    const data: FieldMap = {
      ...makeDefaults(topic),
      private_seqNum: seqNum,
      private_sndStamp: sndStamp,
    };
    broker.append(topic.wireName, await registry.encode(registration.schemaId, data));
  }

  async function consume(
    topics: TopicDescriptor[],
    options: ConsumerPipelineOptions,
    expected: Map<string, SchemaRegistration> = registrations
  ) {
    const pipeline = new ConsumerPipeline(topics, options);
    const consumer = new FakeConsumer(broker);
    await consumer.subscribe(pipeline.wireNames);
    const lane = new ClientLane<BrokerConsumer>(consumer);
    const reader = new ReadBridge(lane, { pollTimeoutMs: 5 });
    try {
      return await pipeline.run({
        registrations: expected,
        registry,
        reader,
        clock: steppingClock(2000, 0.25),
        logger: silentLogger(),
      });
    } finally {
      reader.close();
      await lane.close();
    }
  }

  it('should stop after count messages', async () => {
    for (let i = 1; i <= 5; i++) await produce(scalars, i, 1999);

    const seen: ConsumedMessage[] = [];
    const report = await consume([scalars], {
      count: 3,
      postProcess: 'none',
      onMessage: (message) => seen.push(message),
    });

    expect(report.count).toBe(3);
    expect(seen.map((message) => message.index)).toEqual([1, 2, 3]);
    expect(seen.map((message) => message.data['private_seqNum'])).toEqual([1, 2, 3]);
  });

  it('should time from the first processed message and track delays', async () => {
    for (let i = 1; i <= 3; i++) await produce(scalars, i, 1999);

    const report = await consume([scalars], { count: 3, postProcess: 'none' });

    // Clock reads: receive 1, start, receive 2, receive 3, end
    expect(report.topics).toEqual(['telemetry.Test.evt_scalars']);
    expect(report.elapsedSeconds).toBe(0.75);
    expect(report.messagesPerSecond).toBeCloseTo(2 / 0.75, 12);
    expect(report.delay.count).toBe(3);
    expect(report.delay.min).toBe(1);
    expect(report.delay.max).toBe(1.75);
    expect(report.delay.mean).toBeCloseTo((1 + 1.5 + 1.75) / 3, 12);
  });

  it('should stamp the receive time right after decoding', async () => {
    await produce(scalars, 1, 1999.5);

    const seen: ConsumedMessage[] = [];
    await consume([scalars], { count: 1, postProcess: 'none', onMessage: (message) => seen.push(message) });

    expect(seen[0]?.data['private_rcvStamp']).toBe(2000);
    expect(seen[0]?.delaySeconds).toBe(0.5);
  });

  it('should report no throughput for a single message', async () => {
    await produce(scalars, 1, 1999);

    const report = await consume([scalars], { count: 1, postProcess: 'none' });

    expect(report.count).toBe(1);
    expect(report.elapsedSeconds).toBe(0);
    expect(report.messagesPerSecond).toBe(0);
  });

  it('should read several topics in broker order', async () => {
    await produce(scalars, 1, 1999);
    await produce(arrays, 1, 1999);
    await produce(scalars, 2, 1999);

    const seen: ConsumedMessage[] = [];
    await consume([scalars, arrays], { count: 3, postProcess: 'none', onMessage: (message) => seen.push(message) });

    expect(seen.map((message) => message.topic.logicalName)).toEqual(['evt_scalars', 'evt_arrays', 'evt_scalars']);
  });

  it('should not change content through post-processing', async () => {
    await produce(arrays, 1, 1999);

    for (const postProcess of ['none', 'dataclass', 'zod', 'namespace'] as const) {
      const seen: ConsumedMessage[] = [];
      await consume([arrays], { count: 1, postProcess, onMessage: (message) => seen.push(message) });

      expect(seen).toHaveLength(1);
      expect({ ...seen[0]?.processed }).toEqual(seen[0]?.data);
    }
  });

  it('should build an attribute bag for namespace', async () => {
    await produce(scalars, 1, 1999);

    const seen: ConsumedMessage[] = [];
    await consume([scalars], { count: 1, postProcess: 'namespace', onMessage: (message) => seen.push(message) });

    expect(seen[0]?.processed).toBeInstanceOf(Namespace);
  });

  it('should keep going when the schema id differs from the registration', async () => {
    await produce(scalars, 1, 1999);
    await produce(scalars, 2, 1999);

    const report = await consume(
      [scalars],
      { count: 2, postProcess: 'none' },
      new Map([[scalars.wireName, { subject: scalars.subject, schemaId: 99 }]])
    );

    expect(report.count).toBe(2);
  });

  it('should raise MessageError for an undecodable payload', async () => {
    broker.append(scalars.wireName, Buffer.from('not framed'));

    const attempt = consume([scalars], { count: 1, postProcess: 'none' });

    await expect(attempt).rejects.toThrow(MessageError);
    await expect(attempt).rejects.toThrow(
      'Read from telemetry.Test.evt_scalars failed: decode failed: Payload is not in the schema registry wire format'
    );
  });

  it('should keep reading with a count of zero until an error stops it', async () => {
    for (let i = 1; i <= 4; i++) await produce(scalars, i, 1999);
    broker.appendError(scalars.wireName, 'Broker: Unknown topic or partition');

    const seen: ConsumedMessage[] = [];
    const attempt = consume([scalars], { count: 0, postProcess: 'dataclass', onMessage: (message) => seen.push(message) });

    await expect(attempt).rejects.toThrow('Broker: Unknown topic or partition');
    expect(seen).toHaveLength(4);
  });

  it('should reject an empty topic list', () => {
    expect(() => new ConsumerPipeline([], { count: 1, postProcess: 'none' })).toThrow(ConfigurationError);
  });

  it('should reject an unsupported field type with every post-processing strategy', () => {
    const nested = getTopic(
      loadComponent('Broken', { componentsDir: FIXTURE_COMPONENTS_DIR, topicNamespace: 'telemetry' }),
      'evt_nested'
    );

    for (const postProcess of ['none', 'dataclass', 'zod', 'namespace'] as const) {
      expect(() => new ConsumerPipeline([nested], { count: 1, postProcess })).toThrow(UnsupportedFieldTypeError);
    }
  });

  it('should reject a negative count', () => {
    expect(() => new ConsumerPipeline([scalars], { count: -1, postProcess: 'none' })).toThrow(
      'Invalid message count -1'
    );
  });
});

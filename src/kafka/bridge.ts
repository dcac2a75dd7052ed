/**
 * Broker Bridge
 *
 * Adapts the broker client's poll- and callback-based data plane into
 * awaitable calls. The client itself lives inside a ClientLane; the pipelines
 * only ever talk to the bridges.
 */

import { BridgeError, DeliveryError, MessageError } from '../lib/errors.js';
import type { BrokerMessage, DeliveryCallback, DeliveryReport } from '../types.js';
import type { ClientLane } from './lane.js';

// ============================================================================
// Broker Client Ports
// ============================================================================

export interface BrokerProducer {
  /** Queue one message; onDelivery fires once the broker has answered */
  produce(topic: string, value: Buffer, onDelivery: DeliveryCallback): void;
  /** Resolve once every queued message has had its delivery callback */
  flush(timeoutMs: number): Promise<void>;
  disconnect(): Promise<void>;
}

export interface BrokerConsumer {
  subscribe(topics: string[]): Promise<void>;
  /** Next message, or null when none arrived within the timeout */
  poll(timeoutMs: number): Promise<BrokerMessage | null>;
  disconnect(): Promise<void>;
}

// ============================================================================
// Read Direction
// ============================================================================

export interface ReadBridgeOptions {
  pollTimeoutMs?: number;
}

export class ReadBridge {
  private readonly lane: ClientLane<BrokerConsumer>;
  private readonly pollTimeoutMs: number;
  private reading = false;
  private closed = false;

  constructor(lane: ClientLane<BrokerConsumer>, options: ReadBridgeOptions = {}) {
    this.lane = lane;
    this.pollTimeoutMs = options.pollTimeoutMs ?? 100;
  }

  /**
   * Wait for the next message. Only one read may be outstanding.
   * A message that carries an error is raised as MessageError.
   */
  async read(): Promise<BrokerMessage> {
    if (this.reading) {
      throw new BridgeError('A read is already outstanding');
    }

    this.reading = true;
    try {
      return await this.lane.run((consumer) => this.pollUntilMessage(consumer));
    } finally {
      this.reading = false;
    }
  }

  /**
   * Stop a pending read at its next poll timeout
   */
  close(): void {
    this.closed = true;
  }

  private async pollUntilMessage(consumer: BrokerConsumer): Promise<BrokerMessage> {
    while (!this.closed) {
      const message = await consumer.poll(this.pollTimeoutMs);
      if (message === null) continue;

      if (message.error !== undefined) {
        throw new MessageError(message.topic, message.error, {
          partition: message.partition,
          offset: message.offset,
        });
      }
      return message;
    }
    throw new BridgeError('Read bridge closed');
  }
}

// ============================================================================
// Write Direction
// ============================================================================

type DeliveryOutcome =
  | { state: 'pending' }
  | { state: 'delivered'; report: DeliveryReport }
  | { state: 'failed'; error: Error };

/**
 * Completion slot filled directly by the delivery callback
 */
class DeliverySignal {
  private outcome: DeliveryOutcome = { state: 'pending' };

  readonly callback: DeliveryCallback = (error, report) => {
    if (this.outcome.state !== 'pending') return;
    if (error) {
      this.outcome = { state: 'failed', error };
    } else if (report) {
      this.outcome = { state: 'delivered', report };
    } else {
      this.outcome = { state: 'failed', error: new Error('delivery callback carried no report') };
    }
  };

  settle(topic: string): DeliveryReport {
    switch (this.outcome.state) {
      case 'delivered':
        return this.outcome.report;
      case 'failed':
        throw new DeliveryError(topic, this.outcome.error);
      case 'pending':
        throw new DeliveryError(topic, 'no delivery report after flush');
    }
  }
}

export interface WriteBridgeOptions {
  flushTimeoutMs?: number;
}

export class WriteBridge {
  private readonly lane: ClientLane<BrokerProducer>;
  private readonly flushTimeoutMs: number;

  constructor(lane: ClientLane<BrokerProducer>, options: WriteBridgeOptions = {}) {
    this.lane = lane;
    this.flushTimeoutMs = options.flushTimeoutMs ?? 30000;
  }

  /**
   * Publish one message and wait for its delivery report.
   * The flush inside the lane task guarantees the callback has fired by the
   * time the task completes.
   */
  async publish(topic: string, value: Buffer): Promise<DeliveryReport> {
    const delivery = new DeliverySignal();

    try {
      await this.lane.run(async (producer) => {
        producer.produce(topic, value, delivery.callback);
        await producer.flush(this.flushTimeoutMs);
      });
    } catch (error) {
      if (error instanceof BridgeError || error instanceof DeliveryError) throw error;
      throw new DeliveryError(topic, error);
    }

    return delivery.settle(topic);
  }
}

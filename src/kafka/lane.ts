/**
 * Client Lane
 *
 * A small bounded dispatch queue that owns one broker client. Every call on
 * the client goes through run(), so the client only ever sees one caller at a
 * time (with the default concurrency of 1) and calls run in FIFO order.
 */

import { BridgeError } from '../lib/errors.js';

export type LaneTask<C, T> = (client: C) => Promise<T> | T;

export interface ClientLaneOptions {
  name?: string;
  /** Maximum number of tasks running at once */
  concurrency?: number;
}

interface QueuedTask<C> {
  execute: (client: C) => Promise<void>;
  abort: (error: Error) => void;
}

export class ClientLane<C> {
  private readonly client: C;
  private readonly name: string;
  private readonly concurrency: number;
  private readonly queue: QueuedTask<C>[] = [];
  private active = 0;
  private closed = false;
  private idleWaiters: (() => void)[] = [];

  constructor(client: C, options: ClientLaneOptions = {}) {
    this.client = client;
    this.name = options.name ?? 'lane';
    this.concurrency = Math.max(1, options.concurrency ?? 1);
  }

  /** Tasks queued or running */
  get pending(): number {
    return this.queue.length + this.active;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Dispatch a task onto the lane and wait for its result
   */
  run<T>(task: LaneTask<C, T>): Promise<T> {
    if (this.closed) {
      return Promise.reject(new BridgeError(`${this.name} is closed`, { lane: this.name }));
    }

    return new Promise<T>((resolve, reject) => {
      this.queue.push({
        execute: async (client) => {
          try {
            resolve(await task(client));
          } catch (error) {
            reject(error);
          }
        },
        abort: reject,
      });
      this.drain();
    });
  }

  /**
   * Reject queued tasks and wait for running ones to finish
   */
  async close(): Promise<void> {
    this.closed = true;

    const dropped = this.queue.splice(0);
    for (const task of dropped) {
      task.abort(new BridgeError(`${this.name} is closed`, { lane: this.name }));
    }

    if (this.active === 0) return;
    await new Promise<void>((resolve) => this.idleWaiters.push(resolve));
  }

  private drain(): void {
    while (this.active < this.concurrency && this.queue.length > 0) {
      const next = this.queue.shift();
      if (!next) return;

      this.active++;
      void next.execute(this.client).finally(() => {
        this.active--;
        if (this.active === 0 && this.queue.length === 0) {
          const waiters = this.idleWaiters;
          this.idleWaiters = [];
          waiters.forEach((wake) => wake());
        }
        this.drain();
      });
    }
  }
}

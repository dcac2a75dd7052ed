/**
 * Client Lane Tests
 */

import { ClientLane } from '../../src/kafka/lane.js';
import { BridgeError } from '../../src/lib/errors.js';
import { deferred, flushMicrotasks } from '../helpers/fakes.js';

interface Recorder {
  calls: string[];
}

describe('ClientLane', () => {
  let client: Recorder;

  beforeEach(() => {
    client = { calls: [] };
  });

  it('should pass the owned client to each task', async () => {
    const lane = new ClientLane(client);

    const result = await lane.run((owned) => {
      owned.calls.push('first');
      return owned.calls.length;
    });

    expect(result).toBe(1);
    expect(client.calls).toEqual(['first']);
  });

  it('should run tasks in FIFO order, one at a time', async () => {
    const lane = new ClientLane(client);
    let active = 0;
    let maxActive = 0;

    const task = (name: string) => async (owned: Recorder) => {
      active++;
      maxActive = Math.max(maxActive, active);
      await flushMicrotasks();
      owned.calls.push(name);
      active--;
    };

    await Promise.all([lane.run(task('a')), lane.run(task('b')), lane.run(task('c'))]);

    expect(client.calls).toEqual(['a', 'b', 'c']);
    expect(maxActive).toBe(1);
  });

  it('should allow more running tasks when configured', async () => {
    const lane = new ClientLane(client, { concurrency: 2 });
    const gate = deferred<void>();
    let active = 0;
    let maxActive = 0;

    const task = async () => {
      active++;
      maxActive = Math.max(maxActive, active);
      await gate.promise;
      active--;
    };

    const running = Promise.all([lane.run(task), lane.run(task), lane.run(task)]);
    await flushMicrotasks();
    expect(lane.pending).toBe(3);
    gate.resolve();
    await running;
    await flushMicrotasks();

    expect(maxActive).toBe(2);
    expect(lane.pending).toBe(0);
  });

  it('should propagate task errors', async () => {
    const lane = new ClientLane(client);

    await expect(
      lane.run(() => {
        throw new Error('poll failed');
      })
    ).rejects.toThrow('poll failed');

    // The lane keeps working afterwards
    await expect(lane.run(() => 'ok')).resolves.toBe('ok');
  });

  it('should reject queued tasks on close and wait for the running one', async () => {
    const lane = new ClientLane(client, { name: 'consumer-lane' });
    const gate = deferred<string>();

    const running = lane.run(() => gate.promise);
    const queued = lane.run(() => 'never');
    await flushMicrotasks();

    let closed = false;
    const closing = lane.close().then(() => {
      closed = true;
    });

    await expect(queued).rejects.toThrow(BridgeError);
    await expect(queued).rejects.toThrow('consumer-lane is closed');
    await flushMicrotasks();
    expect(closed).toBe(false);

    gate.resolve('done');
    await expect(running).resolves.toBe('done');
    await closing;
    expect(closed).toBe(true);
  });

  it('should reject tasks dispatched after close', async () => {
    const lane = new ClientLane(client);
    await lane.close();

    expect(lane.isClosed).toBe(true);
    await expect(lane.run(() => 'late')).rejects.toThrow('lane is closed');
    expect(client.calls).toEqual([]);
  });
});

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { AsyncWorker } from '../../src/domain/asyncWorker';
import type { PutRecordParams, StreamBackendPort } from '../../src/ports/streamBackend';
import { fakeLogger, job, recordingBackend } from '../helpers';

describe('AsyncWorker', () => {
  let log: ReturnType<typeof fakeLogger>;
  let maxQueueSize: number;
  let worker: AsyncWorker;

  beforeEach(() => {
    log = fakeLogger();
    maxQueueSize = 10;
    worker = new AsyncWorker({ maxQueueSize: () => maxQueueSize, logger: () => log });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('does not deliver inside the producer call', () => {
    const backend = recordingBackend();
    expect(worker.push(job('a', backend))).toBe(true);
    expect(backend.putRecord).not.toHaveBeenCalled();
    expect(worker.queueLength).toBe(1);
    expect(worker.running).toBe(true);
  });

  it('stop delivers every queued job in FIFO order, then halts', async () => {
    const backend = recordingBackend();
    worker.push(job('a', backend));
    worker.push(job('b', backend));
    worker.push(job('c', backend));

    await worker.stop();

    expect(backend.records.map((r) => r.data)).toEqual(['a', 'b', 'c']);
    expect(backend.records[0]).toEqual({ streamName: 'stream', data: 'a', partitionKey: 'pk' });
    expect(worker.queueLength).toBe(0);
    expect(worker.running).toBe(false);
    expect(worker.stats()).toEqual({ enqueued: 3, delivered: 3, failed: 0, dropped: 0 });
  });

  it('drops jobs when the queue is full and logs a warning', async () => {
    maxQueueSize = 2;
    const backend = recordingBackend();
    expect(worker.push(job('a', backend))).toBe(true);
    expect(worker.push(job('b', backend))).toBe(true);
    expect(worker.push(job('c', backend))).toBe(false);
    expect(worker.queueLength).toBe(2);
    expect(log.warn).toHaveBeenCalledWith('Live events queue full, dropping event', {
      eventName: 'c',
      streamName: 'stream',
      maxQueueSize: 2,
    });

    await worker.stop();

    expect(backend.records.map((r) => r.data)).toEqual(['a', 'b']);
    expect(worker.stats().dropped).toBe(1);
  });

  it('logs and skips failed deliveries without stopping the loop', async () => {
    const delivered: string[] = [];
    const backend: StreamBackendPort = {
      putRecord: async (params: PutRecordParams) => {
        if (params.data === 'b') throw new Error('ProvisionedThroughputExceededException');
        delivered.push(params.data);
      },
    };
    worker.push(job('a', backend));
    worker.push(job('b', backend));
    worker.push(job('c', backend));

    await worker.stop();

    expect(delivered).toEqual(['a', 'c']);
    expect(log.error).toHaveBeenCalledTimes(1);
    expect(log.error).toHaveBeenCalledWith('Live event delivery failed', {
      eventName: 'b',
      streamName: 'stream',
      partitionKey: 'pk',
      error: 'Delivery to stream failed: ProvisionedThroughputExceededException',
    });
    expect(worker.stats()).toEqual({ enqueued: 3, delivered: 2, failed: 1, dropped: 0 });
  });

  it('absorbs synchronous throws from the backend', async () => {
    const backend: StreamBackendPort = {
      putRecord: () => {
        throw new Error('boom');
      },
    };
    worker.push(job('a', backend));

    await expect(worker.stop()).resolves.toBeUndefined();
    expect(worker.stats().failed).toBe(1);
  });

  it('delivers jobs pushed while draining', async () => {
    const delivered: string[] = [];
    const backend: StreamBackendPort = {
      putRecord: async (params: PutRecordParams) => {
        delivered.push(params.data);
        if (params.data === 'a') worker.push(job('late', backend));
      },
    };
    worker.push(job('a', backend));

    await worker.stop();

    expect(delivered).toEqual(['a', 'late']);
  });

  it('starts again on the next push after stop', async () => {
    const backend = recordingBackend();
    worker.push(job('a', backend));
    await worker.stop();
    expect(worker.running).toBe(false);

    worker.push(job('b', backend));
    expect(worker.running).toBe(true);
    await worker.stop();

    expect(backend.records.map((r) => r.data)).toEqual(['a', 'b']);
  });

  it('stop resolves immediately when never started', async () => {
    await worker.stop();
    expect(worker.running).toBe(false);
  });

  it('delivers while running without a stop', async () => {
    const backend = recordingBackend();
    worker.start();
    worker.push(job('a', backend));
    await vi.waitFor(() => expect(backend.putRecord).toHaveBeenCalledTimes(1));
    expect(worker.running).toBe(true);
    await worker.stop();
  });

  describe('when a collaborator throws', () => {
    it('keeps delivering and can restart when the logger throws', async () => {
      const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});
      log.error.mockImplementation(() => {
        throw new Error('log sink down');
      });
      const failing: StreamBackendPort = {
        putRecord: async () => {
          throw new Error('ProvisionedThroughputExceededException');
        },
      };
      const good = recordingBackend();
      worker.push(job('a', failing));
      worker.push(job('b', good));

      await expect(worker.stop()).resolves.toBeUndefined();

      expect(good.records.map((r) => r.data)).toEqual(['b']);
      expect(worker.running).toBe(false);
      expect(stderr).toHaveBeenCalledWith(
        '{"level":"ERROR","message":"Live events logger failed","logMessage":"Live event delivery failed","error":"log sink down"}'
      );

      worker.push(job('c', good));
      await worker.stop();

      expect(good.records.map((r) => r.data)).toEqual(['b', 'c']);
      expect(worker.stats()).toEqual({ enqueued: 3, delivered: 2, failed: 1, dropped: 0 });
    });

    it('counts a delivered record once when trace logging throws', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => {});
      log.trace.mockImplementation(() => {
        throw new Error('log sink down');
      });
      const backend = recordingBackend();
      worker.push(job('a', backend));

      await worker.stop();

      expect(backend.records).toHaveLength(1);
      expect(log.error).not.toHaveBeenCalled();
      expect(worker.stats()).toEqual({ enqueued: 1, delivered: 1, failed: 0, dropped: 0 });
    });

    it('drops the job instead of throwing when the queue size accessor fails', async () => {
      let sizeError: Error | null = new Error('settings store down');
      const failingWorker = new AsyncWorker({
        maxQueueSize: () => {
          if (sizeError) throw sizeError;
          return 10;
        },
        logger: () => log,
      });
      const backend = recordingBackend();

      expect(failingWorker.push(job('a', backend))).toBe(false);
      expect(log.error).toHaveBeenCalledWith('Live events queue size unavailable, dropping event', {
        eventName: 'a',
        streamName: 'stream',
        error: 'settings store down',
      });

      sizeError = null;
      expect(failingWorker.push(job('b', backend))).toBe(true);
      await failingWorker.stop();

      expect(backend.records.map((r) => r.data)).toEqual(['b']);
      expect(failingWorker.stats()).toEqual({ enqueued: 1, delivered: 1, failed: 0, dropped: 1 });
    });

    it('drops every job when the queue size is not a number', async () => {
      maxQueueSize = Number.NaN;
      const backend = recordingBackend();

      expect(worker.push(job('a', backend))).toBe(false);
      expect(worker.queueLength).toBe(0);
      await worker.stop();

      expect(backend.putRecord).not.toHaveBeenCalled();
    });
  });
});

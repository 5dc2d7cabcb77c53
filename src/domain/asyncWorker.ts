/**
 * Single-consumer delivery loop draining a bounded queue of jobs.
 *
 * Producers call push() and never wait: a full queue drops the job. The loop awaits
 * a wake-up while idle, delivers one job at a time in FIFO order, and absorbs every
 * delivery failure (logged, counted, dropped; no retry). A queue size accessor that
 * throws drops the job instead of failing the producer. stop() drains whatever is
 * queued, then halts; the next push() starts the loop again.
 */

import { BoundedQueue } from './boundedQueue';
import { DeliveryError, errorMessage } from '../lib/errors';
import type { LogFields, Logger } from '../lib/logger';
import type { DeliveryJob } from '../types/events';

export interface AsyncWorkerOptions {
  maxQueueSize: () => number;
  logger: () => Logger;
}

export interface WorkerStats {
  enqueued: number;
  delivered: number;
  failed: number;
  dropped: number;
}

export class AsyncWorker {
  private readonly queue: BoundedQueue<DeliveryJob>;
  private loop: Promise<void> | null = null;
  private wake: (() => void) | null = null;
  private stopping = false;
  private readonly counters: WorkerStats = { enqueued: 0, delivered: 0, failed: 0, dropped: 0 };

  constructor(private readonly options: AsyncWorkerOptions) {
    this.queue = new BoundedQueue<DeliveryJob>(options.maxQueueSize);
  }

  get queueLength(): number {
    return this.queue.length;
  }

  get running(): boolean {
    return this.loop !== null;
  }

  stats(): WorkerStats {
    return { ...this.counters };
  }

  push(job: DeliveryJob): boolean {
    // Start before enqueueing so the loop parks on its wake-up and the job is
    // picked up on a later turn, never inside the producer's call.
    this.start();
    let accepted: boolean;
    try {
      accepted = this.queue.offer(job);
    } catch (err) {
      this.counters.dropped += 1;
      this.log('error', 'Live events queue size unavailable, dropping event', {
        eventName: job.eventName,
        streamName: job.streamName,
        error: errorMessage(err),
      });
      return false;
    }
    if (!accepted) {
      this.counters.dropped += 1;
      this.log('warn', 'Live events queue full, dropping event', {
        eventName: job.eventName,
        streamName: job.streamName,
        maxQueueSize: this.queue.capacity,
      });
      return false;
    }
    this.counters.enqueued += 1;
    this.notify();
    return true;
  }

  start(): void {
    if (this.loop) return;
    this.stopping = false;
    this.loop = this.run();
  }

  /** Deliver everything currently queued, then halt the loop. */
  async stop(): Promise<void> {
    const loop = this.loop;
    if (!loop) return;
    this.stopping = true;
    this.notify();
    await loop;
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }

  private async run(): Promise<void> {
    try {
      for (;;) {
        const job = this.queue.poll();
        if (job === undefined) {
          if (this.stopping) break;
          await new Promise<void>((resolve) => {
            this.wake = resolve;
          });
          continue;
        }
        await this.deliver(job);
      }
    } finally {
      this.loop = null;
      this.stopping = false;
    }
  }

  private async deliver(job: DeliveryJob): Promise<void> {
    try {
      await job.streamClient.putRecord({
        streamName: job.streamName,
        data: job.data,
        partitionKey: job.partitionKey,
      });
    } catch (err) {
      this.counters.failed += 1;
      const error = new DeliveryError(job.streamName, job.partitionKey, err);
      this.log('error', 'Live event delivery failed', {
        eventName: job.eventName,
        streamName: error.streamName,
        partitionKey: error.partitionKey,
        error: error.message,
      });
      return;
    }
    this.counters.delivered += 1;
    this.log('trace', 'Live event delivered', {
      eventName: job.eventName,
      streamName: job.streamName,
      partitionKey: job.partitionKey,
      data: job.data,
    });
  }

  /** A failing logger must not stop the loop; its error goes to stderr instead. */
  private log(level: 'trace' | 'warn' | 'error', message: string, fields: LogFields): void {
    try {
      this.options.logger()[level](message, fields);
    } catch (err) {
      console.error(
        JSON.stringify({
          level: 'ERROR',
          message: 'Live events logger failed',
          logMessage: message,
          error: errorMessage(err),
        })
      );
    }
  }
}

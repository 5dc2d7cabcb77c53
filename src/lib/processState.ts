/**
 * Process-wide live events state: settings, ambient context, the shared worker,
 * backend override, queue size accessor and logger.
 *
 * Created lazily by getProcessState(); resetProcessState() stops the current worker
 * (draining its queue) and starts over, for test isolation.
 */

import { AsyncWorker } from '../domain/asyncWorker';
import { ContextStore } from '../domain/contextStore';
import type { StreamBackendPort } from '../ports/streamBackend';
import { getMaxQueueSize, type RawConfig } from './config';
import { createConsoleLogger, type Logger } from './logger';

export interface ProcessState {
  settings: RawConfig | null;
  readonly context: ContextStore;
  readonly worker: AsyncWorker;
  streamClient: StreamBackendPort | null;
  maxQueueSize: () => number;
  logger: Logger;
}

export interface ProcessStateOptions {
  settings?: RawConfig | null;
  streamClient?: StreamBackendPort | null;
  maxQueueSize?: () => number;
  logger?: Logger;
}

let current: ProcessState | null = null;

export function initProcessState(options: ProcessStateOptions = {}): ProcessState {
  const state: ProcessState = {
    settings: options.settings ?? null,
    context: new ContextStore(),
    streamClient: options.streamClient ?? null,
    maxQueueSize: options.maxQueueSize ?? getMaxQueueSize,
    logger: options.logger ?? createConsoleLogger(),
    worker: new AsyncWorker({
      maxQueueSize: () => state.maxQueueSize(),
      logger: () => state.logger,
    }),
  };
  current = state;
  return state;
}

export function getProcessState(): ProcessState {
  return current ?? initProcessState();
}

export async function resetProcessState(options: ProcessStateOptions = {}): Promise<ProcessState> {
  if (current) await current.worker.stop();
  return initProcessState(options);
}

/**
 * Process-wide live events API: ambient context, a cached client, and overrides
 * for the queue size, backend and logger.
 */

import { Client } from './client';
import type { AsyncWorker } from './domain/asyncWorker';
import type { RawConfig } from './lib/config';
import type { Logger } from './lib/logger';
import { getProcessState, resetProcessState, type ProcessState } from './lib/processState';
import type { StreamBackendPort } from './ports/streamBackend';
import type { EventBody, EventContext } from './types/events';

export interface PostEventParams {
  eventName: string;
  payload: EventBody;
  time?: Date;
  partitionKey?: string;
  context?: EventContext;
}

let cached: { state: ProcessState; client: Client } | null = null;

function getClient(): Client {
  const state = getProcessState();
  if (!cached || cached.state !== state) {
    cached = { state, client: new Client(undefined, null, state) };
  }
  return cached.client;
}

export function configure(settings: RawConfig | null): void {
  getProcessState().settings = settings;
  cached = null;
}

export function settings(): RawConfig {
  return Client.config();
}

export function setContext(partial: EventContext): void {
  getProcessState().context.set(partial);
}

export function clearContext(): void {
  getProcessState().context.clear();
}

export function getContext(): EventContext {
  return getProcessState().context.current();
}

export function postEvent(params: PostEventParams): void {
  getClient().postEvent(params.eventName, params.payload, params.time, params.context, params.partitionKey);
}

export function setMaxQueueSize(maxQueueSize: () => number): void {
  getProcessState().maxQueueSize = maxQueueSize;
}

/** Route every client without an explicit backend to `streamClient`; null restores the default. */
export function setStreamClient(streamClient: StreamBackendPort | null): void {
  getProcessState().streamClient = streamClient;
}

export function setLogger(logger: Logger): void {
  getProcessState().logger = logger;
}

export function logger(): Logger {
  return getProcessState().logger;
}

export function getWorker(): AsyncWorker {
  return getProcessState().worker;
}

export async function reset(): Promise<void> {
  cached = null;
  await resetProcessState();
}

/**
 * Live event wire record and delivery job types.
 */

import type { StreamBackendPort } from '../ports/streamBackend';

export type ContextValue = string | number | boolean | null;

export type EventContext = Record<string, ContextValue>;

export type EventBody = Record<string, unknown>;

export interface EventAttributes extends EventContext {
  event_name: string;
  event_time: string; // ISO-8601 UTC, millisecond precision
}

export interface LiveEvent {
  readonly attributes: Readonly<EventAttributes>;
  readonly body: Readonly<EventBody>;
}

export interface DeliveryJob {
  streamName: string;
  partitionKey: string;
  data: string;
  eventName: string;
  streamClient: StreamBackendPort;
}

/**
 * Live events client: merges ambient context, serializes, and hands delivery jobs
 * to the shared worker. Never waits on the network.
 */

import { createStreamClient } from './adapters/streamClientFactory';
import { buildEvent, encodeEvent } from './domain/serializer';
import {
  awsConfig,
  getConfig,
  resolveStreamSettings,
  type AwsClientDescriptor,
  type RawConfig,
  type StreamSettings,
} from './lib/config';
import { getProcessState, type ProcessState } from './lib/processState';
import type { StreamBackendPort } from './ports/streamBackend';
import type { EventBody, EventContext } from './types/events';

const RANDOM_PARTITION_KEYS = 1000;

function defaultPartitionKey(context: EventContext): string {
  const userId = context.user_id;
  if (userId !== undefined && userId !== null) return String(userId);
  return String(Math.floor(Math.random() * RANDOM_PARTITION_KEYS));
}

export class Client {
  readonly settings: StreamSettings;
  private defaultStreamClient: StreamBackendPort | null = null;

  /** Active raw configuration: settings given to configure(), else the environment. */
  static config(state: ProcessState = getProcessState()): RawConfig {
    return state.settings ?? getConfig();
  }

  static awsConfig(raw: RawConfig): AwsClientDescriptor {
    return awsConfig(raw);
  }

  /**
   * @param config - defaults to Client.config(); validated here (ConfigurationError)
   * @param streamClient - takes precedence over the process-wide override and the default adapter
   */
  constructor(
    config?: RawConfig,
    private readonly streamClient: StreamBackendPort | null = null,
    private readonly state: ProcessState = getProcessState()
  ) {
    this.settings = resolveStreamSettings(config ?? Client.config(state));
  }

  postEvent(
    eventName: string,
    payload: EventBody,
    time: Date = new Date(),
    context: EventContext = {},
    partitionKey?: string
  ): void {
    const merged: EventContext = { ...this.state.context.current(), ...context };
    const data = encodeEvent(buildEvent(eventName, payload, time, merged));
    this.state.worker.push({
      streamName: this.settings.streamName,
      partitionKey: partitionKey ?? defaultPartitionKey(merged),
      data,
      eventName,
      streamClient: this.resolveStreamClient(),
    });
  }

  private resolveStreamClient(): StreamBackendPort {
    if (this.streamClient) return this.streamClient;
    if (this.state.streamClient) return this.state.streamClient;
    this.defaultStreamClient ??= createStreamClient(this.settings);
    return this.defaultStreamClient;
  }
}

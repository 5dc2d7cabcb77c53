export * as LiveEvents from './liveEvents';
export {
  configure,
  settings,
  setContext,
  clearContext,
  getContext,
  postEvent,
  setMaxQueueSize,
  setStreamClient,
  setLogger,
  logger,
  getWorker,
  reset,
} from './liveEvents';
export type { PostEventParams } from './liveEvents';
export { Client } from './client';
export { AsyncWorker } from './domain/asyncWorker';
export type { AsyncWorkerOptions, WorkerStats } from './domain/asyncWorker';
export { BoundedQueue } from './domain/boundedQueue';
export { ContextStore } from './domain/contextStore';
export { buildEvent, decodeEvent, encodeEvent, formatEventTime } from './domain/serializer';
export { KinesisAdapter, createKinesisAdapter } from './adapters/kinesisAdapter';
export { FirehoseAdapter, createFirehoseAdapter } from './adapters/firehoseAdapter';
export { createStreamClient } from './adapters/streamClientFactory';
export { awsConfig, getConfig, getMaxQueueSize, resolveStreamSettings } from './lib/config';
export type { AwsClientDescriptor, AwsCredentials, RawConfig, StreamSettings, StreamType } from './lib/config';
export { ConfigurationError, DeliveryError, SerializationError } from './lib/errors';
export { createConsoleLogger, parseLogLevel } from './lib/logger';
export type { LogFields, LogLevel, Logger } from './lib/logger';
export { getProcessState, initProcessState, resetProcessState } from './lib/processState';
export type { ProcessState, ProcessStateOptions } from './lib/processState';
export type { PutRecordParams, StreamBackendPort } from './ports/streamBackend';
export type {
  ContextValue,
  DeliveryJob,
  EventAttributes,
  EventBody,
  EventContext,
  LiveEvent,
} from './types/events';

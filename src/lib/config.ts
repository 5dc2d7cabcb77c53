/**
 * Live events configuration: raw settings, AWS client descriptor and env loading.
 */

import { ConfigurationError } from './errors';

export type StreamType = 'kinesis' | 'firehose';

/** Raw settings as supplied by the host application (snake_case keys). */
export interface RawConfig {
  stream_name?: string;
  stream_type?: string;
  aws_access_key_id?: string;
  aws_secret_access_key?: string;
  aws_session_token?: string;
  aws_region?: string;
  aws_endpoint?: string;
}

export interface AwsCredentials {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken?: string;
}

/** Connection descriptor accepted by the AWS SDK v3 client constructors. */
export interface AwsClientDescriptor {
  region?: string;
  endpoint?: string;
  credentials?: AwsCredentials;
}

export interface StreamSettings {
  streamName: string;
  streamType: StreamType;
  aws: AwsClientDescriptor;
}

const DEFAULT_MAX_QUEUE_SIZE = 1000;

function getEnv(key: string, defaultValue?: string): string {
  return process.env[key] ?? defaultValue ?? '';
}

function parseIntEnv(key: string, defaultValue: number): number {
  const v = process.env[key];
  if (v === undefined || v === '') return defaultValue;
  const n = parseInt(v, 10);
  return Number.isNaN(n) ? defaultValue : n;
}

function present(value: string | undefined): value is string {
  return value !== undefined && value !== '';
}

/**
 * Parse region, credentials and endpoint override. The endpoint is kept verbatim;
 * without one the SDK falls back to region-based endpoint resolution.
 */
export function awsConfig(raw: RawConfig): AwsClientDescriptor {
  const descriptor: AwsClientDescriptor = {};
  if (present(raw.aws_region)) descriptor.region = raw.aws_region;
  if (present(raw.aws_endpoint)) descriptor.endpoint = raw.aws_endpoint;

  const hasKeyId = present(raw.aws_access_key_id);
  const hasSecret = present(raw.aws_secret_access_key);
  if (hasKeyId !== hasSecret) {
    const missing = hasKeyId ? 'aws_secret_access_key' : 'aws_access_key_id';
    throw new ConfigurationError(missing, `Incomplete AWS credentials: ${missing} is missing`);
  }
  if (present(raw.aws_access_key_id) && present(raw.aws_secret_access_key)) {
    descriptor.credentials = {
      accessKeyId: raw.aws_access_key_id,
      secretAccessKey: raw.aws_secret_access_key,
      ...(present(raw.aws_session_token) && { sessionToken: raw.aws_session_token }),
    };
  }
  return descriptor;
}

function parseStreamType(value: string | undefined): StreamType {
  if (!present(value)) return 'kinesis';
  if (value === 'kinesis' || value === 'firehose') return value;
  throw new ConfigurationError('stream_type', `Unknown stream_type: ${value}`);
}

export function resolveStreamSettings(raw: RawConfig): StreamSettings {
  if (!present(raw.stream_name)) {
    throw new ConfigurationError('stream_name', 'Missing required config: stream_name');
  }
  return {
    streamName: raw.stream_name,
    streamType: parseStreamType(raw.stream_type),
    aws: awsConfig(raw),
  };
}

export function getConfig(): RawConfig {
  return {
    stream_name: getEnv('LIVE_EVENTS_STREAM_NAME'),
    stream_type: getEnv('LIVE_EVENTS_STREAM_TYPE', 'kinesis'),
    aws_access_key_id: getEnv('AWS_ACCESS_KEY_ID'),
    aws_secret_access_key: getEnv('AWS_SECRET_ACCESS_KEY'),
    aws_session_token: getEnv('AWS_SESSION_TOKEN'),
    aws_region: getEnv('AWS_REGION'),
    aws_endpoint: getEnv('LIVE_EVENTS_AWS_ENDPOINT'),
  };
}

export function getMaxQueueSize(): number {
  return parseIntEnv('LIVE_EVENTS_MAX_QUEUE_SIZE', DEFAULT_MAX_QUEUE_SIZE);
}

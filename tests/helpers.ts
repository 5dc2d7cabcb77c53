import { vi } from 'vitest';
import type { PutRecordParams } from '../src/ports/streamBackend';
import type { DeliveryJob } from '../src/types/events';

export function fakeLogger() {
  return {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

/** Backend that records every put and never fails. */
export function recordingBackend() {
  const records: PutRecordParams[] = [];
  const putRecord = vi.fn(async (params: PutRecordParams) => {
    records.push(params);
  });
  return { putRecord, records };
}

export function job(data: string, streamClient: DeliveryJob['streamClient']): DeliveryJob {
  return { streamName: 'stream', partitionKey: 'pk', data, eventName: data, streamClient };
}

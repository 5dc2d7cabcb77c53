/**
 * Kinesis Data Streams adapter implementing StreamBackendPort (default backend).
 */

import { KinesisClient, PutRecordCommand } from '@aws-sdk/client-kinesis';
import type { AwsClientDescriptor } from '../lib/config';
import type { PutRecordParams, StreamBackendPort } from '../ports/streamBackend';

export class KinesisAdapter implements StreamBackendPort {
  constructor(private readonly client: KinesisClient) {}

  async putRecord(params: PutRecordParams): Promise<void> {
    await this.client.send(
      new PutRecordCommand({
        StreamName: params.streamName,
        Data: new TextEncoder().encode(params.data),
        PartitionKey: params.partitionKey,
      })
    );
  }
}

export function createKinesisAdapter(aws: AwsClientDescriptor): KinesisAdapter {
  return new KinesisAdapter(new KinesisClient({ ...aws }));
}

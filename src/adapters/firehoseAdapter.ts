/**
 * Firehose adapter implementing StreamBackendPort. Records are newline-delimited JSON;
 * Firehose has no partition keys, so the key is not sent.
 */

import { FirehoseClient, PutRecordCommand } from '@aws-sdk/client-firehose';
import type { AwsClientDescriptor } from '../lib/config';
import type { PutRecordParams, StreamBackendPort } from '../ports/streamBackend';

export class FirehoseAdapter implements StreamBackendPort {
  constructor(private readonly client: FirehoseClient) {}

  async putRecord(params: PutRecordParams): Promise<void> {
    const data = Buffer.from(params.data + '\n', 'utf-8');
    await this.client.send(
      new PutRecordCommand({
        DeliveryStreamName: params.streamName,
        Record: { Data: data },
      })
    );
  }
}

export function createFirehoseAdapter(aws: AwsClientDescriptor): FirehoseAdapter {
  return new FirehoseAdapter(new FirehoseClient({ ...aws }));
}

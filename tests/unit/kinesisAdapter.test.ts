import { describe, it, expect, vi, beforeEach } from 'vitest';
import { KinesisClient, PutRecordCommand } from '@aws-sdk/client-kinesis';
import { KinesisAdapter, createKinesisAdapter } from '../../src/adapters/kinesisAdapter';

const mockSend = vi.fn();

describe('KinesisAdapter', () => {
  beforeEach(() => {
    mockSend.mockReset();
  });

  it('sends PutRecordCommand with utf-8 data and the partition key', async () => {
    mockSend.mockResolvedValue({ ShardId: 'shardId-000000000000', SequenceNumber: '1' });
    const adapter = new KinesisAdapter({ send: mockSend } as unknown as KinesisClient);

    await adapter.putRecord({ streamName: 'stream', data: '{"body":{"é":1}}', partitionKey: '123' });

    expect(mockSend).toHaveBeenCalledTimes(1);
    const command = mockSend.mock.calls[0][0];
    expect(command).toBeInstanceOf(PutRecordCommand);
    expect(command.input.StreamName).toBe('stream');
    expect(command.input.PartitionKey).toBe('123');
    expect(new TextDecoder().decode(command.input.Data)).toBe('{"body":{"é":1}}');
  });

  it('propagates send failures', async () => {
    mockSend.mockRejectedValue(new Error('ResourceNotFoundException'));
    const adapter = new KinesisAdapter({ send: mockSend } as unknown as KinesisClient);
    await expect(adapter.putRecord({ streamName: 'stream', data: '{}', partitionKey: '1' })).rejects.toThrow(
      'ResourceNotFoundException'
    );
  });

  it('createKinesisAdapter builds a client without contacting AWS', () => {
    const adapter = createKinesisAdapter({
      region: 'us-east-1',
      endpoint: 'http://example.com:6543/',
      credentials: { accessKeyId: 'test-key-id', secretAccessKey: 'test-secret' },
    });
    expect(adapter).toBeInstanceOf(KinesisAdapter);
  });
});

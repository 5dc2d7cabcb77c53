/**
 * Stream backend port: the single network write the delivery worker performs.
 */

export interface PutRecordParams {
  streamName: string;
  data: string;
  partitionKey: string;
}

export interface StreamBackendPort {
  /** Resolve (or return) on success; throw or reject on any failure. */
  putRecord(params: PutRecordParams): Promise<void> | void;
}

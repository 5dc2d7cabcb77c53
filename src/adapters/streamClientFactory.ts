/**
 * Default stream backend for resolved settings.
 */

import type { StreamSettings } from '../lib/config';
import type { StreamBackendPort } from '../ports/streamBackend';
import { createFirehoseAdapter } from './firehoseAdapter';
import { createKinesisAdapter } from './kinesisAdapter';

export function createStreamClient(settings: StreamSettings): StreamBackendPort {
  switch (settings.streamType) {
    case 'firehose':
      return createFirehoseAdapter(settings.aws);
    case 'kinesis':
      return createKinesisAdapter(settings.aws);
  }
}

/**
 * Error kinds raised by the live events client.
 * ConfigurationError and SerializationError reach callers; DeliveryError never leaves the worker.
 */

export class ConfigurationError extends Error {
  constructor(readonly field: string, message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class SerializationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SerializationError';
  }
}

export class DeliveryError extends Error {
  constructor(
    readonly streamName: string,
    readonly partitionKey: string,
    cause: unknown
  ) {
    super(`Delivery to ${streamName} failed: ${errorMessage(cause)}`, { cause });
    this.name = 'DeliveryError';
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

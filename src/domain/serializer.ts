/**
 * Event construction and wire encoding: {"attributes": {...}, "body": {...}} as JSON.
 */

import { SerializationError, errorMessage } from '../lib/errors';
import type { ContextValue, EventAttributes, EventBody, EventContext, LiveEvent } from '../types/events';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function isContextValue(value: unknown): value is ContextValue {
  return (
    value === null ||
    typeof value === 'string' ||
    (typeof value === 'number' && Number.isFinite(value)) ||
    typeof value === 'boolean'
  );
}

/** JSON.stringify would write null for these, or leave them out; refuse instead. */
function strictReplacer(key: string, value: unknown): unknown {
  if (typeof value === 'number' && !Number.isFinite(value)) {
    throw new SerializationError(`Value at ${key} is not a finite number`);
  }
  if (value === undefined || typeof value === 'function' || typeof value === 'symbol') {
    throw new SerializationError(`Value at ${key} has no JSON representation`);
  }
  return value;
}

/** UTC ISO-8601 with millisecond precision, e.g. 2026-03-04T05:06:07.089Z */
export function formatEventTime(time: Date): string {
  if (Number.isNaN(time.getTime())) {
    throw new SerializationError('Invalid event time');
  }
  return time.toISOString();
}

export function buildEvent(
  eventName: string,
  body: EventBody,
  time: Date,
  context: EventContext
): LiveEvent {
  if (!eventName) throw new SerializationError('Event name is required');
  if (!isPlainObject(body)) {
    throw new SerializationError(`Payload for ${eventName} must be a plain object`);
  }
  for (const [key, value] of Object.entries(context)) {
    if (!isContextValue(value)) {
      throw new SerializationError(`Context value for ${key} must be a scalar`);
    }
  }
  const attributes: EventAttributes = {
    ...context,
    event_name: eventName,
    event_time: formatEventTime(time),
  };
  return Object.freeze({
    attributes: Object.freeze(attributes),
    body: Object.freeze({ ...body }),
  });
}

export function encodeEvent(event: LiveEvent): string {
  try {
    return JSON.stringify({ attributes: event.attributes, body: event.body }, strictReplacer);
  } catch (err) {
    throw new SerializationError(
      `Event ${event.attributes.event_name} is not serializable: ${errorMessage(err)}`,
      { cause: err }
    );
  }
}

export function decodeEvent(data: string): LiveEvent {
  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch (err) {
    throw new SerializationError(`Malformed event payload: ${errorMessage(err)}`, { cause: err });
  }
  if (!isPlainObject(parsed)) throw new SerializationError('Event payload must be an object');
  const { attributes, body } = parsed;
  if (!isPlainObject(attributes) || !isPlainObject(body)) {
    throw new SerializationError('Event payload requires attributes and body objects');
  }

  const context: EventContext = {};
  for (const [key, value] of Object.entries(attributes)) {
    if (!isContextValue(value)) {
      throw new SerializationError(`Attribute ${key} must be a scalar`);
    }
    context[key] = value;
  }
  const { event_name: eventName, event_time: eventTime } = context;
  if (typeof eventName !== 'string' || typeof eventTime !== 'string') {
    throw new SerializationError('Event attributes require event_name and event_time');
  }
  return Object.freeze({
    attributes: Object.freeze({ ...context, event_name: eventName, event_time: eventTime }),
    body: Object.freeze(body),
  });
}

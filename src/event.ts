import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { asRecord, nonEmptyString, type JsonRecord, type TavusEvent, type ToolCall } from './types.js';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}/;

/**
 * Reads an upstream timestamp as epoch seconds. Accepts numbers, ISO-8601
 * strings (a trailing `Z` means UTC) and numeric strings; anything else is
 * reported as unknown.
 */
export function coerceTimestamp(value: unknown): number | undefined {
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (typeof value !== 'string') return undefined;

  const s = value.trim();
  if (ISO_DATE.test(s)) {
    const ms = Date.parse(s.endsWith('Z') ? `${s.slice(0, -1)}+00:00` : s);
    if (!Number.isNaN(ms)) return ms / 1000;
  }
  if (s === '') return undefined;
  const n = Number(s);
  return Number.isFinite(n) ? n : undefined;
}

const optionalString = z.unknown().transform((v) => nonEmptyString(v));

// Never rejects: every field is coerced or dropped.
const EventSchema = z.object({
  event_type: z.unknown().transform((v) => nonEmptyString(v) ?? 'tool_call'),
  message_type: optionalString,
  conversation_id: optionalString,
  event_id: optionalString,
  timestamp: z.unknown().transform(coerceTimestamp),
  data: z.unknown().transform(asRecord),
  properties: z.unknown().transform(asRecord)
});

export function parseEvent(payload: JsonRecord, tool?: ToolCall): TavusEvent {
  const e = EventSchema.parse(payload);
  return {
    eventType: e.event_type,
    messageType: e.message_type,
    conversationId: e.conversation_id,
    eventId: e.event_id,
    timestamp: e.timestamp,
    tool,
    data: e.data,
    properties: e.properties
  };
}

/** The event a handler sees for one extracted tool call. */
export function buildToolEvent(payload: JsonRecord, call: ToolCall, now: () => number = Date.now): TavusEvent {
  return parseEvent(
    {
      ...payload,
      event_id: nonEmptyString(payload.event_id) ?? randomUUID(),
      timestamp: payload.timestamp ?? now() / 1000,
      event_type: nonEmptyString(payload.event_type) ?? 'tool_call'
    },
    call
  );
}

export function conversationIdOf(payload: JsonRecord): string | undefined {
  return nonEmptyString(payload.conversation_id);
}

export function transcriptOf(payload: JsonRecord): unknown[] {
  const transcript = asRecord(payload.properties).transcript;
  return Array.isArray(transcript) ? transcript : [];
}

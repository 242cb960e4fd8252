export type JsonRecord = Record<string, unknown>;

export interface ToolCall {
  name: string;
  arguments: JsonRecord;
  callId?: string;
}

export interface TavusEvent {
  eventType: string;
  messageType?: string;
  conversationId?: string;
  eventId?: string;
  /** Epoch seconds; undefined when the upstream value could not be read. */
  timestamp?: number;
  tool?: ToolCall;
  data: JsonRecord;
  properties: JsonRecord;
}

export interface RosterEntry {
  participants: Map<string, string>;
  lastSpeakerId?: string;
  lastSpeakerName?: string;
}

export interface RosterParticipant {
  participantId: string;
  displayName: string;
}

export type SpeakerSource = 'transcript' | 'memory' | 'unknown';

export interface CurrentSpeaker {
  conversationId?: string;
  participantId?: string;
  displayName?: string;
  confident: boolean;
  source: SpeakerSource;
}

export type ToolResult = JsonRecord;

export interface ToolCallRecord {
  name: string;
  callId?: string;
  arguments: JsonRecord;
  result: ToolResult;
}

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function asRecord(value: unknown): JsonRecord {
  return isRecord(value) ? value : {};
}

export function nonEmptyString(value: unknown): string | undefined {
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
}

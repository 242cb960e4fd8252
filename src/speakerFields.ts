import { isRecord, nonEmptyString, type JsonRecord } from './types.js';

// Key spellings seen across providers for the same field.
export const LABEL_KEYS = [
  'display_name',
  'displayName',
  'speaker_name',
  'speakerName',
  'participant_name',
  'participantName',
  'user_name',
  'userName',
  'name',
  'speaker'
] as const;

// `id` alone is only trusted inside a participant container; on the message
// itself it is usually the message id.
export const ID_KEYS = [
  'participant_id',
  'participantId',
  'speaker_id',
  'speakerId',
  'user_id',
  'userId',
  'session_id',
  'sessionId'
] as const;

export const NESTED_ID_KEYS = [...ID_KEYS, 'id'] as const;

export const CONTAINER_KEYS = ['sender', 'user', 'participant'] as const;

export const HUMAN_ROLES: ReadonlySet<string> = new Set(['user', 'participant', 'speaker', 'human']);

type Extractor = (msg: JsonRecord) => string | undefined;

function firstString(source: unknown, keys: readonly string[]): string | undefined {
  if (!isRecord(source)) return undefined;
  for (const key of keys) {
    const value = nonEmptyString(source[key]);
    if (value) return value;
  }
  return undefined;
}

function firstMatch(extractors: readonly Extractor[], msg: JsonRecord): string | undefined {
  for (const extract of extractors) {
    const value = extract(msg);
    if (value) return value;
  }
  return undefined;
}

const labelExtractors: readonly Extractor[] = [
  (msg) => firstString(msg, LABEL_KEYS),
  (msg) => firstString(msg.speaker, LABEL_KEYS),
  ...CONTAINER_KEYS.map((key): Extractor => (msg) => firstString(msg[key], LABEL_KEYS))
];

const idExtractors: readonly Extractor[] = [
  (msg) => firstString(msg, ID_KEYS),
  (msg) => firstString(msg.speaker, NESTED_ID_KEYS),
  ...CONTAINER_KEYS.map((key): Extractor => (msg) => firstString(msg[key], NESTED_ID_KEYS))
];

export function speakerLabel(msg: JsonRecord): string | undefined {
  return firstMatch(labelExtractors, msg);
}

export function speakerId(msg: JsonRecord): string | undefined {
  return firstMatch(idExtractors, msg);
}

export function isHumanMessage(msg: JsonRecord): boolean {
  return typeof msg.role === 'string' && HUMAN_ROLES.has(msg.role.trim().toLowerCase());
}

const NAME = "([A-Z][A-Za-z'-]{1,39})(?![A-Za-z'-])";

// Heuristic: ordered, first match wins, false positives ("I am Happy") accepted.
const NAME_PATTERNS: readonly RegExp[] = [
  new RegExp(`\\b[Mm]y name is ${NAME}`),
  new RegExp(`\\bI am ${NAME}`),
  new RegExp(`\\bI['’]m ${NAME}`)
];

export function captureSelfIntroduction(content: unknown): string | undefined {
  if (typeof content !== 'string') return undefined;
  for (const pattern of NAME_PATTERNS) {
    const match = pattern.exec(content);
    if (match?.[1]) return match[1];
  }
  return undefined;
}

/** Last human-role message of a transcript, in transcript order. */
export function lastHumanMessage(transcript: readonly unknown[]): JsonRecord | undefined {
  let last: JsonRecord | undefined;
  for (const msg of transcript) {
    if (isRecord(msg) && isHumanMessage(msg)) last = msg;
  }
  return last;
}

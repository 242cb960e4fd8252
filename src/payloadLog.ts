import { appendFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { conversationIdOf, transcriptOf } from './event.js';
import { speakerLabel } from './speakerFields.js';
import { isRecord, type JsonRecord } from './types.js';

function safeSegment(id: string) {
  return id.replace(/[^A-Za-z0-9._-]/g, '_');
}

export function transcriptLines(transcript: readonly unknown[]): string[] {
  const lines: string[] = [];
  for (const msg of transcript) {
    if (!isRecord(msg)) continue;
    const role = typeof msg.role === 'string' ? msg.role : '';
    const content = typeof msg.content === 'string' ? msg.content : '';
    if (!role && !content) continue;
    const label = speakerLabel(msg);
    lines.push(label ? `${label} (${role}): ${content}` : `${role}: ${content}`);
  }
  return lines;
}

/** Append-only per-conversation record of every inbound payload. */
export class PayloadLog {
  constructor(
    private rootDir: string,
    private now: () => Date = () => new Date()
  ) {}

  dirFor(payload: JsonRecord) {
    return join(this.rootDir, safeSegment(conversationIdOf(payload) ?? 'unknown'));
  }

  async append(payload: JsonRecord) {
    const dir = this.dirFor(payload);
    await mkdir(dir, { recursive: true });
    await appendFile(join(dir, 'events.jsonl'), `${JSON.stringify(payload)}\n`, 'utf8');

    const lines = transcriptLines(transcriptOf(payload));
    if (lines.length === 0) return;
    const stamp = payload.timestamp ?? this.now().toISOString();
    const block = [`\n=== Event @ ${String(stamp)} ===`, ...lines].join('\n');
    await appendFile(join(dir, 'transcript.txt'), `${block}\n`, 'utf8');
  }
}

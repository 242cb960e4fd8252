import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { PayloadLog, transcriptLines } from './payloadLog.js';

describe('PayloadLog', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'payload-log-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  test('appends one JSON line per payload under the conversation directory', async () => {
    const log = new PayloadLog(root);
    await log.append({ conversation_id: 'c1', event_type: 'a' });
    await log.append({ conversation_id: 'c1', event_type: 'b' });

    const lines = (await readFile(join(root, 'c1', 'events.jsonl'), 'utf8')).trim().split('\n');
    expect(lines.map((l) => JSON.parse(l))).toEqual([
      { conversation_id: 'c1', event_type: 'a' },
      { conversation_id: 'c1', event_type: 'b' }
    ]);
  });

  test('writes a readable transcript block when a transcript is present', async () => {
    const log = new PayloadLog(root, () => new Date('2024-05-01T10:00:00Z'));
    await log.append({
      properties: {
        transcript: [
          { role: 'user', name: 'Ana', content: 'hello' },
          { role: 'assistant', content: 'hi Ana' }
        ]
      }
    });

    const text = await readFile(join(root, 'unknown', 'transcript.txt'), 'utf8');
    expect(text).toBe('\n=== Event @ 2024-05-01T10:00:00.000Z ===\nAna (user): hello\nassistant: hi Ana\n');
  });

  test('keeps conversation ids inside the log root', () => {
    const log = new PayloadLog(root);
    expect(log.dirFor({ conversation_id: '../etc' })).toBe(join(root, '.._etc'));
  });
});

describe('transcriptLines', () => {
  test('skips entries without role or content', () => {
    expect(transcriptLines([{}, 'x', { role: 'user', speaker: { name: 'Bo' }, content: 'yo' }])).toEqual(['Bo (user): yo']);
  });
});

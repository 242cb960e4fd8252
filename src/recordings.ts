import { mkdir, writeFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { isRecord, nonEmptyString, type JsonRecord } from './types.js';

export interface UploadResult {
  location: string;
  bytes: number;
}

export interface RecordingStore {
  upload(conversationId: string, url: string): Promise<UploadResult>;
}

/** Stores recordings on local disk under `<root>/<conversation_id>/`. */
export class LocalRecordingStore implements RecordingStore {
  constructor(
    private rootDir: string,
    private timeoutMs: number
  ) {}

  async upload(conversationId: string, url: string): Promise<UploadResult> {
    const res = await fetch(url, { signal: AbortSignal.timeout(this.timeoutMs) });
    if (!res.ok) {
      throw new Error(`download failed ${res.status}`);
    }
    const body = Buffer.from(await res.arrayBuffer());

    const dir = join(this.rootDir, conversationId.replace(/[^A-Za-z0-9._-]/g, '_'));
    await mkdir(dir, { recursive: true });
    const location = join(dir, recordingFileName(url));
    await writeFile(location, body);
    return { location, bytes: body.length };
  }
}

export function recordingFileName(url: string) {
  const fallback = `recording-${Date.now()}.mp4`;
  try {
    return basename(new URL(url).pathname) || fallback;
  } catch {
    return fallback;
  }
}

const RECORDING_URL_KEYS = ['recording_url', 'download_url', 'url'] as const;

/** URL of a recording announced by a webhook event, if any. */
export function recordingUrlOf(payload: JsonRecord): string | undefined {
  const eventType = typeof payload.event_type === 'string' ? payload.event_type : '';
  if (!eventType.includes('recording')) return undefined;
  const props = isRecord(payload.properties) ? payload.properties : {};
  for (const key of RECORDING_URL_KEYS) {
    const value = nonEmptyString(props[key]);
    if (value) return value;
  }
  return undefined;
}

import type { Logger } from 'pino';

export interface EchoOutcome {
  ok: boolean;
  skipped?: boolean;
  status?: number;
}

export interface EchoOptions {
  url: string;
  apiKey: string;
  timeoutMs: number;
}

/** Asks the replica to speak the given text. Never rejects. */
export class EchoClient {
  constructor(
    private options: EchoOptions,
    private log: Logger
  ) {}

  get enabled() {
    return this.options.url !== '';
  }

  async say(conversationId: string, text: string): Promise<EchoOutcome> {
    if (!this.enabled) {
      this.log.warn({ conversationId }, 'TAVUS_ECHO_URL not set; echo skipped');
      return { ok: false, skipped: true };
    }

    const headers: Record<string, string> = { 'content-type': 'application/json' };
    if (this.options.apiKey) headers['x-api-key'] = this.options.apiKey;

    const body = {
      message_type: 'conversation',
      event_type: 'conversation.echo',
      conversation_id: conversationId,
      properties: { text }
    };

    try {
      const res = await fetch(this.options.url, {
        method: 'POST',
        headers,
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.options.timeoutMs)
      });
      if (!res.ok) {
        this.log.warn({ conversationId, status: res.status }, 'echo rejected');
        return { ok: false, status: res.status };
      }
      this.log.info({ conversationId }, 'echo sent');
      return { ok: true, status: res.status };
    } catch (error) {
      this.log.error({ conversationId, err: String(error) }, 'echo failed');
      return { ok: false };
    }
  }
}

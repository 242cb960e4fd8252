import express, { type ErrorRequestHandler, type RequestHandler } from 'express';
import type { Logger } from 'pino';
import { registerAdminRoutes } from './adminRoutes.js';
import type { AppConfig } from './config.js';
import { composeResponse, Dispatcher } from './dispatch.js';
import { EchoClient } from './echo.js';
import { conversationIdOf } from './event.js';
import { extractToolCalls } from './extractToolCalls.js';
import { PayloadLog } from './payloadLog.js';
import { LocalRecordingStore, recordingUrlOf, type RecordingStore } from './recordings.js';
import { RosterEngine } from './roster.js';
import { RosterStore } from './store.js';
import { createDefaultRegistry, type ToolRegistry } from './tools.js';
import { isRecord } from './types.js';

export interface AppDeps {
  config: AppConfig;
  log: Logger;
  store?: RosterStore;
  registry?: ToolRegistry;
  echo?: EchoClient;
  recordings?: RecordingStore;
  payloadLog?: PayloadLog;
  now?: () => number;
}

function requireSecret(secret: string): RequestHandler {
  return (req, res, next) => {
    if (!secret) return next();
    const provided = req.header('x-webhook-secret') ?? req.header('x-tavus-secret');
    if (!provided || provided !== secret) {
      return res.status(401).json({ ok: false, error: 'unauthorized' });
    }
    next();
  };
}

export function createApp(deps: AppDeps) {
  const { config, log } = deps;
  const store = deps.store ?? new RosterStore();
  const roster = new RosterEngine(store, log);
  const echo =
    deps.echo ?? new EchoClient({ url: config.echoUrl, apiKey: config.tavusApiKey, timeoutMs: config.echoTimeoutMs }, log);
  const recordings = deps.recordings ?? new LocalRecordingStore(config.recordingsDir, config.echoTimeoutMs);
  const payloadLog = deps.payloadLog ?? new PayloadLog(config.webhookLogDir);
  const dispatcher = new Dispatcher(
    deps.registry ?? createDefaultRegistry(),
    { roster, echo, log, echoPrintMessages: config.echoPrintMessages },
    deps.now
  );

  const app = express();
  // The platform does not always label deliveries as JSON; parse whatever arrives.
  app.use('/tavus/callback', requireSecret(config.webhookSecret), express.json({ limit: '10mb', type: () => true }));
  app.use(express.json({ limit: '1mb' }));

  app.post('/tavus/callback', (req, res) => {
    const payload: unknown = req.body;
    if (!isRecord(payload)) {
      return res.status(400).json({ ok: false, error: 'expected a JSON object' });
    }
    const conversationId = conversationIdOf(payload);

    payloadLog.append(payload).catch((error) => log.error({ conversationId, err: String(error) }, 'failed to persist payload'));

    roster.update(payload);

    const recordingUrl = recordingUrlOf(payload);
    if (recordingUrl && conversationId) {
      recordings
        .upload(conversationId, recordingUrl)
        .then((r) => log.info({ conversationId, location: r.location }, 'recording stored'))
        .catch((error) => log.error({ conversationId, err: String(error) }, 'recording upload failed'));
    }

    const calls = extractToolCalls(payload);
    if (calls.length === 0) {
      log.info({ conversationId, eventType: payload.event_type }, 'event with no tool calls');
      return res.json({ ok: true });
    }

    const records = dispatcher.dispatch(calls, payload);
    res.json(composeResponse(records));
  });

  app.get('/healthz', (_req, res) => res.json({ status: 'ok' }));

  registerAdminRoutes(app, { roster, recordings, echo, announceJoins: config.announceJoins, log });

  const onError: ErrorRequestHandler = (err: unknown, _req, res, next) => {
    if (res.headersSent) return next(err);
    if (isRecord(err) && err.type === 'entity.too.large') {
      return res.status(413).json({ ok: false, error: 'payload too large' });
    }
    if (err instanceof SyntaxError) {
      return res.status(400).json({ ok: false, error: 'invalid JSON' });
    }
    log.error({ err: String(err) }, 'unhandled request error');
    res.status(500).json({ ok: false, error: 'internal error' });
  };
  app.use(onError);

  return app;
}

import type { Express } from 'express';
import type { Logger } from 'pino';
import { z } from 'zod';
import type { EchoClient } from './echo.js';
import type { RecordingStore } from './recordings.js';
import type { RosterEngine } from './roster.js';

export interface AdminDeps {
  roster: RosterEngine;
  recordings: RecordingStore;
  echo: EchoClient;
  announceJoins: boolean;
  log: Logger;
}

const UploadRecordingSchema = z.object({
  conversation_id: z.string().trim().min(1),
  url: z.string().trim().min(1)
});

const RegisterSchema = z.object({
  conversation_id: z.string().trim().min(1),
  display_name: z.string().trim().min(1),
  participant_id: z.string().trim().min(1).optional(),
  active: z.boolean().optional()
});

export function registerAdminRoutes(app: Express, deps: AdminDeps) {
  const { roster, recordings, echo, log } = deps;

  app.post('/admin/upload_recording', async (req, res) => {
    const parsed = UploadRecordingSchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json(parsed.error.flatten());

    const { conversation_id: conversationId, url } = parsed.data;
    try {
      const uploaded = await recordings.upload(conversationId, url);
      log.info({ conversationId, location: uploaded.location, bytes: uploaded.bytes }, 'recording stored');
      return res.json({ ok: true, location: uploaded.location, bytes: uploaded.bytes });
    } catch (error) {
      log.error({ conversationId, url, err: String(error) }, 'recording upload failed');
      return res.status(500).json({ ok: false, error: 'upload failed' });
    }
  });

  app.post('/roster/register', (req, res) => {
    const parsed = RegisterSchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json(parsed.error.flatten());

    const { conversation_id: conversationId, display_name: displayName } = parsed.data;
    const outcome = roster.register({
      conversationId,
      displayName,
      participantId: parsed.data.participant_id,
      active: parsed.data.active
    });

    if (outcome.isNew && deps.announceJoins) {
      void echo.say(conversationId, `Welcome, ${displayName}!`);
    }

    res.json({
      ok: true,
      key: outcome.key,
      is_new: outcome.isNew,
      participants: outcome.participants.map((p) => ({ participant_id: p.participantId, display_name: p.displayName }))
    });
  });

  app.get('/debug/roster/:conversationId', (req, res) => {
    const snapshot = roster.inspect(req.params.conversationId);
    res.json({
      participants: snapshot.participants,
      last_speaker_id: snapshot.lastSpeakerId ?? null,
      last_speaker_name: snapshot.lastSpeakerName ?? null
    });
  });
}

import type { Logger } from 'pino';
import { conversationIdOf, transcriptOf } from './event.js';
import { captureSelfIntroduction, isHumanMessage, lastHumanMessage, speakerId, speakerLabel } from './speakerFields.js';
import type { RosterSnapshot, RosterStore } from './store.js';
import { isRecord, type CurrentSpeaker, type JsonRecord, type RosterParticipant } from './types.js';

export interface RegisterInput {
  conversationId: string;
  displayName: string;
  participantId?: string;
  active?: boolean;
}

export interface RegisterOutcome {
  key: string;
  isNew: boolean;
  participants: RosterParticipant[];
}

export function participantKey(displayName: string, participantId?: string) {
  const id = participantId?.trim();
  return id ? id : `name:${displayName.trim().toLowerCase()}`;
}

/** Sole mutator of the roster table. */
export class RosterEngine {
  constructor(
    private store: RosterStore,
    private log?: Logger
  ) {}

  update(payload: JsonRecord) {
    const conversationId = conversationIdOf(payload);
    if (!conversationId) return;
    this.store.ensure(conversationId);

    let candidate: JsonRecord | undefined;
    for (const msg of transcriptOf(payload)) {
      if (!isRecord(msg)) continue;
      const id = speakerId(msg);
      const label = speakerLabel(msg);
      if (id && label) this.store.upsertParticipant(conversationId, id, label);
      if (isHumanMessage(msg)) candidate = msg;
    }
    if (!candidate) return;

    const id = speakerId(candidate);
    const name = speakerLabel(candidate) ?? captureSelfIntroduction(candidate.content);
    if (id || name) {
      this.store.setLastSpeaker(conversationId, { id, name });
      this.log?.debug({ conversationId, speakerId: id, speakerName: name }, 'active speaker updated');
    }
  }

  /** Falls back to the only known conversation when the id is missing or unknown. */
  resolveConversation(conversationId?: string) {
    if (conversationId && this.store.has(conversationId)) return conversationId;
    if (this.store.size === 1) return this.store.conversationIds()[0];
    return conversationId;
  }

  currentSpeaker(conversationId: string | undefined, payload: JsonRecord): CurrentSpeaker {
    const resolved = this.resolveConversation(conversationId);

    const fresh = lastHumanMessage(transcriptOf(payload));
    const freshLabel = fresh ? speakerLabel(fresh) : undefined;
    if (fresh && freshLabel) {
      return {
        conversationId: resolved,
        participantId: speakerId(fresh),
        displayName: freshLabel,
        confident: true,
        source: 'transcript'
      };
    }

    const stored = resolved ? this.store.snapshot(resolved) : undefined;
    if (stored && (stored.lastSpeakerId || stored.lastSpeakerName)) {
      return {
        conversationId: resolved,
        participantId: stored.lastSpeakerId,
        displayName: stored.lastSpeakerName,
        confident: true,
        source: 'memory'
      };
    }

    return { conversationId: resolved, confident: false, source: 'unknown' };
  }

  roster(conversationId: string | undefined): RosterParticipant[] {
    const resolved = this.resolveConversation(conversationId);
    return resolved ? this.store.participants(resolved) : [];
  }

  participantName(conversationId: string | undefined, participantId: string) {
    const resolved = this.resolveConversation(conversationId);
    return resolved ? this.store.participantName(resolved, participantId) : undefined;
  }

  register(input: RegisterInput): RegisterOutcome {
    const displayName = input.displayName.trim();
    const key = participantKey(displayName, input.participantId);
    const isNew = this.store.upsertParticipant(input.conversationId, key, displayName);
    if (input.active) {
      this.store.setLastSpeaker(input.conversationId, { id: key, name: displayName });
    }
    this.log?.info({ conversationId: input.conversationId, key, isNew, active: !!input.active }, 'participant registered');
    return { key, isNew, participants: this.store.participants(input.conversationId) };
  }

  /** Debug view; creates the entry on first reference like any other read path. */
  inspect(conversationId: string): RosterSnapshot {
    this.store.ensure(conversationId);
    return this.store.snapshot(conversationId);
  }
}

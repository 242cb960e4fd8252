import type { RosterEntry, RosterParticipant } from './types.js';

export interface RosterSnapshot {
  participants: Record<string, string>;
  lastSpeakerId?: string;
  lastSpeakerName?: string;
}

/**
 * Process-wide roster table keyed by conversation id. Entries are created on
 * first reference and never evicted. Every mutator is a synchronous
 * read-modify-write, so concurrent requests cannot interleave inside one.
 */
export class RosterStore {
  private entries = new Map<string, RosterEntry>();

  get size() {
    return this.entries.size;
  }

  has(conversationId: string) {
    return this.entries.has(conversationId);
  }

  conversationIds() {
    return [...this.entries.keys()];
  }

  ensure(conversationId: string): RosterEntry {
    let entry = this.entries.get(conversationId);
    if (!entry) {
      entry = { participants: new Map() };
      this.entries.set(conversationId, entry);
    }
    return entry;
  }

  /** Returns true when the key was not known before. */
  upsertParticipant(conversationId: string, participantId: string, displayName: string) {
    const { participants } = this.ensure(conversationId);
    const isNew = !participants.has(participantId);
    participants.set(participantId, displayName);
    return isNew;
  }

  setLastSpeaker(conversationId: string, speaker: { id?: string; name?: string }) {
    const entry = this.ensure(conversationId);
    if (speaker.id) entry.lastSpeakerId = speaker.id;
    if (speaker.name) entry.lastSpeakerName = speaker.name;
  }

  participantName(conversationId: string, participantId: string) {
    return this.entries.get(conversationId)?.participants.get(participantId);
  }

  participants(conversationId: string): RosterParticipant[] {
    const entry = this.entries.get(conversationId);
    if (!entry) return [];
    return [...entry.participants].map(([participantId, displayName]) => ({ participantId, displayName }));
  }

  snapshot(conversationId: string): RosterSnapshot {
    const entry = this.entries.get(conversationId);
    if (!entry) return { participants: {} };
    return {
      participants: Object.fromEntries(entry.participants),
      lastSpeakerId: entry.lastSpeakerId,
      lastSpeakerName: entry.lastSpeakerName
    };
  }
}

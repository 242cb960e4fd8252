import type { Logger } from 'pino';
import type { EchoClient } from './echo.js';
import type { RosterEngine } from './roster.js';
import { nonEmptyString, type TavusEvent, type ToolResult } from './types.js';

export interface ToolContext {
  roster: RosterEngine;
  echo: EchoClient;
  log: Logger;
  echoPrintMessages: boolean;
}

export type ToolHandler = (event: TavusEvent, ctx: ToolContext) => ToolResult;

export class ToolRegistry {
  private handlers = new Map<string, ToolHandler>();

  register(name: string, handler: ToolHandler) {
    this.handlers.set(name, handler);
    return this;
  }

  get(name: string) {
    return this.handlers.get(name);
  }

  names() {
    return [...this.handlers.keys()];
  }
}

/** Tool argument first, then the same key under `data`. */
function arg(event: TavusEvent, key: string): unknown {
  const fromTool = event.tool?.arguments[key];
  if (fromTool !== undefined && fromTool !== null && fromTool !== '') return fromTool;
  return event.data[key];
}

function textArg(event: TavusEvent, key: string) {
  const value = arg(event, key);
  return typeof value === 'string' ? value : '';
}

const summarizeDiscussion: ToolHandler = (event) => {
  const bullets = textArg(event, 'transcript')
    .split('\n')
    .map((line) => line.trim())
    .filter(Boolean)
    .slice(0, 5);
  return { summary: bullets };
};

const takeMeetingNotes: ToolHandler = (event) => {
  const content = textArg(event, 'content');
  return { notes: content ? [content] : [] };
};

const clusterIdeas: ToolHandler = (event) => {
  const ideas = arg(event, 'ideas');
  const clusters: Record<string, string[]> = {};
  if (!Array.isArray(ideas)) return { clusters };
  for (const idea of ideas) {
    const text = typeof idea === 'string' ? idea : '';
    const key = text ? text.split(' ')[0].toLowerCase() : 'misc';
    (clusters[key] ??= []).push(text);
  }
  return { clusters };
};

const printMessage: ToolHandler = (event, ctx) => {
  const text = textArg(event, 'text');
  ctx.log.info({ conversationId: event.conversationId, text }, 'print_message');
  if (ctx.echoPrintMessages && text && event.conversationId) {
    void ctx.echo.say(event.conversationId, text);
  }
  return { printed: true };
};

const acknowledge: ToolHandler = (event) => ({ acknowledged: true, trigger: event.tool?.name ?? null });

const getCurrentSpeaker: ToolHandler = (event, ctx) => {
  const s = ctx.roster.currentSpeaker(event.conversationId, { properties: event.properties });
  return {
    conversation_id: s.conversationId ?? null,
    participant_id: s.participantId ?? null,
    display_name: s.displayName ?? null,
    confident: s.confident,
    source: s.source
  };
};

const getSpeakerName: ToolHandler = (event, ctx) => {
  const participantId = nonEmptyString(arg(event, 'participant_id'));
  if (participantId) {
    const name = ctx.roster.participantName(event.conversationId, participantId);
    if (name) return { name, participant_id: participantId, confident: true };
  }
  const s = ctx.roster.currentSpeaker(event.conversationId, { properties: event.properties });
  return { name: s.displayName ?? null, participant_id: s.participantId ?? null, confident: s.confident };
};

const getRoster: ToolHandler = (event, ctx) => {
  const participants = ctx.roster.roster(event.conversationId).map((p) => ({
    participant_id: p.participantId,
    display_name: p.displayName
  }));
  return { conversation_id: ctx.roster.resolveConversation(event.conversationId) ?? null, participants };
};

export const SESSION_FLOW_TOOLS = ['start_session', 'next_agenda_item', 'end_session'] as const;

export function createDefaultRegistry() {
  const registry = new ToolRegistry()
    .register('summarize_discussion', summarizeDiscussion)
    .register('take_meeting_notes', takeMeetingNotes)
    .register('cluster_ideas', clusterIdeas)
    .register('print_message', printMessage)
    .register('get_speaker_name', getSpeakerName)
    .register('get_current_speaker', getCurrentSpeaker)
    .register('get_roster', getRoster);
  for (const name of SESSION_FLOW_TOOLS) registry.register(name, acknowledge);
  return registry;
}

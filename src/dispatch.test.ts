import pino from 'pino';
import { composeResponse, Dispatcher } from './dispatch.js';
import { EchoClient } from './echo.js';
import { RosterEngine } from './roster.js';
import { RosterStore } from './store.js';
import { createDefaultRegistry, type ToolContext } from './tools.js';

const log = pino({ level: 'silent' });

function setup(store = new RosterStore(), echoPrintMessages = false) {
  const echo = new EchoClient({ url: '', apiKey: '', timeoutMs: 1000 }, log);
  const say = jest.spyOn(echo, 'say').mockResolvedValue({ ok: true });
  const ctx: ToolContext = {
    roster: new RosterEngine(store, log),
    echo,
    log,
    echoPrintMessages
  };
  const registry = createDefaultRegistry().register('explode', () => {
    throw new Error('boom');
  });
  return { store, ctx, say, dispatcher: new Dispatcher(registry, ctx, () => 1_700_000_000_000) };
}

describe('Dispatcher', () => {
  test('contains unknown tools and keeps going', () => {
    const { dispatcher } = setup();
    const records = dispatcher.dispatch(
      [
        { name: 'take_meeting_notes', arguments: { content: 'ship friday' }, callId: 'a' },
        { name: 'no_such_tool', arguments: {}, callId: 'b' },
        { name: 'print_message', arguments: { text: 'hi' }, callId: 'c' }
      ],
      { conversation_id: 'c1' }
    );
    expect(records).toEqual([
      { name: 'take_meeting_notes', callId: 'a', arguments: { content: 'ship friday' }, result: { notes: ['ship friday'] } },
      { name: 'no_such_tool', callId: 'b', arguments: {}, result: { error: 'unknown tool: no_such_tool' } },
      { name: 'print_message', callId: 'c', arguments: { text: 'hi' }, result: { printed: true } }
    ]);
  });

  test('turns a thrown handler error into an error result', () => {
    const { dispatcher } = setup();
    const [record] = dispatcher.dispatch([{ name: 'explode', arguments: {} }], {});
    expect(record.result).toEqual({ error: 'boom' });
  });

  test('falls back to data fields for handler arguments', () => {
    const { dispatcher } = setup();
    const [summary, clusters] = dispatcher.dispatch(
      [
        { name: 'summarize_discussion', arguments: {} },
        { name: 'cluster_ideas', arguments: { ideas: ['Launch beta', 'launch ads', 'Hire', ''] } }
      ],
      { data: { transcript: 'a\n\n b \nc\nd\ne\nf' } }
    );
    expect(summary.result).toEqual({ summary: ['a', 'b', 'c', 'd', 'e'] });
    expect(clusters.result).toEqual({ clusters: { launch: ['Launch beta', 'launch ads'], hire: ['Hire'], misc: [''] } });
  });

  test('acknowledges session-flow triggers', () => {
    const { dispatcher } = setup();
    const [record] = dispatcher.dispatch([{ name: 'next_agenda_item', arguments: {} }], {});
    expect(record.result).toEqual({ acknowledged: true, trigger: 'next_agenda_item' });
  });

  test('answers roster tools from the shared store', () => {
    const { store, dispatcher } = setup();
    store.upsertParticipant('c1', 'p1', 'Ana');
    store.setLastSpeaker('c1', { id: 'p1', name: 'Ana' });

    const [current, name, roster] = dispatcher.dispatch(
      [
        { name: 'get_current_speaker', arguments: {} },
        { name: 'get_speaker_name', arguments: { participant_id: 'p1' } },
        { name: 'get_roster', arguments: {} }
      ],
      { conversation_id: 'c1' }
    );
    expect(current.result).toEqual({
      conversation_id: 'c1',
      participant_id: 'p1',
      display_name: 'Ana',
      confident: true,
      source: 'memory'
    });
    expect(name.result).toEqual({ name: 'Ana', participant_id: 'p1', confident: true });
    expect(roster.result).toEqual({ conversation_id: 'c1', participants: [{ participant_id: 'p1', display_name: 'Ana' }] });
  });

  test('get_speaker_name ignores ids that only exist on the object prototype', () => {
    const { store, dispatcher } = setup();
    store.ensure('c1');
    const [record] = dispatcher.dispatch([{ name: 'get_speaker_name', arguments: { participant_id: 'constructor' } }], {
      conversation_id: 'c1'
    });
    expect(record.result).toEqual({ name: null, participant_id: null, confident: false });
  });

  test('print_message echoes its text when enabled', () => {
    const { dispatcher, say } = setup(new RosterStore(), true);
    const [record] = dispatcher.dispatch([{ name: 'print_message', arguments: { text: 'Welcome back' } }], {
      conversation_id: 'c1'
    });
    expect(record.result).toEqual({ printed: true });
    expect(say).toHaveBeenCalledWith('c1', 'Welcome back');
  });

  test('print_message does not echo without a conversation id', () => {
    const { dispatcher, say } = setup(new RosterStore(), true);
    dispatcher.dispatch([{ name: 'print_message', arguments: { text: 'Welcome back' } }], {});
    expect(say).not.toHaveBeenCalled();
  });

  test('print_message does not echo when disabled', () => {
    const { dispatcher, say } = setup();
    dispatcher.dispatch([{ name: 'print_message', arguments: { text: 'hi' } }], { conversation_id: 'c1' });
    expect(say).not.toHaveBeenCalled();
  });

  test('get_speaker_name falls back to the current speaker', () => {
    const { dispatcher } = setup();
    const [record] = dispatcher.dispatch([{ name: 'get_speaker_name', arguments: {} }], {
      conversation_id: 'c1',
      properties: { transcript: [{ role: 'user', name: 'Rae' }] }
    });
    expect(record.result).toEqual({ name: 'Rae', participant_id: null, confident: true });
  });
});

describe('composeResponse', () => {
  test('returns exactly { ok: true } for no calls', () => {
    expect(composeResponse([])).toEqual({ ok: true });
    expect(Object.keys(composeResponse([]))).toEqual(['ok']);
  });

  test('flattens a single call to the top level', () => {
    const response = composeResponse([{ name: 'get_roster', callId: 'x1', arguments: {}, result: { participants: [] } }]);
    expect(response).toEqual({
      ok: true,
      tool_calls: [{ id: 'x1', name: 'get_roster', result: { participants: [] } }],
      results: { get_roster: { participants: [] } },
      tool_results: [{ name: 'get_roster', call_id: 'x1', arguments: {}, result: { participants: [] } }],
      responses: [{ tool_call_id: 'x1', result: { participants: [] } }],
      tool_call_id: 'x1',
      result: { participants: [] }
    });
  });

  test('keeps order across shapes and lets the last result win by name', () => {
    const response = composeResponse([
      { name: 'print_message', arguments: { text: 'a' }, result: { printed: true } },
      { name: 'take_meeting_notes', callId: 'n', arguments: {}, result: { notes: [] } },
      { name: 'print_message', callId: 'p2', arguments: { text: 'b' }, result: { error: 'x' } }
    ]);
    expect(response.responses).toEqual([
      { tool_call_id: null, result: { printed: true } },
      { tool_call_id: 'n', result: { notes: [] } },
      { tool_call_id: 'p2', result: { error: 'x' } }
    ]);
    expect(response.results).toEqual({ print_message: { error: 'x' }, take_meeting_notes: { notes: [] } });
    expect(response.tool_calls?.map((c) => c.id)).toEqual([null, 'n', 'p2']);
    expect(response).not.toHaveProperty('tool_call_id');
    expect(response).not.toHaveProperty('result');
  });
});

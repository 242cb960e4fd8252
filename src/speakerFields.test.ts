import { captureSelfIntroduction, lastHumanMessage, speakerId, speakerLabel } from './speakerFields.js';

describe('speaker field extraction', () => {
  test('reads a direct label before nested containers', () => {
    expect(speakerLabel({ displayName: 'Jo', speaker: { name: 'Other' } })).toBe('Jo');
  });

  test('reads the nested speaker object next', () => {
    expect(speakerLabel({ role: 'user', speaker: { name: 'Kai', id: 'p-7' } })).toBe('Kai');
    expect(speakerId({ role: 'user', speaker: { name: 'Kai', id: 'p-7' } })).toBe('p-7');
  });

  test('falls back to sender, user and participant containers in order', () => {
    expect(speakerLabel({ user: { display_name: 'Uma' }, participant: { name: 'Pat' } })).toBe('Uma');
    expect(speakerLabel({ participant: { userName: 'Pat' } })).toBe('Pat');
    expect(speakerId({ sender: { id: 's-1' }, user: { user_id: 'u-1' } })).toBe('s-1');
  });

  test('does not take a bare message id as a participant id', () => {
    expect(speakerId({ id: 'msg-1', role: 'user' })).toBeUndefined();
    expect(speakerId({ id: 'msg-1', participant_id: 'p-1' })).toBe('p-1');
  });

  test('ignores blank values', () => {
    expect(speakerLabel({ name: '   ', user_name: 'Lee' })).toBe('Lee');
  });
});

// Heuristic: these cover the intended patterns, not every phrasing.
describe('captureSelfIntroduction', () => {
  test.each([
    ['my name is Alex', 'Alex'],
    ["I'm Priya, nice to meet you", 'Priya'],
    ['I’m Sam', 'Sam'],
    ['Hello, I am Jean-Luc.', 'Jean-Luc'],
    ["My name is O'Neil and I am Bob", "O'Neil"]
  ])('%s', (content, expected) => {
    expect(captureSelfIntroduction(content)).toBe(expected);
  });

  test('requires a capitalised token of at least two letters', () => {
    expect(captureSelfIntroduction('i am tired')).toBeUndefined();
    expect(captureSelfIntroduction('I am going home')).toBeUndefined();
    expect(captureSelfIntroduction('I am X')).toBeUndefined();
  });

  test('rejects tokens longer than forty characters', () => {
    expect(captureSelfIntroduction(`my name is A${'b'.repeat(40)}`)).toBeUndefined();
  });
});

describe('lastHumanMessage', () => {
  test('returns the last human-role message in transcript order', () => {
    const transcript = [
      { role: 'user', content: 'first' },
      { role: 'assistant', content: 'reply' },
      { role: 'Participant', content: 'second' },
      { role: 'system', content: 'x' }
    ];
    expect(lastHumanMessage(transcript)).toEqual({ role: 'Participant', content: 'second' });
  });

  test('returns undefined without human messages', () => {
    expect(lastHumanMessage([{ role: 'assistant', content: 'hi' }])).toBeUndefined();
  });
});

import {
  extractReply,
  firstStringDeep,
  fromCandidateList,
  fromTopLevelField,
} from '../src/infrastructure/http/replyExtraction.js';

describe('reply extraction', () => {
  describe('fromCandidateList', () => {
    test('reads Gemini candidate parts', () => {
      const payload = { candidates: [{ content: { parts: [{ text: 'hi there' }] } }] };
      expect(fromCandidateList(payload)).toBe('hi there');
    });

    test('uses a plain string element directly', () => {
      expect(fromCandidateList({ outputs: ['plain reply'] })).toBe('plain reply');
    });

    test('prefers content over text within the first element', () => {
      expect(fromCandidateList({ output: [{ text: 'second', content: 'first' }] })).toBe('first');
    });

    test('only looks at the first element', () => {
      expect(fromCandidateList({ candidates: [{ finishReason: 'SAFETY' }, { text: 'later' }] })).toBeUndefined();
    });

    test('skips empty lists', () => {
      expect(fromCandidateList({ candidates: [], outputs: ['from outputs'] })).toBe('from outputs');
    });
  });

  describe('fromTopLevelField', () => {
    test('checks fields in order', () => {
      expect(fromTopLevelField({ text: 'last', generated_text: 'second' })).toBe('second');
    });

    test('ignores blank values', () => {
      expect(fromTopLevelField({ content: '   ', response: 'answer' })).toBe('answer');
    });
  });

  describe('firstStringDeep', () => {
    test('walks nested arrays and objects', () => {
      expect(firstStringDeep({ a: [1, { b: '' }, { c: 'found' }], d: 'not reached' })).toBe('found');
    });

    test('returns undefined when no string exists', () => {
      expect(firstStringDeep({ a: [1, 2, { b: null }] })).toBeUndefined();
    });
  });

  describe('extractReply', () => {
    test('falls through strategies until one yields text', () => {
      expect(extractReply({ candidates: [{}], response: 'top level' })).toBe('top level');
    });

    test('falls back to any string in the payload', () => {
      expect(extractReply({ weird: { nested: ['deep text'] } })).toBe('deep text');
    });

    test('returns undefined for payloads without text', () => {
      expect(extractReply({})).toBeUndefined();
      expect(extractReply(null)).toBeUndefined();
      expect(extractReply({ candidates: [{ content: { parts: [{ text: '' }] } }] })).toBeUndefined();
    });

    test('accepts a custom strategy list', () => {
      expect(extractReply({ text: 'ignored' }, [() => 'custom'])).toBe('custom');
    });
  });
});

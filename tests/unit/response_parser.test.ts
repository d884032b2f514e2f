import { describe, it, expect } from 'vitest';
import {
  findMatchingBrace,
  parseModelResponse,
  ResponseParseError,
  stripCodeFence,
} from '@/llm/response_parser';

function parseError(raw: string): ResponseParseError {
  try {
    parseModelResponse(raw);
  } catch (error) {
    if (error instanceof ResponseParseError) return error;
    throw error;
  }
  throw new Error('expected parseModelResponse to throw');
}

describe('response parser', () => {
  describe('parseModelResponse', () => {
    it('parses a bare JSON object', () => {
      expect(parseModelResponse('{"code":"NVDA.US","technical_score":8}')).toEqual({
        code: 'NVDA.US',
        technical_score: 8,
      });
    });

    it('strips a json code fence', () => {
      expect(parseModelResponse('```json\n{"a":1}\n```')).toEqual({ a: 1 });
    });

    it('strips a fence without a language tag', () => {
      expect(parseModelResponse('```\n{"a":1}\n```')).toEqual({ a: 1 });
    });

    it('ignores reasoning blocks before the answer', () => {
      const raw = '<think>Draft: {"draft":true}</think>\nHere is my answer: {"a":2} hope it helps';
      expect(parseModelResponse(raw)).toEqual({ a: 2 });
    });

    it('parses an object between leading noise and trailing text', () => {
      expect(parseModelResponse('noise {"a":1} trailing text')).toEqual({ a: 1 });
    });

    it('fails with NotFound when there are no braces', () => {
      expect(parseError('no braces here').kind).toBe('NotFound');
    });

    it('strips an upper-case fence tag', () => {
      expect(parseModelResponse('```JSON\n{"a":1}\n```')).toEqual({ a: 1 });
    });

    it('finds an object embedded in prose', () => {
      expect(parseModelResponse('Sure! {"rating":"Buy"} Let me know.')).toEqual({ rating: 'Buy' });
    });

    it('does not count braces inside string values', () => {
      const raw = 'Result: {"reason":"guides {higher} than peers","score":7} end';
      expect(parseModelResponse(raw)).toEqual({ reason: 'guides {higher} than peers', score: 7 });
    });

    it('keeps nested objects intact', () => {
      expect(parseModelResponse('x {"outer":{"inner":1}} y')).toEqual({ outer: { inner: 1 } });
    });

    it('skips a brace-delimited fragment that is not JSON', () => {
      expect(parseModelResponse('note {not json} then {"a":3}')).toEqual({ a: 3 });
    });

    it('finds an object after an unclosed opening brace', () => {
      expect(parseModelResponse('draft { then {"a":1}')).toEqual({ a: 1 });
    });

    it('scans a long run of unclosed braces in one pass', () => {
      const raw = '{'.repeat(30000) + '{"a":1}';
      const startedAt = Date.now();

      expect(parseModelResponse(raw)).toEqual({ a: 1 });
      expect(Date.now() - startedAt).toBeLessThan(1000);
    });

    it('reports NotFound for a long run of unclosed braces', () => {
      expect(parseError('{"a":'.repeat(20000)).kind).toBe('NotFound');
    });

    it('reports NotFound when no object is present', () => {
      const error = parseError('I cannot score this instrument.');
      expect(error.kind).toBe('NotFound');
      expect(error.message).toBe('No JSON object found in model response');
    });

    it('reports NotFound for an unterminated object', () => {
      expect(parseError('text {"a": 1').kind).toBe('NotFound');
    });

    it('reports NotAnObject for a top-level array', () => {
      const error = parseError('[1, 2]');
      expect(error.kind).toBe('NotAnObject');
      expect(error.message).toBe('Model response is a JSON array, not an object');
    });

    it('reports NotAnObject for a top-level string', () => {
      expect(parseError('"just text"').message).toBe('Model response is a JSON string, not an object');
    });

    it('reports NotAnObject for null', () => {
      expect(parseError('null').message).toBe('Model response is a JSON null, not an object');
    });
  });

  describe('stripCodeFence', () => {
    it('leaves unfenced text alone apart from trimming', () => {
      expect(stripCodeFence('  {"a":1}  ')).toBe('{"a":1}');
    });
  });

  describe('findMatchingBrace', () => {
    it('returns the index of the closing brace', () => {
      expect(findMatchingBrace('{"a":{"b":1}}', 0)).toBe(12);
    });

    it('handles escaped quotes inside strings', () => {
      const text = '{"a":"say \\"}\\" now"}';
      expect(findMatchingBrace(text, 0)).toBe(text.length - 1);
    });

    it('returns -1 when unbalanced', () => {
      expect(findMatchingBrace('{"a":{', 0)).toBe(-1);
    });
  });
});

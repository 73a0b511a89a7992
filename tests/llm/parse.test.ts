import { describe, expect, it } from 'vitest';

import { extractFirstObject, extractJSONArray, parseOracleJson } from '../../src/llm/parse.js';

describe('extractFirstObject', () => {
  it('ignores braces inside string literals', () => {
    const raw = 'Sure! {"tool":"search_products","parameters":{"keyword":"a}b"}} hope that helps';
    expect(extractFirstObject(raw)).toBe('{"tool":"search_products","parameters":{"keyword":"a}b"}}');
  });

  it('skips an unbalanced opening brace and takes the next balanced object', () => {
    expect(extractFirstObject('{ oops {"tool":"a"}')).toBe('{"tool":"a"}');
  });

  it('returns null when nothing balances', () => {
    expect(extractFirstObject('no json here')).toBeNull();
  });
});

describe('parseOracleJson', () => {
  it('parses an embedded object', () => {
    const result = parseOracleJson('```json\n{"tool": "analyze_reviews"}\n```');
    expect(result).toEqual({ kind: 'parsed', value: { tool: 'analyze_reviews' } });
  });

  it('reports missing JSON', () => {
    const result = parseOracleJson('I think you should search.');
    expect(result.kind).toBe('unparseable');
    if (result.kind === 'unparseable') {
      expect(result.reason).toBe('No JSON object found in response');
    }
  });

  it('reports invalid JSON inside balanced braces', () => {
    const result = parseOracleJson('{tool: search}');
    expect(result.kind).toBe('unparseable');
    if (result.kind === 'unparseable') {
      expect(result.reason.startsWith('Invalid JSON:')).toBe(true);
    }
  });
});

describe('extractJSONArray', () => {
  it('prefers a fenced block', () => {
    expect(extractJSONArray('Plan:\n```json\n["a", "b"]\n```')).toBe('["a", "b"]');
  });

  it('returns null without brackets', () => {
    expect(extractJSONArray('step one\nstep two')).toBeNull();
  });
});

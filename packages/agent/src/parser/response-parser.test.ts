import { describe, it, expect } from 'vitest';
import {
  extractTextContent,
  hasToolCalls,
  normalizeContent,
  parseResponse,
} from './response-parser.js';

describe('hasToolCalls', () => {
  it('is false for plain string content', () => {
    expect(hasToolCalls({ content: 'just text' })).toBe(false);
  });

  it('is false for null content', () => {
    expect(hasToolCalls({ content: null })).toBe(false);
  });

  it('is false when only text blocks are present', () => {
    expect(hasToolCalls({ content: [{ type: 'text', text: 'hi' }] })).toBe(false);
  });

  it('is true when any block is a tool_use', () => {
    expect(
      hasToolCalls({
        content: [
          { type: 'text', text: 'let me look' },
          { type: 'tool_use', id: 'toolu_1', name: 'list_files', input: {} },
        ],
      }),
    ).toBe(true);
  });

  it('is true for a flagged tool_use even when it is malformed', () => {
    expect(hasToolCalls({ content: [{ type: 'tool_use' }] })).toBe(true);
  });
});

describe('parseResponse', () => {
  it('returns calls in block order', () => {
    const calls = parseResponse({
      content: [
        { type: 'tool_use', id: 'toolu_1', name: 'read_file', input: { path: 'a.txt' } },
        { type: 'text', text: 'and also' },
        { type: 'tool_use', id: 'toolu_2', name: 'list_files', input: { path: '.' } },
      ],
    });

    expect(calls).toEqual([
      { id: 'toolu_1', name: 'read_file', input: { path: 'a.txt' } },
      { id: 'toolu_2', name: 'list_files', input: { path: '.' } },
    ]);
  });

  it('returns nothing for string content', () => {
    expect(parseResponse({ content: 'no tools here' })).toEqual([]);
  });

  it('skips blocks missing id or name and reports them', () => {
    const skipped: string[] = [];

    const calls = parseResponse(
      {
        content: [
          { type: 'tool_use', name: 'no_id', input: {} },
          { type: 'tool_use', id: 'toolu_2', input: {} },
          { type: 'tool_use', id: '', name: 'empty_id', input: {} },
          { type: 'tool_use', id: 'toolu_4', name: 'ok', input: {} },
        ],
      },
      (reason) => skipped.push(reason),
    );

    expect(calls).toEqual([{ id: 'toolu_4', name: 'ok', input: {} }]);
    expect(skipped).toHaveLength(3);
  });

  it('decodes JSON-string input', () => {
    const calls = parseResponse({
      content: [{ type: 'tool_use', id: 't1', name: 'shell', input: '{"command":"ls -la"}' }],
    });

    expect(calls[0]?.input).toEqual({ command: 'ls -la' });
  });

  it('keeps undecodable string input under raw_input', () => {
    const calls = parseResponse({
      content: [{ type: 'tool_use', id: 't1', name: 'shell', input: 'ls -la' }],
    });

    expect(calls[0]?.input).toEqual({ raw_input: 'ls -la' });
  });

  it('treats missing input as an empty object', () => {
    const calls = parseResponse({ content: [{ type: 'tool_use', id: 't1', name: 'now' }] });

    expect(calls).toEqual([{ id: 't1', name: 'now', input: {} }]);
  });

  it('skips non-object input', () => {
    const skipped: string[] = [];

    const calls = parseResponse(
      { content: [{ type: 'tool_use', id: 't1', name: 'x', input: [1, 2] }] },
      (reason) => skipped.push(reason),
    );

    expect(calls).toEqual([]);
    expect(skipped).toEqual(["tool_use block 't1' has non-object input"]);
  });

  it('ignores non-object blocks', () => {
    expect(parseResponse({ content: ['stray', 42, null] })).toEqual([]);
  });
});

describe('extractTextContent', () => {
  it('returns string content as-is', () => {
    expect(extractTextContent({ content: 'Here are your files.' })).toBe('Here are your files.');
  });

  it('joins text blocks with newlines', () => {
    expect(
      extractTextContent({
        content: [
          { type: 'text', text: 'first' },
          { type: 'tool_use', id: 't1', name: 'x', input: {} },
          { type: 'text', text: 'second' },
        ],
      }),
    ).toBe('first\nsecond');
  });

  it('skips empty text blocks', () => {
    expect(
      extractTextContent({
        content: [
          { type: 'text', text: '' },
          { type: 'text', text: 'only' },
        ],
      }),
    ).toBe('only');
  });

  it('returns empty string when there is no text', () => {
    expect(extractTextContent({ content: [{ type: 'tool_use', id: 't1', name: 'x', input: {} }] })).toBe('');
    expect(extractTextContent({ content: null })).toBe('');
    expect(extractTextContent({ content: [] })).toBe('');
  });
});

describe('normalizeContent', () => {
  it('maps wire blocks onto the tagged union and drops unknown kinds', () => {
    expect(
      normalizeContent({
        content: [
          { type: 'thinking', thinking: 'hmm' },
          { type: 'text', text: 'ok' },
          { type: 'tool_use', id: 't1', name: 'x', input: { a: 1 } },
        ],
      }),
    ).toEqual([
      { kind: 'TEXT', text: 'ok' },
      { kind: 'TOOL_USE', id: 't1', name: 'x', input: { a: 1 } },
    ]);
  });

  it('wraps string content in a single text block', () => {
    expect(normalizeContent({ content: 'hello' })).toEqual([{ kind: 'TEXT', text: 'hello' }]);
  });
});

import { describe, it, expect, vi } from 'vitest';
import {
  extractJsonBlock,
  normalizeMojibake,
  normalizeResponse,
  parseVerdictArray,
  repairJsonText,
  repairQuotes,
  stripInvalidEscapes,
} from './normalizer.js';

describe('extractJsonBlock', () => {
  it('returns the inside of a fenced json block', () => {
    const text = 'Sure, here it is:\n```json\n[{"comment_id":"1"}]\n```\nAnything else?';
    expect(extractJsonBlock(text)).toBe('[{"comment_id":"1"}]');
  });

  it('falls back to the trimmed text without a fence', () => {
    expect(extractJsonBlock('  \n[1, 2]\n  ')).toBe('[1, 2]');
  });

  it('ignores fences that are not tagged json', () => {
    expect(extractJsonBlock('```\n[1]\n```')).toBe('```\n[1]\n```');
  });
});

describe('normalizeMojibake', () => {
  it('restores smart quotes decoded as Mac Roman', () => {
    expect(normalizeMojibake('‚ÄúHi‚Äù and ‚Äòyo‚Äô')).toBe('“Hi” and ‘yo’');
  });

  it('restores smart quotes decoded as Windows-1252', () => {
    expect(normalizeMojibake('â€œokâ€\u009D it’s â€˜fineâ€™')).toBe('“ok” it’s ‘fine’');
  });

  it('leaves clean text alone', () => {
    expect(normalizeMojibake('[{"a": "b"}]')).toBe('[{"a": "b"}]');
  });
});

describe('repairQuotes', () => {
  it('turns curly double quotes into ASCII quotes', () => {
    expect(repairQuotes('{“comment_id”: “7”}')).toBe('{"comment_id": "7"}');
  });

  it('keeps escaped lookalikes', () => {
    expect(repairQuotes('a \\“ b')).toBe('a \\“ b');
  });
});

describe('stripInvalidEscapes', () => {
  it('drops a backslash that does not start a JSON escape', () => {
    expect(stripInvalidEscapes('C:\\path')).toBe('C:path');
  });

  it('keeps valid escapes, including an escaped backslash', () => {
    const text = 'line\\nnext \\"q\\" \\\\ \\u00e9 \\/ \\t';
    expect(stripInvalidEscapes(text)).toBe(text);
  });
});

describe('repairJsonText', () => {
  it('applies every repair in order', () => {
    expect(repairJsonText('[{“id”: "‚Äúx‚Äù \\q"}]')).toBe('[{"id": ""x" q"}]');
  });
});

describe('normalizeResponse', () => {
  it('passes well-formed JSON through unchanged', () => {
    const verdicts = [
      { comment_id: '1', is_offensive: false, offense_type: 'none', explanation: 'Polite question.' },
      { comment_id: '2', is_offensive: true, offense_type: 'insult', explanation: 'Calls the author an idiot.' },
    ];
    expect(normalizeResponse(JSON.stringify(verdicts))).toEqual(verdicts);
  });

  it('parses only the fenced block', () => {
    const raw =
      'Here are the results:\n```json\n[{"comment_id":"1","is_offensive":true,"offense_type":"insult","explanation":"Name-calling."}]\n```\nHope this helps.';
    expect(normalizeResponse(raw)).toEqual([
      { comment_id: '1', is_offensive: true, offense_type: 'insult', explanation: 'Name-calling.' },
    ]);
  });

  it('returns an empty list and warns for garbage', () => {
    const logger = vi.fn();
    expect(normalizeResponse('not json at all', logger)).toEqual([]);
    expect(logger).toHaveBeenCalledTimes(1);
    expect(logger).toHaveBeenCalledWith(expect.stringContaining('Failed to parse JSON after sanitizing'));
  });

  it('recovers curly-quoted keys and stray escapes', () => {
    const raw = '[{“comment_id”: “3”, "is_offensive": true, "offense_type": "spam", "explanation": "Links to a \\scam site"}]';
    expect(normalizeResponse(raw)).toEqual([
      { comment_id: '3', is_offensive: true, offense_type: 'spam', explanation: 'Links to a scam site' },
    ]);
  });

  it('strips a stray escape without touching curly quotes inside strings', () => {
    const raw =
      '[{"comment_id":"1","is_offensive":true,"offense_type":"hostile","explanation":"He wrote “go away” to \\qthe author"}]';
    expect(normalizeResponse(raw)).toEqual([
      { comment_id: '1', is_offensive: true, offense_type: 'hostile', explanation: 'He wrote “go away” to qthe author' },
    ]);
  });

  it('keeps curly quotes inside strings of otherwise valid JSON', () => {
    const raw = '[{"comment_id":"4","explanation":"Says ‚Äúgo away‚Äù"}]';
    expect(normalizeResponse(raw)).toEqual([{ comment_id: '4', explanation: 'Says “go away”' }]);
  });

  it('rejects a top-level object', () => {
    const logger = vi.fn();
    expect(normalizeResponse('{"comment_id":"1","is_offensive":true}', logger)).toEqual([]);
    expect(logger).toHaveBeenCalledWith('Model output is not a JSON list. Skipping batch.');
  });
});

describe('parseVerdictArray', () => {
  it('drops elements that are not objects', () => {
    const logger = vi.fn();
    expect(parseVerdictArray([{ comment_id: '1' }, 42, null, ['x']], logger)).toEqual([{ comment_id: '1' }]);
    expect(logger).toHaveBeenCalledTimes(3);
    expect(logger).toHaveBeenNthCalledWith(1, 'Ignoring verdict #2: expected an object, got 42');
  });
});

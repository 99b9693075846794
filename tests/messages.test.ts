import { describe, expect, it } from 'vitest';
import { humanizeError } from '../src/error-messages.js';
import { buildUserContent, decodeToolArguments, toChatMessage, toWireToolCall } from '../src/messages.js';

describe('decodeToolArguments', () => {
  it('decodes JSON objects', () => {
    expect(decodeToolArguments('{"cmd":"ls","timeout":5}')).toEqual({ cmd: 'ls', timeout: 5 });
  });

  it('falls back to an empty object', () => {
    expect(decodeToolArguments('')).toEqual({});
    expect(decodeToolArguments(null)).toEqual({});
    expect(decodeToolArguments('{oops')).toEqual({});
    expect(decodeToolArguments('"text"')).toEqual({});
    expect(decodeToolArguments('[1]')).toEqual({});
  });
});

describe('toWireToolCall', () => {
  it('serializes arguments as a JSON string', () => {
    expect(toWireToolCall({ id: 'call_1', name: 'shell', arguments: { cmd: 'ls' } })).toEqual({
      id: 'call_1',
      type: 'function',
      function: { name: 'shell', arguments: '{"cmd":"ls"}' }
    });
  });
});

describe('buildUserContent', () => {
  it('keeps plain text when there are no images', () => {
    expect(buildUserContent('hi', [])).toBe('hi');
  });

  it('drops the text part when the text is empty', () => {
    expect(buildUserContent('', ['QUJD'])).toEqual([
      { type: 'image_url', image_url: { url: 'data:image/jpeg;base64,QUJD' } }
    ]);
  });
});

describe('toChatMessage', () => {
  it('drops the timestamp', () => {
    expect(toChatMessage({ role: 'user', content: 'hi', ts: '2024-01-01T00:00:00.000Z' })).toEqual({
      role: 'user',
      content: 'hi'
    });
  });
});

describe('humanizeError', () => {
  it('maps known failures to short messages', () => {
    expect(humanizeError(new Error('read ECONNRESET'))).toBe(
      'The connection dropped while I was working. Please try again.'
    );
    expect(humanizeError('LLM HTTP 429: slow down')).toBe(
      'I am being rate limited. Please wait a moment and try again.'
    );
  });

  it('falls back to a generic message', () => {
    expect(humanizeError(new Error('weird'))).toBe('Something went wrong while handling your message.');
  });
});

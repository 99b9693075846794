import { describe, expect, it } from 'vitest';
import type { MessageEntity } from 'telegraf/types';
import {
  getRetryAfterMs,
  isAddressedToBot,
  isRetryableError,
  splitPlainText,
  stripBotMention
} from '../src/providers/telegram/telegram-provider.js';

const BOT = { id: 7, username: 'Ferry_Bot' };

describe('splitPlainText', () => {
  it('splits long text into fixed-size chunks', () => {
    expect(splitPlainText('a'.repeat(9000), 4000).map(chunk => chunk.length)).toEqual([4000, 4000, 1000]);
    expect(splitPlainText('short', 4000)).toEqual(['short']);
  });
});

describe('isRetryableError', () => {
  it('retries rate limits, server errors and network failures', () => {
    expect(isRetryableError({ code: 429 })).toBe(true);
    expect(isRetryableError({ response: { error_code: 502 } })).toBe(true);
    expect(isRetryableError({ code: 'ECONNRESET' })).toBe(true);
  });

  it('does not retry client errors', () => {
    expect(isRetryableError({ response: { error_code: 400 } })).toBe(false);
    expect(isRetryableError(new Error('bad request'))).toBe(false);
  });
});

describe('getRetryAfterMs', () => {
  it('reads retry_after in seconds', () => {
    expect(getRetryAfterMs({ parameters: { retry_after: 3 } })).toBe(3000);
    expect(getRetryAfterMs({ response: { parameters: { retry_after: '2' } } })).toBe(2000);
    expect(getRetryAfterMs({})).toBeNull();
  });
});

describe('isAddressedToBot', () => {
  it('accepts an @mention of the bot', () => {
    const entities: MessageEntity[] = [{ type: 'mention', offset: 0, length: 10 }];
    expect(isAddressedToBot('@ferry_bot hi', entities, undefined, BOT)).toBe(true);
  });

  it('accepts a reply to the bot', () => {
    expect(isAddressedToBot('sure', [], 7, BOT)).toBe(true);
  });

  it('accepts a text mention of the bot user', () => {
    const entities: MessageEntity[] = [
      { type: 'text_mention', offset: 0, length: 5, user: { id: 7, is_bot: true, first_name: 'Ferry' } }
    ];
    expect(isAddressedToBot('Ferry help', entities, undefined, BOT)).toBe(true);
  });

  it('accepts a command addressed to the bot', () => {
    const entities: MessageEntity[] = [{ type: 'bot_command', offset: 0, length: 14 }];
    expect(isAddressedToBot('/new@ferry_bot', entities, undefined, BOT)).toBe(true);
  });

  it('ignores mentions of other users', () => {
    const entities: MessageEntity[] = [{ type: 'mention', offset: 0, length: 8 }];
    expect(isAddressedToBot('@someone hi', entities, 12, BOT)).toBe(false);
  });
});

describe('stripBotMention', () => {
  it('removes the bot handle', () => {
    expect(stripBotMention('@ferry_bot what time is it', 'Ferry_Bot')).toBe('what time is it');
  });
});

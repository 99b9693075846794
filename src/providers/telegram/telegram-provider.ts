import { Telegraf } from 'telegraf';
import type { Chat, Message, MessageEntity, User } from 'telegraf/types';
import { logger } from '../../logger.js';
import type { RuntimeConfig } from '../../runtime-config.js';
import type { InboundHandler, MessagingProvider } from '../types.js';

export const MAX_MESSAGE_LENGTH = 4000;
const SEND_DELAY_MS = 250;
const MAX_PHOTO_BYTES = 20 * 1024 * 1024;
const FILE_DOWNLOAD_TIMEOUT_MS = 45_000;
const RETRYABLE_NETWORK_CODES = ['ETIMEDOUT', 'ECONNRESET', 'ECONNREFUSED', 'EAI_AGAIN', 'ENOTFOUND'];

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

function readProperty(value: unknown, key: string): unknown {
  if (typeof value !== 'object' || value === null || !(key in value)) return undefined;
  return Reflect.get(value, key);
}

function getErrorCode(err: unknown): number | null {
  const code = readProperty(err, 'code');
  if (typeof code === 'number') return code;
  const responseCode = readProperty(readProperty(err, 'response'), 'error_code');
  return typeof responseCode === 'number' ? responseCode : null;
}

export function getRetryAfterMs(err: unknown): number | null {
  const retryAfter = readProperty(readProperty(err, 'parameters'), 'retry_after')
    ?? readProperty(readProperty(readProperty(err, 'response'), 'parameters'), 'retry_after');
  if (typeof retryAfter === 'number' && Number.isFinite(retryAfter)) return retryAfter * 1000;
  if (typeof retryAfter === 'string') {
    const parsed = Number.parseInt(retryAfter, 10);
    if (Number.isFinite(parsed)) return parsed * 1000;
  }
  return null;
}

export function isRetryableError(err: unknown): boolean {
  const code = getErrorCode(err);
  if (code === 429) return true;
  if (code && code >= 500 && code < 600) return true;
  const networkCode = readProperty(err, 'code');
  return typeof networkCode === 'string' && RETRYABLE_NETWORK_CODES.includes(networkCode);
}

export function splitPlainText(text: string, maxLength: number): string[] {
  if (text.length <= maxLength) return [text];
  const chunks: string[] = [];
  for (let i = 0; i < text.length; i += maxLength) {
    chunks.push(text.slice(i, i + maxLength));
  }
  return chunks;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export type TelegramBotIdentity = { id?: number; username: string };

/**
 * Whether a group message addresses the bot: an @mention, a text_mention of
 * the bot user, a /command@bot, or a reply to one of the bot's messages.
 */
export function isAddressedToBot(
  text: string,
  entities: MessageEntity[],
  replyToUserId: number | undefined,
  bot: TelegramBotIdentity
): boolean {
  if (bot.id !== undefined && replyToUserId === bot.id) return true;
  const handle = bot.username ? `@${bot.username.toLowerCase()}` : '';
  for (const entity of entities) {
    const segment = text.slice(entity.offset, entity.offset + entity.length).toLowerCase();
    if (entity.type === 'mention' && handle && segment === handle) return true;
    if (entity.type === 'bot_command' && handle && segment.endsWith(handle)) return true;
    if (entity.type === 'text_mention' && bot.id !== undefined && entity.user.id === bot.id) return true;
  }
  return false;
}

export function stripBotMention(text: string, username: string): string {
  if (!username) return text.trim();
  return text.replace(new RegExp(`@${escapeRegExp(username)}\\b`, 'gi'), '').trim();
}

export interface TelegramProviderConfig {
  token: string;
  handlerTimeoutMs: number;
  sendRetries: number;
  sendRetryDelayMs: number;
  dedupSize: number;
}

type ParsedMessage = {
  messageId: number;
  chat: Chat;
  from: User | undefined;
  text: string;
  entities: MessageEntity[];
  replyToUserId: number | undefined;
  photoFileId: string | undefined;
};

function parseMessage(msg: Message, chat: Chat, from: User | undefined): ParsedMessage {
  let text = '';
  let entities: MessageEntity[] = [];
  if ('text' in msg) {
    text = msg.text;
    entities = msg.entities ?? [];
  } else if ('caption' in msg && msg.caption) {
    text = msg.caption;
    entities = msg.caption_entities ?? [];
  }
  const photoFileId = 'photo' in msg && msg.photo.length > 0
    ? msg.photo[msg.photo.length - 1].file_id
    : undefined;
  const replyToUserId = 'reply_to_message' in msg ? msg.reply_to_message?.from?.id : undefined;
  return { messageId: msg.message_id, chat, from, text, entities, replyToUserId, photoFileId };
}

export class TelegramProvider implements MessagingProvider {
  readonly name = 'telegram' as const;

  private readonly bot: Telegraf;
  private readonly config: TelegramProviderConfig;
  private readonly seen = new Map<string, true>();
  private connected = false;
  private botUsername = '';
  private botId: number | undefined;

  constructor(config: TelegramProviderConfig) {
    this.config = config;
    this.bot = new Telegraf(config.token, {
      handlerTimeout: config.handlerTimeoutMs,
    });
    this.bot.catch((err, ctx) => {
      logger.error({ err, chatId: ctx.chat?.id }, 'Unhandled Telegraf error');
    });
  }

  async start(handler: InboundHandler): Promise<void> {
    this.bot.on('message', (ctx) => {
      const parsed = parseMessage(ctx.message, ctx.chat, ctx.from);
      void this.handleMessage(parsed, handler).catch((err: unknown) => {
        logger.error({ err, chatId: parsed.chat.id }, 'Failed to handle Telegram message');
      });
    });

    const me = await this.bot.telegram.getMe();
    this.botUsername = me.username;
    this.botId = me.id;

    // launch() resolves only when polling stops.
    void this.bot.launch({ dropPendingUpdates: false }).catch((err: unknown) => {
      this.connected = false;
      logger.error({ err }, 'Telegram polling stopped');
    });
    this.connected = true;
    logger.info({ username: this.botUsername }, 'Telegram provider started');
  }

  stop(): Promise<void> {
    if (this.connected) {
      this.connected = false;
      this.bot.stop('SHUTDOWN');
    }
    return Promise.resolve();
  }

  getBotUsername(): string {
    return this.botUsername;
  }

  async send(conversationId: string, text: string): Promise<void> {
    const chunks = splitPlainText(text, MAX_MESSAGE_LENGTH);
    for (let i = 0; i < chunks.length; i += 1) {
      await this.sendChunk(conversationId, chunks[i]);
      if (i < chunks.length - 1) {
        await sleep(SEND_DELAY_MS);
      }
    }
    logger.info({ chatId: conversationId, length: text.length, chunks: chunks.length }, 'Message sent');
  }

  private async sendChunk(chatId: string, chunk: string): Promise<void> {
    for (let attempt = 1; attempt <= this.config.sendRetries; attempt += 1) {
      try {
        await this.bot.telegram.sendMessage(chatId, chunk);
        return;
      } catch (err) {
        if (!isRetryableError(err) || attempt === this.config.sendRetries) {
          logger.error({ chatId, attempt, err }, 'Failed to send Telegram message chunk');
          throw err;
        }
        const delayMs = getRetryAfterMs(err) ?? (this.config.sendRetryDelayMs * attempt);
        logger.warn({ chatId, attempt, delayMs }, 'Telegram send failed; retrying');
        await sleep(delayMs);
      }
    }
  }

  /** True the first time a chat/message pair is seen. */
  private markSeen(chatId: number, messageId: number): boolean {
    const key = `${chatId}:${messageId}`;
    if (this.seen.has(key)) return false;
    this.seen.set(key, true);
    while (this.seen.size > this.config.dedupSize) {
      const oldest = this.seen.keys().next();
      if (oldest.done) break;
      this.seen.delete(oldest.value);
    }
    return true;
  }

  private async handleMessage(msg: ParsedMessage, handler: InboundHandler): Promise<void> {
    if (msg.from?.is_bot) return;
    if (!msg.text && !msg.photoFileId) return;
    if (!this.markSeen(msg.chat.id, msg.messageId)) {
      logger.debug({ chatId: msg.chat.id, messageId: msg.messageId }, 'Duplicate Telegram message ignored');
      return;
    }

    const isPrivate = msg.chat.type === 'private';
    if (!isPrivate) {
      const addressed = isAddressedToBot(msg.text, msg.entities, msg.replyToUserId, {
        id: this.botId,
        username: this.botUsername
      });
      if (!addressed) return;
    }

    const images: string[] = [];
    if (msg.photoFileId) {
      const image = await this.downloadPhoto(msg.photoFileId);
      if (image) images.push(image);
    }
    const text = isPrivate ? msg.text.trim() : stripBotMention(msg.text, this.botUsername);
    if (!text && images.length === 0) return;

    const senderId = String(msg.from?.id ?? msg.chat.id);
    logger.info({ chatId: msg.chat.id, senderId, preview: text.slice(0, 80) }, 'Telegram message received');
    await handler(senderId, String(msg.chat.id), text, images);
  }

  private async downloadPhoto(fileId: string): Promise<string | null> {
    try {
      const fileLink = await this.bot.telegram.getFileLink(fileId);
      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), FILE_DOWNLOAD_TIMEOUT_MS);
      let response: Response;
      try {
        response = await fetch(fileLink.href, { signal: controller.signal });
      } finally {
        clearTimeout(timeout);
      }
      if (!response.ok) {
        logger.warn({ fileId, status: response.status }, 'Failed to download Telegram photo');
        return null;
      }
      const buffer = Buffer.from(await response.arrayBuffer());
      if (buffer.byteLength > MAX_PHOTO_BYTES) {
        logger.warn({ fileId, size: buffer.byteLength }, 'Telegram photo too large (>20MB)');
        return null;
      }
      return buffer.toString('base64');
    } catch (err) {
      logger.warn({ fileId, err }, 'Failed to download Telegram photo');
      return null;
    }
  }
}

export function createTelegramProvider(config: RuntimeConfig['telegram'], token: string): TelegramProvider {
  if (!token) {
    throw new Error('TELEGRAM_BOT_TOKEN environment variable is required');
  }
  return new TelegramProvider({
    token,
    handlerTimeoutMs: config.handlerTimeoutMs,
    sendRetries: config.sendRetries,
    sendRetryDelayMs: config.sendRetryDelayMs,
    dedupSize: config.dedupSize,
  });
}

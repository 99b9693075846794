import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { logger } from './logger.js';
import {
  storedMessageSchema,
  toChatMessage,
  type ChatMessage,
  type StoredMessage
} from './messages.js';

const metaRecordSchema = z.object({
  _type: z.literal('meta'),
  last_consolidated: z.number().int().nonnegative()
});

type MetaRecord = z.infer<typeof metaRecordSchema>;

export function sessionFileName(key: string): string {
  return `${key.replace(/[:/\\]/g, '_')}.jsonl`;
}

/**
 * Append-only conversation log persisted as JSONL.
 *
 * Only messages from `lastConsolidated` onward are replayed to the LLM, so
 * the prompt prefix stays byte-stable between turns.
 */
export class Session {
  readonly key: string;
  readonly filePath: string;
  private readonly messages: StoredMessage[] = [];
  private consolidated = 0;

  constructor(key: string, filePath: string) {
    this.key = key;
    this.filePath = filePath;
    this.load();
  }

  get lastConsolidated(): number {
    return this.consolidated;
  }

  get length(): number {
    return this.messages.length;
  }

  getHistory(): ChatMessage[] {
    const pending = this.messages.slice(this.consolidated);
    const firstUser = pending.findIndex(message => message.role === 'user');
    if (firstUser < 0) return [];
    return pending.slice(firstUser).map(toChatMessage);
  }

  saveTurn(messages: ChatMessage[], now: Date = new Date()): void {
    const ts = now.toISOString();
    const lines: string[] = [];
    for (const message of messages) {
      const record: StoredMessage = { ...message, ts };
      this.messages.push(record);
      lines.push(JSON.stringify(record));
    }
    if (lines.length === 0) return;
    this.appendLines(lines);
  }

  /** Move the watermark; everything before `index` leaves the replayed history. */
  markConsolidated(index: number): void {
    const clamped = Math.max(0, Math.min(Math.floor(index), this.messages.length));
    this.consolidated = clamped;
    const record: MetaRecord = { _type: 'meta', last_consolidated: clamped };
    this.appendLines([JSON.stringify(record)]);
  }

  private appendLines(lines: string[]): void {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    fs.appendFileSync(this.filePath, `${lines.join('\n')}\n`);
  }

  private load(): void {
    if (!fs.existsSync(this.filePath)) return;
    let raw: string;
    try {
      raw = fs.readFileSync(this.filePath, 'utf-8');
    } catch (err) {
      logger.warn({ key: this.key, err }, 'Failed to read session file');
      return;
    }
    let skipped = 0;
    for (const line of raw.split('\n')) {
      const trimmed = line.trim();
      if (!trimmed) continue;
      let data: unknown;
      try {
        data = JSON.parse(trimmed);
      } catch {
        skipped += 1;
        continue;
      }
      const meta = metaRecordSchema.safeParse(data);
      if (meta.success) {
        this.consolidated = meta.data.last_consolidated;
        continue;
      }
      const message = storedMessageSchema.safeParse(data);
      if (message.success) {
        this.messages.push(message.data);
      } else {
        skipped += 1;
      }
    }
    this.consolidated = Math.min(this.consolidated, this.messages.length);
    if (skipped > 0) {
      logger.warn({ key: this.key, skipped }, 'Skipped malformed session records');
    }
  }
}

/**
 * Process-wide registry of sessions. Entries are created on first access and
 * kept for the lifetime of the process.
 */
export class SessionManager {
  private readonly sessions = new Map<string, Session>();
  private readonly sessionsDir: string;

  constructor(sessionsDir: string) {
    this.sessionsDir = sessionsDir;
  }

  get(key: string): Session {
    const existing = this.sessions.get(key);
    if (existing) return existing;
    const session = new Session(key, path.join(this.sessionsDir, sessionFileName(key)));
    this.sessions.set(key, session);
    return session;
  }

  size(): number {
    return this.sessions.size;
  }
}

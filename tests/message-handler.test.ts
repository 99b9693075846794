import fs from 'fs';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FRESH_CONVERSATION_REPLY, HELP_TEXT } from '../src/admin-commands.js';
import { AgentLoop } from '../src/agent-loop.js';
import { ChatQueue } from '../src/chat-queue.js';
import type { ChatModel } from '../src/llm-client.js';
import { MemoryStore } from '../src/memory-store.js';
import { createMessageHandler, formatSenderText } from '../src/message-handler.js';
import type { Restarter } from '../src/restart.js';
import { DEFAULT_CONFIG } from '../src/runtime-config.js';
import { SessionManager } from '../src/session-store.js';
import { ToolExecutor } from '../src/tools/executor.js';
import { ScriptedModel, makeTempDir, removeDir, textReply, toolReply } from './helpers.js';

class RecordingRestarter implements Restarter {
  private readonly events: string[];

  constructor(events: string[]) {
    this.events = events;
  }

  async restart(): Promise<void> {
    this.events.push('restart');
  }
}

describe('createMessageHandler', () => {
  let home: string;
  let sessions: SessionManager;
  let events: string[];

  beforeEach(() => {
    home = makeTempDir();
    sessions = new SessionManager(path.join(home, 'sessions'));
    events = [];
  });

  afterEach(() => {
    removeDir(home);
  });

  function createHandler(model: ChatModel) {
    const memory = new MemoryStore(path.join(home, 'memory'));
    const workspace = path.join(home, 'workspace');
    fs.mkdirSync(workspace, { recursive: true });
    const agent = new AgentLoop({
      model,
      tools: new ToolExecutor({
        workspaceDir: workspace,
        memory,
        config: DEFAULT_CONFIG.tools,
        braveSearchApiKey: ''
      }),
      memory,
      sessions,
      systemPrompt: 'Base prompt',
      skillsDir: path.join(home, 'skills'),
      maxToolRounds: 5
    });
    return createMessageHandler({
      provider: 'telegram',
      agent,
      sessions,
      queue: new ChatQueue(),
      restarter: new RecordingRestarter(events),
      send: async (conversationId, text) => {
        events.push(`send:${conversationId}:${text}`);
      },
      getBotUsername: () => 'ferry_bot'
    });
  }

  it('delivers the reply before restarting', async () => {
    const handler = createHandler(new ScriptedModel([
      toolReply([{ id: 'call_1', name: 'restart_self', arguments: {} }]),
      textReply('Restarting to apply changes.')
    ]));

    await handler('u1', '42', 'please restart', []);

    expect(events).toEqual(['send:42:Restarting to apply changes.', 'restart']);
  });

  it('prefixes the sender and keys the session by provider and chat', async () => {
    const model = new ScriptedModel([textReply('hello u1')]);
    const handler = createHandler(model);

    await handler('u1', '42', 'hi', []);

    const sent = model.calls[0].messages;
    expect(sent[sent.length - 1]).toEqual({ role: 'user', content: '[sender:u1]\nhi' });
    expect(sessions.get('telegram:42').length).toBe(2);
    expect(events).toEqual(['send:42:hello u1']);
  });

  it('folds images into a multi-part user message', async () => {
    const model = new ScriptedModel([textReply('a cat')]);
    const handler = createHandler(model);

    await handler('u1', '42', 'what is this', ['QUJD']);

    const sent = model.calls[0].messages;
    expect(sent[sent.length - 1]).toEqual({
      role: 'user',
      content: [
        { type: 'text', text: '[sender:u1]\nwhat is this' },
        { type: 'image_url', image_url: { url: 'data:image/jpeg;base64,QUJD' } }
      ]
    });
  });

  it('starts a fresh conversation on /new without calling the model', async () => {
    const model = new ScriptedModel([textReply('first reply')]);
    const handler = createHandler(model);
    await handler('u1', '42', 'hi', []);

    await handler('u1', '42', '/new', []);

    const session = sessions.get('telegram:42');
    expect(session.lastConsolidated).toBe(2);
    expect(session.getHistory()).toEqual([]);
    expect(model.calls).toHaveLength(1);
    expect(events[events.length - 1]).toBe(`send:42:${FRESH_CONVERSATION_REPLY}`);
  });

  it('answers /help directly', async () => {
    const model = new ScriptedModel([]);
    await createHandler(model)('u1', '42', '/help@ferry_bot', []);
    expect(events).toEqual([`send:42:${HELP_TEXT}`]);
    expect(model.calls).toHaveLength(0);
  });

  it('replies with a readable message when a turn throws', async () => {
    const handler = createMessageHandler({
      provider: 'telegram',
      agent: {
        run: async () => {
          throw new Error('read ECONNRESET');
        }
      },
      sessions,
      queue: new ChatQueue(),
      restarter: new RecordingRestarter(events),
      send: async (conversationId, text) => {
        events.push(`send:${conversationId}:${text}`);
      }
    });

    await handler('u1', '42', 'hi', []);

    expect(events).toEqual(['send:42:The connection dropped while I was working. Please try again.']);
  });
});

describe('formatSenderText', () => {
  it('puts the sender id on its own line', () => {
    expect(formatSenderText('99', 'hello')).toBe('[sender:99]\nhello');
  });
});

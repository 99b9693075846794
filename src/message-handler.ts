import { FRESH_CONVERSATION_REPLY, HELP_TEXT, parseChatCommand } from './admin-commands.js';
import type { AgentLoop } from './agent-loop.js';
import type { ChatQueue } from './chat-queue.js';
import { humanizeError } from './error-messages.js';
import { logger } from './logger.js';
import { buildUserContent } from './messages.js';
import { conversationKey, type InboundHandler, type ProviderName } from './providers/types.js';
import type { Restarter } from './restart.js';
import type { SessionManager } from './session-store.js';

export type MessageHandlerDeps = {
  provider: ProviderName;
  agent: Pick<AgentLoop, 'run'>;
  sessions: SessionManager;
  queue: ChatQueue;
  restarter: Restarter;
  send: (conversationId: string, text: string) => Promise<void>;
  getBotUsername?: () => string;
};

export function formatSenderText(senderId: string, text: string): string {
  return `[sender:${senderId}]\n${text}`;
}

/**
 * Inbound pipeline: chat commands are answered directly; everything else
 * becomes one agent turn, queued behind earlier turns of the same chat.
 * A requested restart happens only after the reply has been delivered.
 */
export function createMessageHandler(deps: MessageHandlerDeps): InboundHandler {
  return async (senderId, conversationId, text, imagesBase64) => {
    const key = conversationKey(deps.provider, conversationId);
    const command = imagesBase64.length === 0
      ? parseChatCommand(text, deps.getBotUsername?.())
      : null;

    if (command === 'help') {
      await deps.send(conversationId, HELP_TEXT);
      return;
    }

    if (command === 'new') {
      await deps.queue.run(key, async () => {
        const session = deps.sessions.get(key);
        session.markConsolidated(session.length);
        logger.info({ key, watermark: session.lastConsolidated }, 'Conversation reset');
        await deps.send(conversationId, FRESH_CONVERSATION_REPLY);
      });
      return;
    }

    await deps.queue.run(key, async () => {
      const content = buildUserContent(formatSenderText(senderId, text), imagesBase64);
      try {
        const outcome = await deps.agent.run(key, content, reply => deps.send(conversationId, reply));
        if (outcome.restartRequested) {
          logger.info({ key }, 'Restart requested by tool call');
          await deps.restarter.restart();
        }
      } catch (err) {
        logger.error({ key, err }, 'Turn failed');
        await deps.send(conversationId, humanizeError(err));
      }
    });
  };
}

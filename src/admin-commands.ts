export type ChatCommand = 'new' | 'help';

export const FRESH_CONVERSATION_REPLY = 'Started a fresh conversation.';

export const HELP_TEXT = [
  'Commands:',
  '/new - start a fresh conversation (alias: /reset)',
  '/help - show this message',
  '',
  'Anything else is sent to the assistant.'
].join('\n');

const COMMAND_ALIASES = new Map<string, ChatCommand>([
  ['new', 'new'],
  ['reset', 'new'],
  ['help', 'help'],
  ['start', 'help']
]);

/**
 * Recognise a slash command. `/cmd@botname` only counts when the suffix names
 * this bot (or no bot username is known).
 */
export function parseChatCommand(content: string, botUsername?: string): ChatCommand | null {
  const text = content.trim();
  if (!text.startsWith('/')) return null;
  const [rawCommand] = text.slice(1).split(/\s+/, 1);
  if (!rawCommand) return null;
  const [name, target] = rawCommand.split('@');
  if (target && botUsername && target.toLowerCase() !== botUsername.toLowerCase()) {
    return null;
  }
  return COMMAND_ALIASES.get(name.toLowerCase()) ?? null;
}

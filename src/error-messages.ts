/**
 * Maps failures that escape a turn to short chat replies.
 */

const ERROR_PATTERNS: Array<{ pattern: RegExp | string; message: string }> = [
  // Network
  { pattern: 'ECONNREFUSED', message: 'I could not reach a service I depend on. Please try again shortly.' },
  { pattern: 'ECONNRESET', message: 'The connection dropped while I was working. Please try again.' },
  { pattern: 'ENOTFOUND', message: 'A service I need could not be found. Check the network and try again.' },
  { pattern: 'EAI_AGAIN', message: 'There was a temporary network problem. Please try again.' },
  { pattern: /timed out/i, message: 'That took too long to finish. Please try again.' },

  // Filesystem
  { pattern: 'ENOSPC', message: 'The disk is full, so I could not save this conversation.' },
  { pattern: 'EACCES', message: 'I do not have permission to write my data files. Please check the bot\'s home directory.' },

  // Provider limits
  { pattern: /rate.?limit|too many requests|\b429\b/i, message: 'I am being rate limited. Please wait a moment and try again.' },
  { pattern: /context.?length|maximum.?context/i, message: 'This conversation is too long for the model. Send /new to start fresh.' },
  { pattern: /unauthorized|invalid.?api.?key|\b401\b/i, message: 'The model API rejected my credentials. Please contact the admin.' },

  // Server side
  { pattern: /\b50[0234]\b/, message: 'The model service is having trouble. Please try again later.' }
];

const DEFAULT_MESSAGE = 'Something went wrong while handling your message.';

export function humanizeError(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  for (const { pattern, message: friendly } of ERROR_PATTERNS) {
    if (typeof pattern === 'string' ? message.includes(pattern) : pattern.test(message)) {
      return friendly;
    }
  }
  return DEFAULT_MESSAGE;
}

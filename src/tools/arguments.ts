import { z } from 'zod';
import { isToolName } from './definitions.js';

export type Patch = { old: string; new: string };

export type ToolInvocation =
  | { name: 'shell'; cmd: string; timeoutSec: number }
  | { name: 'read_file'; path: string }
  | { name: 'write_file'; path: string; content: string }
  | { name: 'edit_file'; path: string; old: string; new: string }
  | { name: 'patch_file'; path: string; patches: Patch[] }
  | { name: 'save_memory'; content: string }
  | { name: 'recall_memory' }
  | { name: 'restart_self' }
  | { name: 'web_search'; query: string; count: number }
  | { name: 'web_fetch'; url: string; maxChars: number };

export type ArgumentDefaults = {
  shellTimeoutSec: number;
  searchCount: number;
  fetchMaxChars: number;
};

// Models send loose JSON: a missing or mistyped field falls back to its
// default instead of failing the call.
const text = z.string().catch('');

function positiveNumber(fallback: number) {
  return z.coerce.number().positive().catch(fallback);
}

function positiveInt(fallback: number) {
  return z.coerce.number().int().positive().catch(fallback);
}

function integer(fallback: number) {
  return z.coerce.number().int().catch(fallback);
}

const patchSchema = z
  .object({ old: text, new: text })
  .catch({ old: '', new: '' });

export function parseToolInvocation(
  name: string,
  args: Record<string, unknown>,
  defaults: ArgumentDefaults
): ToolInvocation | null {
  if (!isToolName(name)) return null;
  switch (name) {
    case 'shell': {
      const parsed = z
        .object({ cmd: text, timeout: positiveNumber(defaults.shellTimeoutSec) })
        .parse(args);
      return { name, cmd: parsed.cmd, timeoutSec: parsed.timeout };
    }
    case 'read_file':
      return { name, path: z.object({ path: text }).parse(args).path };
    case 'write_file': {
      const parsed = z.object({ path: text, content: text }).parse(args);
      return { name, path: parsed.path, content: parsed.content };
    }
    case 'edit_file': {
      const parsed = z.object({ path: text, old: text, new: text }).parse(args);
      return { name, path: parsed.path, old: parsed.old, new: parsed.new };
    }
    case 'patch_file': {
      const parsed = z
        .object({ path: text, patches: z.array(patchSchema).catch([]) })
        .parse(args);
      return { name, path: parsed.path, patches: parsed.patches };
    }
    case 'save_memory':
      return { name, content: z.object({ content: text }).parse(args).content };
    case 'recall_memory':
      return { name };
    case 'restart_self':
      return { name };
    case 'web_search': {
      const parsed = z
        .object({ query: text, count: integer(defaults.searchCount) })
        .parse(args);
      return { name, query: parsed.query, count: Math.min(Math.max(parsed.count, 1), 10) };
    }
    case 'web_fetch': {
      const parsed = z
        .object({ url: text, max_chars: positiveInt(defaults.fetchMaxChars) })
        .parse(args);
      return { name, url: parsed.url, maxChars: parsed.max_chars };
    }
  }
}

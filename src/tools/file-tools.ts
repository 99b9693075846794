import fs from 'fs';
import os from 'os';
import path from 'path';
import type { Patch } from './arguments.js';

/** `~` expands to the home directory; relative paths land in the workspace. */
export function resolveToolPath(inputPath: string, workspaceDir: string): string {
  let expanded = inputPath;
  if (expanded === '~') {
    expanded = os.homedir();
  } else if (expanded.startsWith('~/')) {
    expanded = path.join(os.homedir(), expanded.slice(2));
  }
  return path.isAbsolute(expanded) ? expanded : path.join(workspaceDir, expanded);
}

export function countOccurrences(text: string, needle: string): number {
  if (!needle) return 0;
  let count = 0;
  let index = text.indexOf(needle);
  while (index !== -1) {
    count += 1;
    index = text.indexOf(needle, index + needle.length);
  }
  return count;
}

export type PatchOutcome =
  | { ok: true; text: string }
  | { ok: false; errors: string[] };

/**
 * Apply patches in order against a working copy. Each `old` is counted
 * against the text as left by the patches before it.
 */
export function applyPatches(original: string, patches: Patch[]): PatchOutcome {
  let text = original;
  const errors: string[] = [];
  patches.forEach((patch, i) => {
    const count = countOccurrences(text, patch.old);
    if (count === 0) {
      errors.push(`Patch ${i}: \`old\` not found`);
    } else if (count > 1) {
      errors.push(`Patch ${i}: \`old\` matches ${count} times (must be unique)`);
    } else {
      const at = text.indexOf(patch.old);
      text = text.slice(0, at) + patch.new + text.slice(at + patch.old.length);
    }
  });
  if (errors.length > 0) return { ok: false, errors };
  return { ok: true, text };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export async function readTextFile(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, 'utf-8');
}

export async function writeTextFile(filePath: string, content: string): Promise<string> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  await fs.promises.writeFile(filePath, content, 'utf-8');
  return `Written to ${filePath}`;
}

/** All-or-nothing: the file is written only when every patch applies. */
export async function patchFile(filePath: string, patches: Patch[]): Promise<string> {
  let original: string;
  try {
    original = await fs.promises.readFile(filePath, 'utf-8');
  } catch (err) {
    return `Error reading file: ${errorMessage(err)}`;
  }
  const outcome = applyPatches(original, patches);
  if (!outcome.ok) {
    return `Patch failed:\n${outcome.errors.join('\n')}`;
  }
  try {
    await fs.promises.writeFile(filePath, outcome.text, 'utf-8');
  } catch (err) {
    return `Error writing file: ${errorMessage(err)}`;
  }
  return `Patched ${patches.length} location(s) in ${filePath}`;
}

/**
 * Skill loader: reads markdown skill files and renders them as a
 * "## Skills" section of the system prompt.
 *
 *   skills/<name>.md          (single-file form)
 *   skills/<name>/SKILL.md    (directory form)
 *
 * Optional YAML frontmatter may set `name`; the body is included in full.
 */

import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { logger } from './logger.js';

export type SkillEntry = {
  name: string;
  description?: string;
  sourcePath: string;
  body: string;
};

const FRONTMATTER_RE = /^---\r?\n([\s\S]*?)\r?\n---\r?\n?/;
const MAX_SKILL_CHARS = 16_000;

function readdirSafe(dir: string): string[] {
  try {
    return fs.readdirSync(dir);
  } catch {
    return [];
  }
}

function isDirectorySafe(p: string): boolean {
  try {
    return fs.statSync(p).isDirectory();
  } catch {
    return false;
  }
}

function isFileSafe(p: string): boolean {
  try {
    return fs.statSync(p).isFile();
  } catch {
    return false;
  }
}

/** Split frontmatter from body. Unparseable frontmatter is treated as body text. */
export function parseSkillFile(content: string): { name?: string; description?: string; body: string } {
  const match = content.match(FRONTMATTER_RE);
  if (!match) return { body: content.trim() };
  let data: unknown;
  try {
    data = yaml.load(match[1]);
  } catch {
    return { body: content.trim() };
  }
  const body = content.slice(match[0].length).trim();
  if (typeof data !== 'object' || data === null || Array.isArray(data)) return { body };
  const name = 'name' in data && typeof data.name === 'string' ? data.name.trim() : '';
  const description = 'description' in data && typeof data.description === 'string'
    ? data.description.trim()
    : '';
  return {
    name: name || undefined,
    description: description || undefined,
    body
  };
}

function readSkill(filePath: string, fallbackName: string): SkillEntry | null {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    logger.warn({ filePath, err }, 'Failed to load skill');
    return null;
  }
  if (content.length > MAX_SKILL_CHARS) {
    content = content.slice(0, MAX_SKILL_CHARS);
  }
  const parsed = parseSkillFile(content);
  if (!parsed.body) return null;
  return {
    name: parsed.name || fallbackName,
    description: parsed.description,
    sourcePath: filePath,
    body: parsed.body
  };
}

export function loadSkills(skillsDir: string): SkillEntry[] {
  if (!isDirectorySafe(skillsDir)) return [];
  const entries: SkillEntry[] = [];
  for (const item of readdirSafe(skillsDir).sort()) {
    const itemPath = path.join(skillsDir, item);
    if (isDirectorySafe(itemPath)) {
      const skillMd = path.join(itemPath, 'SKILL.md');
      if (!isFileSafe(skillMd)) continue;
      const entry = readSkill(skillMd, item);
      if (entry) entries.push(entry);
      continue;
    }
    if (item.endsWith('.md') && isFileSafe(itemPath)) {
      const entry = readSkill(itemPath, path.basename(item, '.md'));
      if (entry) entries.push(entry);
    }
  }
  return entries;
}

export function formatSkills(entries: SkillEntry[]): string {
  if (entries.length === 0) return '';
  const blocks = entries.map(entry => {
    const heading = `### Skill: ${entry.name}`;
    const summary = entry.description ? `_${entry.description}_\n` : '';
    return `${heading}\n${summary}${entry.body}`;
  });
  return `## Skills\n\n${blocks.join('\n\n')}`;
}

import { formatSkills, type SkillEntry } from './skill-loader.js';

export type SystemPromptParams = {
  basePrompt: string;
  memory: string;
  skills: SkillEntry[];
};

/** Build a section with a heading, only if content is present */
function section(heading: string, content: string): string {
  if (!content.trim()) return '';
  return `## ${heading}\n\n${content.trim()}`;
}

/**
 * The system message is the first cache breakpoint: it only changes when
 * memory or skills change, never between tool rounds.
 */
export function buildSystemPrompt(params: SystemPromptParams): string {
  return [
    params.basePrompt,
    section('Memory', params.memory),
    formatSkills(params.skills)
  ].filter(Boolean).join('\n\n');
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Local wall-clock time as `YYYY-MM-DD HH:mm`. */
export function formatContextTime(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} `
    + `${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

export function buildContextMessage(key: string, now: Date): string {
  return `[Context]\nTime: ${formatContextTime(now)}\nChat: ${key}`;
}

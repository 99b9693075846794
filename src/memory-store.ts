import fs from 'fs';
import path from 'path';

export const MEMORY_FILE_NAME = 'MEMORY.md';

/**
 * Long-term memory shared by every conversation: one markdown file, blocks
 * separated by blank lines.
 *
 * Writes are whole-file overwrites with no locking. Two conversations
 * appending at the same moment can lose one of the updates.
 */
export class MemoryStore {
  readonly memoryFile: string;

  constructor(memoryDir: string) {
    fs.mkdirSync(memoryDir, { recursive: true });
    this.memoryFile = path.join(memoryDir, MEMORY_FILE_NAME);
  }

  load(): string {
    if (!fs.existsSync(this.memoryFile)) return '';
    return fs.readFileSync(this.memoryFile, 'utf-8');
  }

  append(content: string): void {
    const addition = content.trim();
    if (!addition) return;
    const existing = this.load().trimEnd();
    const next = existing ? `${existing}\n\n${addition}` : addition;
    fs.writeFileSync(this.memoryFile, `${next}\n`);
  }
}

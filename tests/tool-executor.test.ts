import fs from 'fs';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { MemoryStore } from '../src/memory-store.js';
import { DEFAULT_CONFIG } from '../src/runtime-config.js';
import { TOOL_NAMES } from '../src/tools/definitions.js';
import { ToolExecutor, sanitizeToolArgs } from '../src/tools/executor.js';
import { jsonResponse, makeTempDir, removeDir } from './helpers.js';

describe('ToolExecutor', () => {
  let home: string;
  let workspace: string;
  let memory: MemoryStore;
  let executor: ToolExecutor;

  beforeEach(() => {
    home = makeTempDir();
    workspace = path.join(home, 'workspace');
    fs.mkdirSync(workspace);
    memory = new MemoryStore(path.join(home, 'memory'));
    executor = new ToolExecutor({
      workspaceDir: workspace,
      memory,
      config: DEFAULT_CONFIG.tools,
      braveSearchApiKey: ''
    });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    removeDir(home);
  });

  it('exposes a definition for every tool', () => {
    expect(executor.definitions().map(def => def.function.name)).toEqual([...TOOL_NAMES]);
  });

  describe('shell', () => {
    it('returns trimmed stdout followed by stderr', async () => {
      const result = await executor.execute('shell', { cmd: 'echo out; echo err 1>&2' });
      expect(result).toEqual({ output: 'out\nerr', restart: false });
    });

    it('runs in the workspace', async () => {
      const result = await executor.execute('shell', { cmd: 'pwd' });
      expect(result.output).toBe(workspace);
    });

    it('reports empty output', async () => {
      const result = await executor.execute('shell', { cmd: 'true' });
      expect(result.output).toBe('(no output)');
    });

    it('truncates long output', async () => {
      const result = await executor.execute('shell', { cmd: 'head -c 9000 /dev/zero | tr \'\\0\' a' });
      expect(result.output).toBe('a'.repeat(8000));
    });

    it('stops commands that exceed their timeout', async () => {
      const result = await executor.execute('shell', { cmd: 'sleep 5', timeout: 1 });
      expect(result.output).toBe('Error: timed out after 1s');
    });

    it('keeps multi-byte characters split across writes', async () => {
      const result = await executor.execute('shell', { cmd: "printf '\\xe2'; sleep 0.3; printf '\\x82\\xac'" });
      expect(result.output).toBe('\u20ac');
    });

    it('honours timeouts beyond the timer range', async () => {
      const result = await executor.execute('shell', { cmd: 'sleep 0.2; echo hi', timeout: 3_000_000 });
      expect(result.output).toBe('hi');
    });
  });

  describe('files', () => {
    it('writes and reads workspace-relative files', async () => {
      const written = await executor.execute('write_file', { path: 'notes/todo.txt', content: 'buy milk' });
      expect(written.output).toBe(`Written to ${path.join(workspace, 'notes/todo.txt')}`);

      const read = await executor.execute('read_file', { path: 'notes/todo.txt' });
      expect(read.output).toBe('buy milk');
    });

    it('turns read failures into error text', async () => {
      const result = await executor.execute('read_file', { path: 'nope.txt' });
      expect(result.output.startsWith('Error: ENOENT')).toBe(true);
    });

    it('edits a single occurrence', async () => {
      fs.writeFileSync(path.join(workspace, 'app.txt'), 'color = red\n');
      const result = await executor.execute('edit_file', { path: 'app.txt', old: 'red', new: 'blue' });
      expect(result.output).toBe(`Patched 1 location(s) in ${path.join(workspace, 'app.txt')}`);
      expect(fs.readFileSync(path.join(workspace, 'app.txt'), 'utf-8')).toBe('color = blue\n');
    });

    it('leaves the file alone when edit_file matches twice', async () => {
      const file = path.join(workspace, 'dup.txt');
      fs.writeFileSync(file, 'same\nsame\n');
      const result = await executor.execute('edit_file', { path: 'dup.txt', old: 'same', new: 'other' });
      expect(result.output).toBe('Patch failed:\nPatch 0: `old` matches 2 times (must be unique)');
      expect(fs.readFileSync(file, 'utf-8')).toBe('same\nsame\n');
    });

    it('treats malformed patch entries as not found', async () => {
      fs.writeFileSync(path.join(workspace, 'p.txt'), 'abc');
      const result = await executor.execute('patch_file', { path: 'p.txt', patches: ['oops'] });
      expect(result.output).toBe('Patch failed:\nPatch 0: `old` not found');
    });
  });

  describe('memory', () => {
    it('saves and recalls memory', async () => {
      expect((await executor.execute('recall_memory', {})).output).toBe('(no memory yet)');
      expect(await executor.execute('save_memory', { content: '  prefers metric units ' })).toEqual({
        output: 'Memory saved.',
        restart: false
      });
      expect((await executor.execute('recall_memory', {})).output).toBe('prefers metric units\n');
    });
  });

  it('flags a restart', async () => {
    expect(await executor.execute('restart_self', {})).toEqual({ output: 'Restarting now...', restart: true });
  });

  it('answers unknown tools with text', async () => {
    expect(await executor.execute('fly', {})).toEqual({ output: 'Unknown tool: fly', restart: false });
  });

  describe('web', () => {
    it('requires a search API key', async () => {
      const result = await executor.execute('web_search', { query: 'cats' });
      expect(result.output).toBe('Error: Brave Search API key not configured.');
    });

    it('turns HTTP failures into error text', async () => {
      vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ error: 'down' }, 500)));
      const withKey = new ToolExecutor({
        workspaceDir: workspace,
        memory,
        config: DEFAULT_CONFIG.tools,
        braveSearchApiKey: 'test-secret'
      });
      const result = await withKey.execute('web_search', { query: 'cats' });
      expect(result.output).toBe('Error: Brave search error (500)');
    });
  });
});

describe('sanitizeToolArgs', () => {
  it('redacts bulky values and shortens commands', () => {
    expect(sanitizeToolArgs({
      path: 'a.txt',
      content: 'hello',
      patches: [{ old: 'a', new: 'b' }],
      cmd: 'x'.repeat(300)
    })).toEqual({
      path: 'a.txt',
      content: '<redacted:5>',
      patches: '<1 patches>',
      cmd: 'x'.repeat(200)
    });
  });
});

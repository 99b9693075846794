import { logger } from '../logger.js';
import type { MemoryStore } from '../memory-store.js';
import type { RuntimeConfig } from '../runtime-config.js';
import { parseToolInvocation, type ToolInvocation } from './arguments.js';
import { TOOL_DEFINITIONS, type ToolDefinition } from './definitions.js';
import { patchFile, readTextFile, resolveToolPath, writeTextFile } from './file-tools.js';
import { formatShellOutput, runCommand } from './shell.js';
import { webFetch, webSearch } from './web.js';

export type ToolResult = {
  output: string;
  restart: boolean;
};

export type ToolExecutorOptions = {
  workspaceDir: string;
  memory: MemoryStore;
  config: RuntimeConfig['tools'];
  braveSearchApiKey: string;
};

function assertNever(value: never): never {
  throw new Error(`Unhandled tool invocation: ${JSON.stringify(value)}`);
}

/** Shorten bulky values so tool arguments can be logged. */
export function sanitizeToolArgs(args: Record<string, unknown>): Record<string, unknown> {
  const record = { ...args };
  for (const key of ['content', 'old', 'new']) {
    const value = record[key];
    if (typeof value === 'string') {
      record[key] = `<redacted:${value.length}>`;
    }
  }
  if (Array.isArray(record.patches)) {
    record.patches = `<${record.patches.length} patches>`;
  }
  if (typeof record.cmd === 'string') {
    record.cmd = record.cmd.slice(0, 200);
  }
  return record;
}

/**
 * Runs the bot's tools. Every failure comes back as result text so the
 * model can read it; nothing thrown here reaches the agent loop.
 */
export class ToolExecutor {
  private readonly options: ToolExecutorOptions;

  constructor(options: ToolExecutorOptions) {
    this.options = options;
  }

  definitions(): readonly ToolDefinition[] {
    return TOOL_DEFINITIONS;
  }

  async execute(name: string, args: Record<string, unknown>): Promise<ToolResult> {
    const start = Date.now();
    const invocation = parseToolInvocation(name, args, {
      shellTimeoutSec: this.options.config.shell.defaultTimeoutSec,
      searchCount: this.options.config.webSearch.defaultCount,
      fetchMaxChars: this.options.config.webFetch.defaultMaxChars
    });
    if (!invocation) {
      logger.warn({ tool: name }, 'Unknown tool requested');
      return { output: `Unknown tool: ${name}`, restart: false };
    }
    try {
      const result = await this.dispatch(invocation);
      logger.info({
        tool: name,
        ok: !result.output.startsWith('Error'),
        durationMs: Date.now() - start,
        args: sanitizeToolArgs(args)
      }, 'Tool call');
      return result;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.warn({
        tool: name,
        ok: false,
        durationMs: Date.now() - start,
        args: sanitizeToolArgs(args),
        error: message
      }, 'Tool call failed');
      return { output: `Error: ${message}`, restart: false };
    }
  }

  private resolve(inputPath: string): string {
    return resolveToolPath(inputPath, this.options.workspaceDir);
  }

  private async dispatch(invocation: ToolInvocation): Promise<ToolResult> {
    const { config, memory } = this.options;
    switch (invocation.name) {
      case 'shell': {
        const result = await runCommand(
          invocation.cmd,
          invocation.timeoutSec * 1000,
          this.options.workspaceDir
        );
        if (result.timedOut) {
          return { output: `Error: timed out after ${invocation.timeoutSec}s`, restart: false };
        }
        return { output: formatShellOutput(result, config.shell.outputLimitChars), restart: false };
      }
      case 'read_file':
        return { output: await readTextFile(this.resolve(invocation.path)), restart: false };
      case 'write_file':
        return {
          output: await writeTextFile(this.resolve(invocation.path), invocation.content),
          restart: false
        };
      case 'edit_file':
        return {
          output: await patchFile(this.resolve(invocation.path), [
            { old: invocation.old, new: invocation.new }
          ]),
          restart: false
        };
      case 'patch_file':
        return {
          output: await patchFile(this.resolve(invocation.path), invocation.patches),
          restart: false
        };
      case 'save_memory':
        memory.append(invocation.content);
        return { output: 'Memory saved.', restart: false };
      case 'recall_memory':
        return { output: memory.load() || '(no memory yet)', restart: false };
      case 'restart_self':
        return { output: 'Restarting now...', restart: true };
      case 'web_search':
        return {
          output: await webSearch(invocation.query, invocation.count, {
            apiKey: this.options.braveSearchApiKey,
            endpoint: config.webSearch.endpoint,
            timeoutMs: config.webSearch.timeoutMs
          }),
          restart: false
        };
      case 'web_fetch':
        return {
          output: await webFetch(invocation.url, invocation.maxChars, {
            timeoutMs: config.webFetch.timeoutMs,
            userAgent: config.webFetch.userAgent
          }),
          restart: false
        };
      default:
        return assertNever(invocation);
    }
  }
}

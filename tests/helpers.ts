import fs from 'fs';
import os from 'os';
import path from 'path';
import type { ChatModel, LLMResponse } from '../src/llm-client.js';
import type { ChatMessage, ToolCall } from '../src/messages.js';
import type { ToolDefinition } from '../src/tools/definitions.js';

export function makeTempDir(prefix = 'ferrybot-test-'): string {
  return fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), prefix)));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function textReply(content: string): LLMResponse {
  return { content, toolCalls: [], finishReason: 'stop' };
}

export function toolReply(toolCalls: ToolCall[], content = ''): LLMResponse {
  return { content, toolCalls, finishReason: 'tool_calls' };
}

type RecordedCall = {
  messages: ChatMessage[];
  toolNames: string[];
  cacheIndices: number[] | undefined;
};

/** Returns the queued responses in order and records what it was sent. */
export class ScriptedModel implements ChatModel {
  readonly calls: RecordedCall[] = [];
  private readonly responses: LLMResponse[];

  constructor(responses: LLMResponse[]) {
    this.responses = responses.slice();
  }

  async chat(
    messages: ChatMessage[],
    tools: readonly ToolDefinition[],
    cacheIndices?: number[]
  ): Promise<LLMResponse> {
    this.calls.push({
      messages: messages.slice(),
      toolNames: tools.map(tool => tool.function.name),
      cacheIndices
    });
    const next = this.responses.shift();
    if (!next) throw new Error('ScriptedModel has no responses left');
    return next;
  }
}

/** Repeats the same response forever. */
export class LoopingModel implements ChatModel {
  calls = 0;
  private readonly response: LLMResponse;

  constructor(response: LLMResponse) {
    this.response = response;
  }

  async chat(): Promise<LLMResponse> {
    this.calls += 1;
    return this.response;
  }
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' }
  });
}

import { z } from 'zod';
import { logger } from './logger.js';
import {
  decodeToolArguments,
  type CacheControl,
  type ChatMessage,
  type MessageContent,
  type ToolCall
} from './messages.js';
import type { ToolDefinition } from './tools/definitions.js';

export type LLMResponse = {
  content: string;
  toolCalls: ToolCall[];
  /** Provider finish reason, or `error` when the request itself failed. */
  finishReason: string;
};

export interface ChatModel {
  chat(
    messages: ChatMessage[],
    tools: readonly ToolDefinition[],
    cacheIndices?: number[]
  ): Promise<LLMResponse>;
}

export type LLMClientOptions = {
  apiKey: string;
  apiBase: string;
  model: string;
  maxTokens: number;
  timeoutMs: number;
};

const EPHEMERAL: CacheControl = { type: 'ephemeral' };

const completionSchema = z.object({
  choices: z.array(z.object({
    message: z.object({
      content: z.string().nullish(),
      tool_calls: z.array(z.object({
        id: z.string(),
        function: z.object({
          name: z.string(),
          arguments: z.string().nullish()
        })
      })).nullish()
    }),
    finish_reason: z.string().nullish()
  })).min(1, 'LLM response contained no choices')
});

function markContent(content: MessageContent): MessageContent {
  if (typeof content === 'string') {
    return [{ type: 'text', text: content, cache_control: EPHEMERAL }];
  }
  if (content.length === 0) return content;
  const parts = content.slice();
  parts[parts.length - 1] = { ...parts[parts.length - 1], cache_control: EPHEMERAL };
  return parts;
}

/**
 * Copy `messages`, attaching an ephemeral cache breakpoint to each listed
 * index. Out-of-range indices are ignored; the input is not mutated.
 */
export function applyCacheMarkers(messages: ChatMessage[], cacheIndices: number[]): ChatMessage[] {
  const result = messages.slice();
  for (const index of cacheIndices) {
    if (index < 0 || index >= result.length) continue;
    const message = result[index];
    result[index] = { ...message, content: markContent(message.content) };
  }
  return result;
}

function errorResponse(err: unknown): LLMResponse {
  const message = err instanceof Error ? err.message : String(err);
  return { content: `Error: ${message}`, toolCalls: [], finishReason: 'error' };
}

/** OpenAI-compatible chat-completions client. Failures become `finishReason: 'error'`. */
export class LLMClient implements ChatModel {
  private readonly options: LLMClientOptions;

  constructor(options: LLMClientOptions) {
    this.options = options;
  }

  async chat(
    messages: ChatMessage[],
    tools: readonly ToolDefinition[],
    cacheIndices: number[] = []
  ): Promise<LLMResponse> {
    const body: Record<string, unknown> = {
      model: this.options.model,
      messages: cacheIndices.length > 0 ? applyCacheMarkers(messages, cacheIndices) : messages,
      max_tokens: this.options.maxTokens
    };
    if (tools.length > 0) {
      body.tools = tools;
      body.tool_choice = 'auto';
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);
    const startedAt = Date.now();
    try {
      const response = await fetch(`${this.options.apiBase.replace(/\/+$/, '')}/chat/completions`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.options.apiKey}`
        },
        body: JSON.stringify(body),
        signal: controller.signal
      });
      if (!response.ok) {
        const text = await response.text();
        throw new Error(`LLM HTTP ${response.status}: ${text.slice(0, 300)}`);
      }
      const parsed = completionSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new Error(`Unexpected LLM response: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`);
      }
      const choice = parsed.data.choices[0];
      const toolCalls: ToolCall[] = (choice.message.tool_calls ?? []).map(call => ({
        id: call.id,
        name: call.function.name,
        arguments: decodeToolArguments(call.function.arguments)
      }));
      logger.debug({
        model: this.options.model,
        latencyMs: Date.now() - startedAt,
        toolCalls: toolCalls.length,
        finishReason: choice.finish_reason
      }, 'LLM response');
      return {
        content: choice.message.content ?? '',
        toolCalls,
        finishReason: choice.finish_reason || 'stop'
      };
    } catch (err) {
      const aborted = err instanceof Error && err.name === 'AbortError';
      const failure = aborted ? new Error(`LLM request timed out after ${this.options.timeoutMs}ms`) : err;
      logger.error({ err: failure }, 'LLM request failed');
      return errorResponse(failure);
    } finally {
      clearTimeout(timeout);
    }
  }
}

import { z } from 'zod';

// Shapes follow the OpenAI chat-completions wire format; the same records are
// persisted to the session JSONL files.

export const cacheControlSchema = z.object({ type: z.literal('ephemeral') });

const textPartSchema = z.object({
  type: z.literal('text'),
  text: z.string(),
  cache_control: cacheControlSchema.optional()
});

const imagePartSchema = z.object({
  type: z.literal('image_url'),
  image_url: z.object({ url: z.string() }),
  cache_control: cacheControlSchema.optional()
});

export const contentPartSchema = z.discriminatedUnion('type', [textPartSchema, imagePartSchema]);

export const messageContentSchema = z.union([z.string(), z.array(contentPartSchema)]);

export const wireToolCallSchema = z.object({
  id: z.string(),
  type: z.literal('function'),
  function: z.object({
    name: z.string(),
    arguments: z.string()
  })
});

const systemMessageSchema = z.object({
  role: z.literal('system'),
  content: messageContentSchema
});

const userMessageSchema = z.object({
  role: z.literal('user'),
  content: messageContentSchema
});

const assistantMessageSchema = z.object({
  role: z.literal('assistant'),
  content: messageContentSchema,
  tool_calls: z.array(wireToolCallSchema).optional()
});

const toolMessageSchema = z.object({
  role: z.literal('tool'),
  content: messageContentSchema,
  tool_call_id: z.string(),
  name: z.string()
});

export const chatMessageSchema = z.discriminatedUnion('role', [
  systemMessageSchema,
  userMessageSchema,
  assistantMessageSchema,
  toolMessageSchema
]);

export const storedMessageSchema = chatMessageSchema.and(z.object({ ts: z.string() }));

export type CacheControl = z.infer<typeof cacheControlSchema>;
export type ContentPart = z.infer<typeof contentPartSchema>;
export type MessageContent = z.infer<typeof messageContentSchema>;
export type WireToolCall = z.infer<typeof wireToolCallSchema>;
export type UserMessage = z.infer<typeof userMessageSchema>;
export type AssistantMessage = z.infer<typeof assistantMessageSchema>;
export type ToolMessage = z.infer<typeof toolMessageSchema>;
export type ChatMessage = z.infer<typeof chatMessageSchema>;
export type StoredMessage = z.infer<typeof storedMessageSchema>;

/** A tool call after its JSON argument string has been decoded. */
export type ToolCall = {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
};

export function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Malformed or non-object argument payloads decode to `{}`. */
export function decodeToolArguments(raw: string | null | undefined): Record<string, unknown> {
  if (!raw || !raw.trim()) return {};
  try {
    const parsed: unknown = JSON.parse(raw);
    return isPlainRecord(parsed) ? parsed : {};
  } catch {
    return {};
  }
}

export function toWireToolCall(call: ToolCall): WireToolCall {
  return {
    id: call.id,
    type: 'function',
    function: {
      name: call.name,
      arguments: JSON.stringify(call.arguments)
    }
  };
}

/**
 * Fold base64 images into a multi-part user content; plain text when there
 * are no images.
 */
export function buildUserContent(text: string, imagesBase64: string[]): MessageContent {
  if (imagesBase64.length === 0) return text;
  const parts: ContentPart[] = text ? [{ type: 'text', text }] : [];
  for (const b64 of imagesBase64) {
    parts.push({ type: 'image_url', image_url: { url: `data:image/jpeg;base64,${b64}` } });
  }
  return parts;
}

/** Drop bookkeeping fields (`ts`) so only what the LLM replays remains. */
export function toChatMessage(message: StoredMessage): ChatMessage {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return message.tool_calls
        ? { role: 'assistant', content: message.content, tool_calls: message.tool_calls }
        : { role: 'assistant', content: message.content };
    case 'tool':
      return {
        role: 'tool',
        content: message.content,
        tool_call_id: message.tool_call_id,
        name: message.name
      };
  }
}

import { logger } from './logger.js';
import type { ChatModel } from './llm-client.js';
import type { MemoryStore } from './memory-store.js';
import {
  toWireToolCall,
  type AssistantMessage,
  type ChatMessage,
  type MessageContent
} from './messages.js';
import type { Session, SessionManager } from './session-store.js';
import { loadSkills } from './skill-loader.js';
import { buildContextMessage, buildSystemPrompt } from './system-prompt.js';
import type { ToolDefinition } from './tools/definitions.js';
import type { ToolResult } from './tools/executor.js';

export const MAX_ROUNDS_NOTICE = 'Reached maximum tool call rounds.';
export const LLM_ERROR_FALLBACK = 'LLM error.';

/** What the loop needs from a tool executor. */
export interface ToolRunner {
  definitions(): readonly ToolDefinition[];
  execute(name: string, args: Record<string, unknown>): Promise<ToolResult>;
}

export type ReplyCallback = (text: string) => Promise<void>;

export type TurnOutcome = {
  reply: string;
  /** A tool asked for a restart; the caller performs it after delivery. */
  restartRequested: boolean;
  /** Messages persisted for this turn, starting with the user message. */
  messages: ChatMessage[];
};

export type AgentLoopOptions = {
  model: ChatModel;
  tools: ToolRunner;
  memory: MemoryStore;
  sessions: SessionManager;
  systemPrompt: string;
  skillsDir: string;
  maxToolRounds: number;
  now?: () => Date;
};

export class AgentLoop {
  private readonly options: AgentLoopOptions;
  private readonly now: () => Date;

  constructor(options: AgentLoopOptions) {
    this.options = options;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Prompt layout, ordered for provider prefix caching:
   *   [0]        system (prompt + memory + skills)   cached
   *   [1..N]     session history                     append-only
   *   [N+1]      runtime context                     cached
   *   [N+2]      current user message
   */
  buildMessages(session: Session, userContent: MessageContent): { messages: ChatMessage[]; cacheIndices: number[] } {
    const history = session.getHistory();
    const system = buildSystemPrompt({
      basePrompt: this.options.systemPrompt,
      memory: this.options.memory.load(),
      skills: loadSkills(this.options.skillsDir)
    });
    const messages: ChatMessage[] = [
      { role: 'system', content: system },
      ...history,
      { role: 'user', content: buildContextMessage(session.key, this.now()) },
      { role: 'user', content: userContent }
    ];
    return { messages, cacheIndices: [0, 1 + history.length] };
  }

  async run(key: string, userContent: MessageContent, onReply?: ReplyCallback): Promise<TurnOutcome> {
    const session = this.options.sessions.get(key);
    const { messages, cacheIndices } = this.buildMessages(session, userContent);
    const turnMessages: ChatMessage[] = [{ role: 'user', content: userContent }];
    const tools = this.options.tools.definitions();
    const maxRounds = this.options.maxToolRounds;

    let reply = '';
    let restartRequested = false;

    for (let round = 0; round < maxRounds; round++) {
      const response = await this.options.model.chat(messages, tools, cacheIndices);

      if (response.finishReason === 'error') {
        reply = response.content || LLM_ERROR_FALLBACK;
        break;
      }

      const assistant: AssistantMessage = { role: 'assistant', content: response.content };
      if (response.toolCalls.length > 0) {
        assistant.tool_calls = response.toolCalls.map(toWireToolCall);
      }
      messages.push(assistant);
      turnMessages.push(assistant);

      if (response.toolCalls.length === 0) {
        reply = response.content;
        break;
      }

      for (const call of response.toolCalls) {
        const result = await this.options.tools.execute(call.name, call.arguments);
        if (result.restart) restartRequested = true;
        logger.debug({ key, tool: call.name, output: result.output.slice(0, 200) }, 'Tool result');
        const toolMessage: ChatMessage = {
          role: 'tool',
          tool_call_id: call.id,
          name: call.name,
          content: result.output
        };
        messages.push(toolMessage);
        turnMessages.push(toolMessage);
      }

      if (round === maxRounds - 1) {
        logger.warn({ key, maxRounds }, 'Max tool rounds reached');
        reply = MAX_ROUNDS_NOTICE;
      }
    }

    session.saveTurn(turnMessages, this.now());

    if (reply && onReply) {
      await onReply(reply);
    }
    return { reply, restartRequested, messages: turnMessages };
  }
}

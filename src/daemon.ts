import path from 'path';
import dotenv from 'dotenv';
import { AgentLoop } from './agent-loop.js';
import { ChatQueue } from './chat-queue.js';
import { LLMClient } from './llm-client.js';
import { configureLogger, logger } from './logger.js';
import { MemoryStore } from './memory-store.js';
import { createMessageHandler } from './message-handler.js';
import { ensureDirectoryStructure, resolvePaths } from './paths.js';
import { createTelegramProvider } from './providers/telegram/telegram-provider.js';
import { ProcessRestarter } from './restart.js';
import { loadRuntimeConfig, loadRuntimeSecrets } from './runtime-config.js';
import { SessionManager } from './session-store.js';
import { ToolExecutor } from './tools/executor.js';

export type DaemonOptions = {
  verbose?: boolean;
};

function logFileName(now: Date): string {
  return `${now.toISOString().replace(/[:.]/g, '-')}.log`;
}

export async function startDaemon(options: DaemonOptions = {}): Promise<void> {
  const paths = resolvePaths();
  ensureDirectoryStructure(paths);
  dotenv.config({ path: paths.envPath });

  const config = loadRuntimeConfig(paths.runtimeConfigPath);
  const level = options.verbose ? 'debug' : (process.env.LOG_LEVEL || config.logLevel);
  configureLogger({ level, logFile: path.join(paths.logsDir, logFileName(new Date())) });

  const secrets = loadRuntimeSecrets();
  if (!secrets.telegramBotToken) {
    throw new Error(`TELEGRAM_BOT_TOKEN is not set. Add it to ${paths.envPath} (run \`ferrybot init\` first).`);
  }
  if (!secrets.llmApiKey) {
    logger.warn({ envPath: paths.envPath }, 'LLM_API_KEY is not set; requests will be sent without credentials');
  }

  const memory = new MemoryStore(paths.memoryDir);
  const sessions = new SessionManager(paths.sessionsDir);
  const tools = new ToolExecutor({
    workspaceDir: paths.workspaceDir,
    memory,
    config: config.tools,
    braveSearchApiKey: secrets.braveSearchApiKey
  });
  const model = new LLMClient({
    apiKey: secrets.llmApiKey,
    apiBase: config.llm.apiBase,
    model: config.llm.model,
    maxTokens: config.llm.maxTokens,
    timeoutMs: config.llm.timeoutMs
  });
  const agent = new AgentLoop({
    model,
    tools,
    memory,
    sessions,
    systemPrompt: config.agent.systemPrompt,
    skillsDir: paths.skillsDir,
    maxToolRounds: config.agent.maxToolRounds
  });

  const provider = createTelegramProvider(config.telegram, secrets.telegramBotToken);
  const restarter = new ProcessRestarter({
    delayMs: config.agent.restartDelayMs,
    onBeforeRestart: () => provider.stop()
  });
  const handler = createMessageHandler({
    provider: provider.name,
    agent,
    sessions,
    queue: new ChatQueue(),
    restarter,
    send: (conversationId, text) => provider.send(conversationId, text),
    getBotUsername: () => provider.getBotUsername()
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'Shutting down');
    void provider.stop()
      .catch((err: unknown) => logger.error({ err }, 'Error while stopping provider'))
      .finally(() => process.exit(0));
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await provider.start(handler);
  logger.info({
    home: paths.home,
    model: config.llm.model,
    apiBase: config.llm.apiBase
  }, 'ferrybot running on Telegram (responds to DMs and group mentions/replies)');
}

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { logger } from './logger.js';

const runtimeConfigSchema = z.object({
  logLevel: z.string(),
  llm: z.object({
    apiBase: z.string().url(),
    model: z.string().min(1),
    maxTokens: z.number().int().positive(),
    timeoutMs: z.number().int().positive()
  }),
  agent: z.object({
    systemPrompt: z.string(),
    maxToolRounds: z.number().int().min(1),
    restartDelayMs: z.number().int().nonnegative()
  }),
  tools: z.object({
    shell: z.object({
      defaultTimeoutSec: z.number().positive(),
      outputLimitChars: z.number().int().positive()
    }),
    webSearch: z.object({
      endpoint: z.string().url(),
      timeoutMs: z.number().int().positive(),
      defaultCount: z.number().int().min(1).max(10)
    }),
    webFetch: z.object({
      timeoutMs: z.number().int().positive(),
      defaultMaxChars: z.number().int().positive(),
      userAgent: z.string()
    })
  }),
  telegram: z.object({
    handlerTimeoutMs: z.number().int().positive(),
    sendRetries: z.number().int().min(1),
    sendRetryDelayMs: z.number().int().nonnegative(),
    dedupSize: z.number().int().positive()
  })
});

export type RuntimeConfig = z.infer<typeof runtimeConfigSchema>;

export const DEFAULT_CONFIG: RuntimeConfig = {
  logLevel: 'info',
  llm: {
    apiBase: 'https://api.openai.com/v1',
    model: 'gpt-4o',
    maxTokens: 4096,
    timeoutMs: 180_000
  },
  agent: {
    systemPrompt: 'You are ferrybot, a helpful assistant with shell, file, memory and web tools.',
    maxToolRounds: 20,
    restartDelayMs: 1000
  },
  tools: {
    shell: {
      defaultTimeoutSec: 30,
      outputLimitChars: 8000
    },
    webSearch: {
      endpoint: 'https://api.search.brave.com/res/v1/web/search',
      timeoutMs: 10_000,
      defaultCount: 5
    },
    webFetch: {
      timeoutMs: 20_000,
      defaultMaxChars: 8000,
      userAgent: 'Mozilla/5.0 (Macintosh; Intel Mac OS X 14_7_2) AppleWebKit/537.36'
    }
  },
  telegram: {
    handlerTimeoutMs: 600_000,
    sendRetries: 3,
    sendRetryDelayMs: 1000,
    dedupSize: 1000
  }
};

/** Secrets never live in runtime.json; they come from the environment (.env). */
export type RuntimeSecrets = {
  telegramBotToken: string;
  llmApiKey: string;
  braveSearchApiKey: string;
};

let cachedConfig: RuntimeConfig | null = null;
let cachedPath: string | null = null;

function cloneConfig<T>(value: T): T {
  return structuredClone(value);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep-merge `overrides` into a copy of `base`. Keys unknown to `base` and
 * values whose type differs from the default are ignored; arrays replace.
 */
export function mergeDefaults(base: unknown, overrides: unknown): unknown {
  const result = cloneConfig(base);
  if (!isPlainObject(overrides) || !isPlainObject(result)) return result;
  for (const [key, value] of Object.entries(overrides)) {
    if (!(key in result)) continue;
    const current = result[key];
    if (isPlainObject(current) && isPlainObject(value)) {
      result[key] = mergeDefaults(current, value);
      continue;
    }
    if (Array.isArray(current) && Array.isArray(value)) {
      result[key] = value;
      continue;
    }
    if (typeof value === typeof current) {
      result[key] = value;
    }
  }
  return result;
}

function readJson(filePath: string): unknown {
  try {
    if (!fs.existsSync(filePath)) return null;
    const raw = fs.readFileSync(filePath, 'utf-8');
    if (!raw.trim()) return null;
    return JSON.parse(raw);
  } catch {
    return null;
  }
}

export function loadRuntimeConfig(configPath: string): RuntimeConfig {
  if (cachedConfig && cachedPath === configPath) return cachedConfig;
  const fromFile = readJson(configPath);
  const parsed = runtimeConfigSchema.safeParse(mergeDefaults(DEFAULT_CONFIG, fromFile));
  if (!parsed.success) {
    logger.warn({ configPath, issues: parsed.error.issues }, 'Invalid runtime config; using defaults');
  }
  const config = parsed.success ? parsed.data : cloneConfig(DEFAULT_CONFIG);
  cachedConfig = config;
  cachedPath = configPath;
  return config;
}

export function resetRuntimeConfigCache(): void {
  cachedConfig = null;
  cachedPath = null;
}

export function writeDefaultRuntimeConfig(configPath: string): boolean {
  if (fs.existsSync(configPath)) return false;
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, JSON.stringify(DEFAULT_CONFIG, null, 2) + '\n');
  return true;
}

export function loadRuntimeSecrets(env: NodeJS.ProcessEnv = process.env): RuntimeSecrets {
  return {
    telegramBotToken: env.TELEGRAM_BOT_TOKEN?.trim() || '',
    llmApiKey: env.LLM_API_KEY?.trim() || '',
    braveSearchApiKey: env.BRAVE_SEARCH_API_KEY?.trim() || ''
  };
}

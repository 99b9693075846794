#!/usr/bin/env node

import fs from 'fs';
import path from 'path';

import { startDaemon } from './daemon.js';
import { PACKAGE_ROOT, ensureDirectoryStructure, getFerrybotHome, resolvePaths } from './paths.js';
import { writeDefaultRuntimeConfig } from './runtime-config.js';

const ENV_TEMPLATE = [
  '# Telegram bot token from @BotFather',
  'TELEGRAM_BOT_TOKEN=',
  '# API key for the OpenAI-compatible endpoint in config/runtime.json',
  'LLM_API_KEY=',
  '# Optional: enables the web_search tool',
  'BRAVE_SEARCH_API_KEY=',
  ''
].join('\n');

type ParsedCliArgs = {
  command: string;
  verbose: boolean;
  args: string[];
};

function log(message: string): void {
  console.log(`[ferrybot] ${message}`);
}

function error(message: string): void {
  console.error(`[ferrybot] ERROR: ${message}`);
}

function parseCliArgs(argv: string[]): ParsedCliArgs {
  let command = '';
  let verbose = false;
  const args: string[] = [];
  for (const arg of argv) {
    if (arg === '-v' || arg === '--verbose') {
      verbose = true;
      continue;
    }
    if (!command) {
      command = arg;
      continue;
    }
    args.push(arg);
  }
  // A bare `-v` reads as the version flag.
  if (!command && verbose) return { command: 'version', verbose: false, args };
  return { command: command || 'help', verbose, args };
}

function getVersion(): string {
  try {
    const pkgPath = path.join(PACKAGE_ROOT, 'package.json');
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
    return 'unknown';
  } catch {
    return 'unknown';
  }
}

function cmdInit(): void {
  const paths = resolvePaths();
  ensureDirectoryStructure(paths);
  if (writeDefaultRuntimeConfig(paths.runtimeConfigPath)) {
    log(`Wrote default config to ${paths.runtimeConfigPath}`);
  } else {
    log(`Config already exists at ${paths.runtimeConfigPath}`);
  }
  if (!fs.existsSync(paths.envPath)) {
    fs.writeFileSync(paths.envPath, ENV_TEMPLATE, { mode: 0o600 });
    log(`Wrote secrets template to ${paths.envPath}`);
  } else {
    log(`Secrets file already exists at ${paths.envPath}`);
  }
  log('Fill in TELEGRAM_BOT_TOKEN and LLM_API_KEY, then run: ferrybot start');
}

function printHelp(): void {
  console.log(`
ferrybot - chat bot with shell, file, memory and web tools

Usage: ferrybot <command> [options]

Commands:
  init        Create the home directory, default config and .env template
  start       Run the bot in the foreground
  version     Show version
  help        Show this help message

Options:
  -v, --verbose   Debug logging (for 'start'); on its own, shows the version

Data directory: ${getFerrybotHome()}
Override with FERRYBOT_HOME environment variable.
`);
}

async function main(): Promise<void> {
  const parsed = parseCliArgs(process.argv.slice(2));
  switch (parsed.command) {
    case 'init':
      cmdInit();
      break;
    case 'start':
      await startDaemon({ verbose: parsed.verbose });
      break;
    case 'version':
    case '--version':
      console.log(`ferrybot ${getVersion()}`);
      break;
    case 'help':
    case '--help':
    case '-h':
      printHelp();
      break;
    default:
      error(`Unknown command: ${parsed.command}`);
      printHelp();
      process.exit(1);
  }
}

main().catch((err: unknown) => {
  error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});

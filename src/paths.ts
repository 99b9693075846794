/**
 * Centralized path definitions for ferrybot.
 *
 * All runtime data lives in FERRYBOT_HOME (defaults to ~/.ferrybot):
 *
 * ~/.ferrybot/
 * ├── config/
 * │   └── runtime.json
 * ├── data/
 * │   ├── sessions/      # one JSONL file per conversation
 * │   └── memory/
 * │       └── MEMORY.md  # shared long-term memory
 * ├── workspace/         # cwd for shell, base for relative tool paths
 * ├── skills/            # *.md or <name>/SKILL.md
 * ├── logs/
 * └── .env               # secrets
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { fileURLToPath } from 'url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export function getFerrybotHome(): string {
  if (process.env.FERRYBOT_HOME) {
    return path.resolve(process.env.FERRYBOT_HOME);
  }
  return path.join(os.homedir(), '.ferrybot');
}

/** Directory holding package.json, one level above src/ or dist/. */
export function getPackageRoot(): string {
  return path.resolve(__dirname, '..');
}

export type FerrybotPaths = {
  home: string;
  configDir: string;
  dataDir: string;
  sessionsDir: string;
  memoryDir: string;
  workspaceDir: string;
  skillsDir: string;
  logsDir: string;
  envPath: string;
  runtimeConfigPath: string;
};

export function resolvePaths(home: string = getFerrybotHome()): FerrybotPaths {
  const configDir = path.join(home, 'config');
  const dataDir = path.join(home, 'data');
  return {
    home,
    configDir,
    dataDir,
    sessionsDir: path.join(dataDir, 'sessions'),
    memoryDir: path.join(dataDir, 'memory'),
    workspaceDir: path.join(home, 'workspace'),
    skillsDir: path.join(home, 'skills'),
    logsDir: path.join(home, 'logs'),
    envPath: path.join(home, '.env'),
    runtimeConfigPath: path.join(configDir, 'runtime.json')
  };
}

export const PACKAGE_ROOT = getPackageRoot();

export function ensureDirectoryStructure(paths: FerrybotPaths): void {
  const dirs = [
    paths.home,
    paths.configDir,
    paths.dataDir,
    paths.sessionsDir,
    paths.memoryDir,
    paths.workspaceDir,
    paths.skillsDir,
    paths.logsDir
  ];
  for (const dir of dirs) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

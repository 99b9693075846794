import { spawn } from 'child_process';
import { logger } from './logger.js';

export interface Restarter {
  restart(): Promise<void>;
}

export type ProcessRestarterOptions = {
  delayMs: number;
  /** Runs before the replacement process starts, e.g. to stop polling. */
  onBeforeRestart?: () => Promise<void>;
};

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Relaunches the current executable with the same arguments, then exits.
 * The child is detached and inherits stdio so it survives our exit.
 */
export class ProcessRestarter implements Restarter {
  private readonly options: ProcessRestarterOptions;
  private restarting = false;

  constructor(options: ProcessRestarterOptions) {
    this.options = options;
  }

  async restart(): Promise<void> {
    if (this.restarting) return;
    this.restarting = true;
    await sleep(this.options.delayMs);
    if (this.options.onBeforeRestart) {
      try {
        await this.options.onBeforeRestart();
      } catch (err) {
        logger.warn({ err }, 'Pre-restart hook failed; restarting anyway');
      }
    }
    const args = [...process.execArgv, ...process.argv.slice(1)];
    logger.info({ execPath: process.execPath, args }, 'Restarting process');
    const child = spawn(process.execPath, args, {
      detached: true,
      stdio: 'inherit',
      env: process.env,
      cwd: process.cwd()
    });
    child.unref();
    process.exit(0);
  }
}

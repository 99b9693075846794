import { spawn } from 'child_process';

export type CommandResult = {
  stdout: string;
  stderr: string;
  exitCode: number | null;
  durationMs: number;
  timedOut: boolean;
};

// Per-stream cap on what is buffered; callers truncate further.
const MAX_CAPTURE_CHARS = 1_000_000;
const KILL_GRACE_MS = 2000;
// setTimeout fires immediately for delays above a signed 32-bit int.
const MAX_TIMER_MS = 2_147_483_647;

/**
 * Run `command` through bash in its own process group so a timeout can take
 * down every child it started.
 */
export function runCommand(command: string, timeoutMs: number, cwd: string): Promise<CommandResult> {
  return new Promise<CommandResult>((resolve, reject) => {
    const start = Date.now();
    const child = spawn('/bin/bash', ['-c', command], {
      cwd,
      env: process.env,
      detached: true,
      stdio: ['ignore', 'pipe', 'pipe']
    });

    let stdout = '';
    let stderr = '';
    let timedOut = false;
    let killTimer: NodeJS.Timeout | null = null;

    const killProcessGroup = (signal: NodeJS.Signals) => {
      try {
        if (child.pid) process.kill(-child.pid, signal);
      } catch {
        try { child.kill(signal); } catch { /* process already exited */ }
      }
    };

    // Decode through the stream so multi-byte characters split across
    // chunks survive.
    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');
    child.stdout.on('data', (data: string) => {
      if (stdout.length < MAX_CAPTURE_CHARS) stdout += data;
    });
    child.stderr.on('data', (data: string) => {
      if (stderr.length < MAX_CAPTURE_CHARS) stderr += data;
    });

    const timeout = setTimeout(() => {
      timedOut = true;
      killProcessGroup('SIGTERM');
      killTimer = setTimeout(() => killProcessGroup('SIGKILL'), KILL_GRACE_MS);
    }, Math.min(timeoutMs, MAX_TIMER_MS));

    child.on('close', (code) => {
      clearTimeout(timeout);
      if (killTimer) clearTimeout(killTimer);
      resolve({
        stdout,
        stderr,
        exitCode: code,
        durationMs: Date.now() - start,
        timedOut
      });
    });

    child.on('error', (err) => {
      clearTimeout(timeout);
      if (killTimer) clearTimeout(killTimer);
      reject(err);
    });
  });
}

export function formatShellOutput(result: CommandResult, limit: number): string {
  const combined = (result.stdout + result.stderr).trim().slice(0, limit);
  return combined || '(no output)';
}

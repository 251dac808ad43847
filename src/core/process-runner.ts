// core/process-runner.ts
// Spawn an external tool with a timeout and cancellation

import { spawn } from 'child_process';
import { ExternalToolError, PipelineCancelledError } from '../types/index.js';

export interface ProcessResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export interface RunOptions {
  cwd?: string;
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * Converters and validators receive the runner as a dependency,
 * so tests can replace the external tools.
 */
export type ProcessRunner = (
  command: string,
  args: string[],
  options?: RunOptions
) => Promise<ProcessResult>;

export const runProcess: ProcessRunner = (command, args, options = {}) => {
  const { cwd, timeoutMs, signal } = options;

  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new PipelineCancelledError(command));
      return;
    }

    // Own process group, so a timeout or cancel also reaches the tool's children
    const child = spawn(command, args, {
      cwd,
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: true,
    });

    let stdout = '';
    let stderr = '';
    let timedOut = false;
    let cancelled = false;
    let settled = false;
    let exited: { exitCode: number | null; signal: NodeJS.Signals | null } | undefined;

    const killGroup = (killSignal: NodeJS.Signals) => {
      if (child.pid === undefined) return;
      try {
        process.kill(-child.pid, killSignal);
      } catch {
        child.kill(killSignal);
      }
    };

    const complete = (exitCode: number | null, exitSignal: NodeJS.Signals | null) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
      if (cancelled) {
        reject(new PipelineCancelledError(command));
        return;
      }
      resolve({ exitCode, signal: exitSignal, stdout, stderr, timedOut });
    };

    // After a kill, descendants may still hold the pipes; stop waiting for them
    const stopWaiting = () => {
      if (!exited) return;
      child.stdout?.destroy();
      child.stderr?.destroy();
      complete(exited.exitCode, exited.signal);
    };

    const timer = timeoutMs
      ? setTimeout(() => {
          timedOut = true;
          killGroup('SIGKILL');
          stopWaiting();
        }, timeoutMs)
      : undefined;

    const onAbort = () => {
      cancelled = true;
      killGroup('SIGTERM');
      stopWaiting();
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    child.stdout?.setEncoding('utf8');
    child.stderr?.setEncoding('utf8');

    child.stdout?.on('data', (data: string) => {
      stdout += data;
    });

    child.stderr?.on('data', (data: string) => {
      stderr += data;
    });

    child.on('exit', (exitCode, exitSignal) => {
      exited = { exitCode, signal: exitSignal };
      if (timedOut || cancelled) stopWaiting();
    });

    child.on('close', (exitCode, exitSignal) => {
      complete(exitCode, exitSignal);
    });

    child.on('error', (error: NodeJS.ErrnoException) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
      reject(new ExternalToolError(
        `Failed to spawn ${command}`,
        command,
        error.code,
        error.message
      ));
    });
  });
};

/**
 * Substitute {name} placeholders in an argument template
 */
export function expandArgs(template: string[], values: Record<string, string>): string[] {
  return template.map(arg =>
    arg.replace(/\{(\w+)\}/g, (whole, key: string) => values[key] ?? whole)
  );
}

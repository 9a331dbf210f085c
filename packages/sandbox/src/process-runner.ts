import { spawn } from 'node:child_process';
import treeKill from 'tree-kill';
import type { ProcessRunResult } from '@selfwright/core';
import { createLogger } from '@selfwright/core';

const log = createLogger('ProcessRunner');

/** Per-stream capture cap */
const MAX_OUTPUT = 1024 * 1024;

export interface RunProcessOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeoutMs: number;
  /** Extra teardown on timeout (e.g. killing a container the CLI started) */
  onTimeout?: () => Promise<void>;
}

function appendCapped(current: string, chunk: Buffer): string {
  if (current.length >= MAX_OUTPUT) return current;
  const text = chunk.toString();
  return current.length + text.length > MAX_OUTPUT
    ? current + text.slice(0, MAX_OUTPUT - current.length)
    : current + text;
}

/**
 * Spawn a command and collect its output. Never rejects.
 *
 * On timeout the whole process tree is SIGKILLed and the promise resolves
 * right away with `timedOut: true`; it does not wait for the child to exit.
 */
export function runProcess(
  command: string,
  args: string[],
  options: RunProcessOptions,
): Promise<ProcessRunResult> {
  return new Promise((resolve) => {
    let stdout = '';
    let stderr = '';
    let settled = false;
    let timer: ReturnType<typeof setTimeout> | undefined;

    const finish = (result: ProcessRunResult): void => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      resolve(result);
    };

    const child = spawn(command, args, {
      cwd: options.cwd,
      env: options.env,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    timer = setTimeout(() => {
      log.warn(`${command} exceeded ${options.timeoutMs}ms, killing`);
      if (child.pid) {
        treeKill(child.pid, 'SIGKILL', (err) => {
          if (err) log.warn(`tree-kill failed for PID ${child.pid}: ${err.message}`);
        });
      }
      if (options.onTimeout) {
        options.onTimeout().catch((err: unknown) => {
          log.warn(`Timeout teardown failed: ${String(err)}`);
        });
      }
      finish({ exitCode: -1, stdout, stderr, timedOut: true });
    }, options.timeoutMs);

    child.stdout?.on('data', (chunk: Buffer) => {
      stdout = appendCapped(stdout, chunk);
    });
    child.stderr?.on('data', (chunk: Buffer) => {
      stderr = appendCapped(stderr, chunk);
    });

    child.on('error', (err) => {
      finish({ exitCode: -1, stdout, stderr: stderr || err.message, timedOut: false });
    });

    child.on('close', (code) => {
      finish({ exitCode: code ?? -1, stdout, stderr, timedOut: false });
    });
  });
}

import { randomUUID } from 'node:crypto';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, isAbsolute, join, relative, resolve } from 'node:path';
import type {
  IIsolationBackend,
  IVerifier,
  ProcessRunResult,
  VerificationMode,
  VerificationOutcome,
  VerificationRequest,
} from '@selfwright/core';
import { createLogger, errorMessage } from '@selfwright/core';
import { runProcess } from './process-runner.js';
import type { VerifierConfig } from './types.js';
import { DEFAULT_VERIFIER_CONFIG } from './types.js';

const log = createLogger('IsolatedVerifier');

const DEADLINE_EXCEEDED = Symbol('deadline-exceeded');

/** Settle with the task's value, or with DEADLINE_EXCEEDED once `ms` have passed */
function withinDeadline<T>(task: Promise<T>, ms: number): Promise<T | typeof DEADLINE_EXCEEDED> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<typeof DEADLINE_EXCEEDED>((resolve) => {
    timer = setTimeout(() => resolve(DEADLINE_EXCEEDED), Math.max(0, ms));
  });
  return Promise.race([task, deadline]).finally(() => clearTimeout(timer));
}

const TIMED_OUT: ProcessRunResult = { exitCode: -1, stdout: '', stderr: '', timedOut: true };

/** Environment for degraded local runs: no inherited credentials */
function buildLocalEnv(runDir: string): NodeJS.ProcessEnv {
  return {
    PATH: process.env.PATH,
    HOME: runDir,
    TMPDIR: runDir,
    NODE_ENV: 'test',
  };
}

/**
 * Runs verification scripts against proposed changes.
 *
 * Each run gets a fresh directory holding the affected files and the script.
 * The preferred path executes it in a throwaway container with no network and
 * bounded CPU/memory/pids; when the isolation backend is unavailable the same
 * command runs as a local child process. One deadline covers the backend
 * availability checks and the script; container removal happens in the background so it
 * never delays the outcome. Generated code is only ever executed by that
 * child, never imported here.
 */
export class IsolatedVerifier implements IVerifier {
  private readonly config: VerifierConfig;

  constructor(
    private readonly backend: IIsolationBackend,
    config: Partial<VerifierConfig> = {},
  ) {
    this.config = { ...DEFAULT_VERIFIER_CONFIG, ...config };
  }

  async run(request: VerificationRequest): Promise<VerificationOutcome> {
    const started = Date.now();
    const timeoutMs = request.timeoutMs > 0 ? request.timeoutMs : this.config.timeoutMs;
    const deadline = started + timeoutMs;
    const remaining = (): number => Math.max(0, deadline - Date.now());
    let mode: VerificationMode = 'local';
    let runDir: string | null = null;

    try {
      runDir = await mkdtemp(join(tmpdir(), 'selfwright-verify-'));
      await this.stage(runDir, request);

      const ready = await withinDeadline(this.isolationReady(), remaining());
      if (ready === DEADLINE_EXCEEDED) {
        log.warn(`Isolation backend did not answer within ${timeoutMs}ms`);
        return this.toOutcome(TIMED_OUT, started, mode, timeoutMs);
      }

      let run: Promise<ProcessRunResult>;
      if (ready) {
        mode = 'isolated';
        run = this.runIsolated(runDir, remaining());
      } else {
        log.warn('Isolation backend unavailable, running verification locally (degraded: no network or resource isolation)');
        run = this.runLocal(runDir, remaining());
      }

      const result = await withinDeadline(run, remaining());
      return this.toOutcome(result === DEADLINE_EXCEEDED ? TIMED_OUT : result, started, mode, timeoutMs);
    } catch (error) {
      const message = errorMessage(error);
      log.error(`Verification could not run: ${message}`);
      return {
        passed: false,
        output: '',
        error: message,
        exitCode: -1,
        durationMs: Date.now() - started,
        timedOut: false,
        mode,
      };
    } finally {
      if (runDir) {
        await rm(runDir, { recursive: true, force: true }).catch((err: unknown) => {
          log.warn(`Failed to remove run directory ${runDir}: ${errorMessage(err)}`);
        });
      }
    }
  }

  private async isolationReady(): Promise<boolean> {
    if (!(await this.backend.isAvailable())) return false;
    if (!(await this.backend.imageExists(this.config.image))) {
      log.warn(`Verifier image ${this.config.image} not present locally`);
      return false;
    }
    return true;
  }

  private async runIsolated(runDir: string, timeoutMs: number): Promise<ProcessRunResult> {
    const name = `selfwright-verify-${randomUUID().slice(0, 8)}`;
    try {
      return await this.backend.runEphemeral({
        name,
        image: this.config.image,
        workspaceDir: runDir,
        command: this.config.command,
        cpus: this.config.cpus,
        memoryMb: this.config.memoryMb,
        pidsLimit: this.config.pidsLimit,
        timeoutMs,
      });
    } finally {
      this.backend.removeContainer(name).catch((err: unknown) => {
        log.warn(`Failed to remove container ${name}: ${errorMessage(err)}`);
      });
    }
  }

  private runLocal(runDir: string, timeoutMs: number): Promise<ProcessRunResult> {
    const [command, ...args] = this.config.command;
    return runProcess(command, args, {
      cwd: runDir,
      env: buildLocalEnv(runDir),
      timeoutMs,
    });
  }

  /** Write affected files at their relative paths, then the script */
  private async stage(runDir: string, request: VerificationRequest): Promise<void> {
    const scriptPath = join(runDir, this.config.scriptFileName);
    for (const [path, content] of Object.entries(request.files)) {
      const target = resolve(runDir, path);
      const rel = relative(runDir, target);
      if (isAbsolute(path) || rel.startsWith('..') || isAbsolute(rel)) {
        throw new Error(`Refusing to stage file outside run directory: ${path}`);
      }
      if (target === scriptPath) {
        throw new Error(`Refusing to stage ${path}: it would be overwritten by the verification script`);
      }
      await mkdir(dirname(target), { recursive: true });
      await writeFile(target, content, 'utf-8');
    }
    await writeFile(scriptPath, request.script, 'utf-8');
  }

  private toOutcome(
    result: ProcessRunResult,
    started: number,
    mode: VerificationMode,
    timeoutMs: number,
  ): VerificationOutcome {
    const durationMs = Date.now() - started;
    if (result.timedOut) {
      return {
        passed: false,
        output: result.stdout,
        error: `TIMEOUT: verification exceeded ${timeoutMs}ms`,
        exitCode: -1,
        durationMs,
        timedOut: true,
        mode,
      };
    }

    const passed = result.exitCode === 0;
    log.info(`Verification ${passed ? 'passed' : 'failed'} (exit ${result.exitCode}, ${durationMs}ms, ${mode})`);
    return {
      passed,
      output: result.stdout,
      error: result.stderr.trim() || undefined,
      exitCode: result.exitCode,
      durationMs,
      timedOut: false,
      mode,
    };
  }
}

import type { EphemeralRunOptions, IIsolationBackend, ProcessRunResult } from '@selfwright/core';
import { createLogger } from '@selfwright/core';
import { runProcess } from './process-runner.js';

const log = createLogger('DockerClient');

/** Label to identify all verifier containers (used for cleanup queries) */
const LABEL_APP = 'com.selfwright.verifier';
/** Timeout for short management commands (info, inspect, kill, rm) */
const CONTROL_TIMEOUT_MS = 10_000;

/**
 * Thin wrapper around the Docker CLI. Every call is a child process with its
 * own timeout; nothing here blocks the event loop.
 */
export class DockerClient implements IIsolationBackend {
  private readonly docker: string;

  constructor(dockerPath = 'docker') {
    this.docker = dockerPath;
  }

  /** Check if the Docker daemon is reachable */
  async isAvailable(): Promise<boolean> {
    const result = await this.control(['info', '--format', '{{.ID}}']);
    return result.exitCode === 0;
  }

  /** Check if an image exists locally (runs never pull: the sandbox has no network) */
  async imageExists(tag: string): Promise<boolean> {
    const result = await this.control(['image', 'inspect', tag]);
    return result.exitCode === 0;
  }

  /** Build the `docker run` argument list for a throwaway, network-disabled container */
  buildRunArgs(options: EphemeralRunOptions): string[] {
    return [
      'run',
      '--rm',
      '--name', options.name,
      '--label', `${LABEL_APP}=true`,
      // Use tini as PID 1 so a kill reaches the script's children
      '--init',
      '--network', 'none',
      '--cpus', String(options.cpus),
      '--memory', `${options.memoryMb}m`,
      '--pids-limit', String(options.pidsLimit),
      '--read-only',
      '--tmpfs', '/tmp',
      '--security-opt', 'no-new-privileges',
      '-v', `${options.workspaceDir}:/workspace`,
      '-w', '/workspace',
      options.image,
      ...options.command,
    ];
  }

  /** Run a command in a fresh container that is removed on exit or timeout */
  async runEphemeral(options: EphemeralRunOptions): Promise<ProcessRunResult> {
    log.info(`Running ${options.command.join(' ')} in ${options.image} as ${options.name}`);
    return runProcess(this.docker, this.buildRunArgs(options), {
      timeoutMs: options.timeoutMs,
      // Killing the CLI does not stop the container; kill it explicitly
      onTimeout: () => this.killContainer(options.name),
    });
  }

  async killContainer(name: string): Promise<void> {
    const result = await this.control(['kill', name]);
    if (result.exitCode !== 0) {
      log.warn(`Failed to kill container ${name}: ${result.stderr.trim()}`);
    }
  }

  /** Force-remove a container. A container already gone (--rm) is not an error. */
  async removeContainer(name: string): Promise<void> {
    const result = await this.control(['rm', '-f', name]);
    if (result.exitCode !== 0 && !/no such container/i.test(result.stderr)) {
      log.warn(`Failed to remove container ${name}: ${result.stderr.trim()}`);
    }
  }

  private control(args: string[]): Promise<ProcessRunResult> {
    return runProcess(this.docker, args, { timeoutMs: CONTROL_TIMEOUT_MS });
  }
}

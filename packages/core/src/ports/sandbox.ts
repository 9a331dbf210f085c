export type VerificationMode = 'isolated' | 'local';

export interface VerificationRequest {
  /** Script source, executed as the entry file of the run */
  script: string;
  /** Affected file contents keyed by project-relative path */
  files: Record<string, string>;
  timeoutMs: number;
}

export interface VerificationOutcome {
  passed: boolean;
  output: string;
  error?: string;
  /** -1 when the run was killed or never started */
  exitCode: number;
  durationMs: number;
  timedOut: boolean;
  mode: VerificationMode;
}

/** Options for one ephemeral, network-disabled container run */
export interface EphemeralRunOptions {
  name: string;
  image: string;
  /** Host directory mounted as the container's working directory */
  workspaceDir: string;
  command: string[];
  cpus: number;
  memoryMb: number;
  pidsLimit: number;
  timeoutMs: number;
}

export interface ProcessRunResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

/** Sandboxed execution runtime (Docker CLI in practice) */
export interface IIsolationBackend {
  isAvailable(): Promise<boolean>;
  imageExists(tag: string): Promise<boolean>;
  runEphemeral(options: EphemeralRunOptions): Promise<ProcessRunResult>;
  removeContainer(name: string): Promise<void>;
}

/** Executes verification scripts against proposed changes */
export interface IVerifier {
  run(request: VerificationRequest): Promise<VerificationOutcome>;
}

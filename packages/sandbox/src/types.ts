export interface VerifierConfig {
  /** Base image for isolated runs; must already exist locally */
  image: string;
  /** CPU limit per run (Docker --cpus) */
  cpus: number;
  /** Memory limit in MB per run (Docker --memory) */
  memoryMb: number;
  /** Max number of processes per run (Docker --pids-limit) */
  pidsLimit: number;
  /** File name the verification script is written to */
  scriptFileName: string;
  /** Command executed in the run directory; references the script by file name */
  command: string[];
  /** Default timeout when the caller does not pass one */
  timeoutMs: number;
}

export const DEFAULT_VERIFIER_CONFIG: VerifierConfig = {
  image: 'node:20-slim',
  cpus: 0.5,
  memoryMb: 256,
  pidsLimit: 64,
  scriptFileName: 'verify.mjs',
  command: ['node', 'verify.mjs'],
  timeoutMs: 60_000,
};

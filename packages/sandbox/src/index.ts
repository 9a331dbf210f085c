export { DockerClient } from './docker-client.js';
export { IsolatedVerifier } from './isolated-verifier.js';
export { runProcess } from './process-runner.js';
export type { RunProcessOptions } from './process-runner.js';

export type { VerifierConfig } from './types.js';
export { DEFAULT_VERIFIER_CONFIG } from './types.js';

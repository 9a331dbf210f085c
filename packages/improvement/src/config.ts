import { existsSync, readFileSync } from 'node:fs';
import { isAbsolute, join, resolve } from 'node:path';
import { z } from 'zod';
import { createLogger, DEFAULT_DATA_DIR_NAME, DEFAULT_HISTORY_LIMIT } from '@selfwright/core';
import { DEFAULT_VERIFIER_CONFIG } from '@selfwright/sandbox';
import type { VerifierConfig } from '@selfwright/sandbox';
import { DEFAULT_ANALYZER_OPTIONS } from './opportunity-analyzer.js';
import type { AnalyzerOptions } from './opportunity-analyzer.js';
import { DEFAULT_GENERATOR_OPTIONS } from './change-generator.js';
import type { GeneratorOptions } from './change-generator.js';
import { DEFAULT_SCHEDULER_OPTIONS } from './improvement-scheduler.js';
import type { SchedulerOptions } from './improvement-scheduler.js';
import { DEFAULT_GIT_TIMEOUT_MS } from './git-utils.js';

const log = createLogger('Config');

export const CONFIG_FILE_NAME = 'selfwright.config.json';

export interface PublisherConfig {
  /** Commit and push accepted improvements */
  enabled: boolean;
  remote: string;
  /** Branch to push; the checked-out branch when unset */
  branch?: string;
  /** Timeout of each git invocation */
  commandTimeoutMs: number;
}

export interface SelfImprovementConfig {
  /** Master switch; when false the service never starts a cycle */
  enabled: boolean;
  projectRoot: string;
  /** History, snapshots and results live here */
  dataDir: string;
  scheduler: SchedulerOptions;
  history: { maxEntries: number };
  analyzer: AnalyzerOptions;
  generator: Omit<GeneratorOptions, 'projectRoot'>;
  verifier: VerifierConfig;
  publisher: PublisherConfig;
  /** Settled snapshots kept on disk */
  snapshots: { keep: number };
}

type Defaults = Omit<SelfImprovementConfig, 'projectRoot' | 'dataDir'>;

const DEFAULT_CONFIG: Defaults = {
  enabled: true,
  scheduler: { ...DEFAULT_SCHEDULER_OPTIONS },
  history: { maxEntries: DEFAULT_HISTORY_LIMIT },
  analyzer: { ...DEFAULT_ANALYZER_OPTIONS },
  generator: { ...DEFAULT_GENERATOR_OPTIONS },
  verifier: { ...DEFAULT_VERIFIER_CONFIG },
  publisher: { enabled: true, remote: 'origin', commandTimeoutMs: DEFAULT_GIT_TIMEOUT_MS },
  snapshots: { keep: 20 },
};

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();

const ConfigFileSchema = z.object({
  enabled: z.boolean(),
  dataDir: z.string().min(1),
  scheduler: z
    .object({
      idleThresholdMs: nonNegativeInt,
      tickIntervalMs: positiveInt,
      maxOpportunitiesPerCycle: positiveInt,
      cooldownMs: nonNegativeInt,
      maxAttemptsPerOpportunity: positiveInt,
      attemptMemoryMs: nonNegativeInt,
      maxConsecutiveFailures: positiveInt,
    })
    .partial(),
  history: z.object({ maxEntries: positiveInt }).partial(),
  analyzer: z
    .object({
      windowMs: positiveInt,
      slowFactor: z.number().positive(),
      minLatencySamples: positiveInt,
    })
    .partial(),
  generator: z
    .object({
      pluginsDir: z.string(),
      baseContextFiles: z.array(z.string()),
      maxExcerptChars: positiveInt,
      maxContextTools: nonNegativeInt,
    })
    .partial(),
  verifier: z
    .object({
      image: z.string().min(1),
      cpus: z.number().positive(),
      memoryMb: positiveInt,
      pidsLimit: positiveInt,
      scriptFileName: z.string().min(1),
      command: z.array(z.string()).min(1),
      timeoutMs: positiveInt,
    })
    .partial(),
  publisher: z
    .object({
      enabled: z.boolean(),
      remote: z.string().min(1),
      branch: z.string().min(1),
      commandTimeoutMs: positiveInt,
    })
    .partial(),
  snapshots: z.object({ keep: nonNegativeInt }).partial(),
}).partial();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface LoadConfigOptions {
  /** Defaults to SELFWRIGHT_PROJECT_ROOT, then the current directory */
  projectRoot?: string;
  /** Explicit config file; defaults to selfwright.config.json in the project root */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

function readConfigFile(path: string): ConfigFile {
  if (!existsSync(path)) {
    log.info(`No config file at ${path}, using defaults`);
    return {};
  }

  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    log.warn(`Failed to parse ${path}, using defaults: ${String(error)}`);
    return {};
  }

  const parsed = ConfigFileSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', ');
    log.warn(`Invalid config in ${path}, using defaults: ${issues}`);
    return {};
  }

  log.info(`Loaded config from ${path}`);
  return parsed.data;
}

function parseBoolean(name: string, value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  log.warn(`Ignoring ${name}: expected a boolean, got "${value}"`);
  return undefined;
}

function parseMs(name: string, value: string | undefined): number | undefined {
  if (value === undefined || value === '') return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    log.warn(`Ignoring ${name}: expected a non-negative integer, got "${value}"`);
    return undefined;
  }
  return parsed;
}

/** Resolve config: defaults ← config file ← environment */
export function loadConfig(options: LoadConfigOptions = {}): SelfImprovementConfig {
  const env = options.env ?? process.env;
  const projectRoot = resolve(options.projectRoot ?? env.SELFWRIGHT_PROJECT_ROOT ?? process.cwd());
  const file = readConfigFile(options.configPath ?? join(projectRoot, CONFIG_FILE_NAME));

  const enabled = parseBoolean('SELFWRIGHT_ENABLED', env.SELFWRIGHT_ENABLED);
  const autoPublish = parseBoolean('SELFWRIGHT_AUTO_PUBLISH', env.SELFWRIGHT_AUTO_PUBLISH);
  const idleThresholdMs = parseMs('SELFWRIGHT_IDLE_THRESHOLD_MS', env.SELFWRIGHT_IDLE_THRESHOLD_MS);
  const cooldownMs = parseMs('SELFWRIGHT_COOLDOWN_MS', env.SELFWRIGHT_COOLDOWN_MS);

  const dataDirSetting = env.SELFWRIGHT_DATA_DIR || file.dataDir || DEFAULT_DATA_DIR_NAME;
  const dataDir = isAbsolute(dataDirSetting) ? dataDirSetting : resolve(projectRoot, dataDirSetting);

  const merged: SelfImprovementConfig = {
    enabled: enabled ?? file.enabled ?? DEFAULT_CONFIG.enabled,
    projectRoot,
    dataDir,
    scheduler: {
      ...DEFAULT_CONFIG.scheduler,
      ...file.scheduler,
      ...(idleThresholdMs !== undefined ? { idleThresholdMs } : {}),
      ...(cooldownMs !== undefined ? { cooldownMs } : {}),
    },
    history: { ...DEFAULT_CONFIG.history, ...file.history },
    analyzer: { ...DEFAULT_CONFIG.analyzer, ...file.analyzer },
    generator: { ...DEFAULT_CONFIG.generator, ...file.generator },
    verifier: { ...DEFAULT_CONFIG.verifier, ...file.verifier },
    publisher: {
      ...DEFAULT_CONFIG.publisher,
      ...file.publisher,
      ...(autoPublish !== undefined ? { enabled: autoPublish } : {}),
    },
    snapshots: { ...DEFAULT_CONFIG.snapshots, ...file.snapshots },
  };

  log.info(
    `Config resolved: enabled=${merged.enabled}, root=${merged.projectRoot}, publish=${merged.publisher.enabled}`,
  );
  return merged;
}

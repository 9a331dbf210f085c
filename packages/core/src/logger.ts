export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  scope: string;
  message: string;
  data?: unknown;
  /** Opportunity id (or other unit of work) the entry belongs to */
  correlationId?: string;
}

export type LogTransport = (entry: LogEntry) => void;

type LogMethod = (message: string, data?: unknown, correlationId?: string) => void;

export type Logger = Record<LogLevel, LogMethod>;

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

/** Stream and line prefix per level */
const LEVEL_OUTPUT: Record<LogLevel, { stream: 'stdout' | 'stderr'; label: string }> = {
  debug: { stream: 'stdout', label: '' },
  info: { stream: 'stdout', label: '' },
  warn: { stream: 'stderr', label: 'WARN ' },
  error: { stream: 'stderr', label: 'ERROR ' },
};

const transports = new Set<LogTransport>();
let minLevel: LogLevel = 'debug';

/** Register a transport for every entry; returns a function that removes it */
export function addLogTransport(transport: LogTransport): () => void {
  transports.add(transport);
  return () => {
    transports.delete(transport);
  };
}

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

/** `[Scope] (correlation) message {data}` */
export function formatLogEntry(entry: LogEntry): string {
  const tag = entry.correlationId ? `[${entry.scope}] (${entry.correlationId})` : `[${entry.scope}]`;
  const tail = entry.data === undefined ? '' : ` ${JSON.stringify(entry.data)}`;
  return `${LEVEL_OUTPUT[entry.level].label}${tag} ${entry.message}${tail}`;
}

/** Default transport. Writes to the process streams directly so console patching cannot recurse. */
export function consoleTransport(entry: LogEntry): void {
  process[LEVEL_OUTPUT[entry.level].stream].write(`${formatLogEntry(entry)}\n`);
}

/**
 * Mask API keys, GitHub tokens and `user:password@` credentials in URLs.
 * Git diagnostics echo the remote URL, which may carry a token.
 */
export function redactSecrets(message: string): string {
  return message
    .replace(/\b(sk-[a-zA-Z0-9_-]{10})[a-zA-Z0-9_-]{20,}/g, '$1****')
    .replace(/\b(gh[pousr]_[a-zA-Z0-9]{4})[a-zA-Z0-9]{20,}/g, '$1****')
    .replace(/(https?:\/\/)[^/\s:@]+:[^/\s@]+@/g, '$1****@');
}

function dispatch(entry: LogEntry): void {
  if (LEVEL_RANK[entry.level] < LEVEL_RANK[minLevel]) return;
  const redacted: LogEntry = { ...entry, message: redactSecrets(entry.message) };
  for (const transport of [...transports]) {
    try {
      transport(redacted);
    } catch (error) {
      // A broken transport must not break the caller
      process.stderr.write(`Log transport failed: ${error instanceof Error ? error.message : String(error)}\n`);
    }
  }
}

/**
 * Scoped logger, one per module:
 *   const log = createLogger('ImprovementPipeline');
 *   log.info('[snapshotting] Snapshot created', { snapshotId }, opportunity.id);
 */
export function createLogger(scope: string): Logger {
  const method =
    (level: LogLevel): LogMethod =>
    (message, data, correlationId) =>
      dispatch({ timestamp: new Date().toISOString(), level, scope, message, data, correlationId });

  return {
    debug: method('debug'),
    info: method('info'),
    warn: method('warn'),
    error: method('error'),
  };
}

addLogTransport(consoleTransport);

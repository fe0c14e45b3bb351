import { Writable } from 'node:stream';

import pino from 'pino';

import { validateLoggerEnv, type LoggerEnvConfig } from './env.schema.js';

export type Logger = pino.Logger;

interface TransportMode {
  console: boolean;
  file: boolean;
}

interface TransportTarget {
  level: string;
  options: Record<string, unknown>;
  target: string;
}

const env: LoggerEnvConfig = validateLoggerEnv(process.env);

const loggerCache = new Map<string, Logger>();

let rootLogger: Logger | undefined;

// Mutable so the CLI can silence console output in --json mode
let transportMode: TransportMode = {
  console: env.LOGGER_CONSOLE_ENABLED,
  file: env.LOGGER_FILE_LOG_ENABLED,
};

/**
 * Pads or truncates a category label to a fixed width, prefixing an
 * ellipsis when it had to be cut.
 */
export function formatLabel(label: string, size: number): string {
  const str = label.padStart(size);
  return str.length <= size ? str : `…${str.slice(-size + 1)}`;
}

function isTestEnvironment(): boolean {
  return env.NODE_ENV === 'test' || process.env['NODE_ENV'] === 'test' || process.env['VITEST'] === 'true';
}

function buildTransportTargets(): TransportTarget[] {
  const targets: TransportTarget[] = [];

  if (transportMode.console) {
    if (env.NODE_ENV === 'development') {
      targets.push({
        level: 'trace',
        options: { destination: 2, ignore: 'pid,hostname,category,categoryLabel,service,environment' },
        target: 'pino-pretty',
      });
    } else {
      targets.push({ level: 'trace', options: { destination: 2 }, target: 'pino/file' });
    }
  }

  if (transportMode.file) {
    targets.push({
      level: 'trace',
      options: {
        destination: `./${env.LOGGER_FILE_LOG_DIRNAME}/${env.LOGGER_FILE_LOG_FILENAME}`,
        mkdir: true,
      },
      target: 'pino/file',
    });
  }

  return targets;
}

function createRootLogger(): Logger {
  const config: pino.LoggerOptions = {
    base: {
      environment: env.NODE_ENV,
      pid: process.pid,
      service: env.LOGGER_SERVICE_NAME,
    },
    level: env.LOGGER_LOG_LEVEL,
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  // Tests never spawn transport worker threads
  if (isTestEnvironment()) {
    const noopStream = new Writable({
      write(_chunk, _encoding, callback) {
        callback();
      },
    });
    return pino(config, noopStream);
  }

  const targets = buildTransportTargets();
  if (targets.length === 0) {
    return pino({ ...config, enabled: false });
  }
  return pino({ ...config, transport: { targets } });
}

function getOrCreateCategoryLogger(category: string): Logger {
  const cached = loggerCache.get(category);
  if (cached) return cached;

  if (!rootLogger) {
    rootLogger = createRootLogger();
  }

  const categoryLogger = rootLogger.child({ category, categoryLabel: formatLabel(category, 25) });
  loggerCache.set(category, categoryLogger);
  return categoryLogger;
}

/**
 * Returns a category logger that stays in sync with transport reconfiguration.
 *
 * Modules create their loggers at import time, before the CLI has parsed
 * `--json`; the returned proxy resolves the current pino child on every call
 * so a later `setLoggerTransports` still applies.
 */
export function getLogger(category: string): Logger {
  return new Proxy({} as Logger, {
    get: (_target, prop) => {
      const current = getOrCreateCategoryLogger(category);
      const value: unknown = Reflect.get(current, prop);
      return typeof value === 'function' ? value.bind(current) : value;
    },
  });
}

/**
 * Update transport mode at runtime. Cached loggers are dropped so the new
 * configuration applies immediately.
 */
export function setLoggerTransports(next: Partial<TransportMode>): void {
  transportMode = { ...transportMode, ...next };
  rootLogger = undefined;
  loggerCache.clear();
}

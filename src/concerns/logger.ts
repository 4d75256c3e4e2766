import pino, { type Logger as PinoLogger, type LoggerOptions as PinoLoggerOptions, type TransportSingleOptions } from 'pino';
import { createRedactRules } from './logger-redact.js';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';
export type LogFormat = 'json' | 'pretty';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
  format?: LogFormat;
  bindings?: Record<string, unknown>;
  redactPaths?: string[];
}

export type Logger = PinoLogger;

let globalLogger: Logger | null = null;

function serializeError(err: unknown): unknown {
  if (!err || typeof err !== 'object') {
    return err;
  }

  if (err instanceof Error) {
    if ('toJSON' in err && typeof err.toJSON === 'function') {
      return err.toJSON();
    }
    return {
      ...err,
      name: err.name,
      message: err.message,
      stack: err.stack,
    };
  }

  return err;
}

// Inventory JSON goes to stdout, so every log line goes to stderr.
function createPrettyTransport(): TransportSingleOptions {
  return {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'HH:MM:ss.l',
      ignore: 'pid,hostname',
      destination: 2,
    },
  };
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const {
    level = 'info',
    name,
    format = 'pretty',
    bindings = {},
    redactPaths = [],
  } = options;

  const config: PinoLoggerOptions = {
    level,
    name,
    redact: createRedactRules(redactPaths),
    serializers: {
      err: serializeError,
      error: serializeError,
    },
  };

  const logger = format === 'pretty'
    ? pino({ ...config, transport: createPrettyTransport() })
    : pino(config, pino.destination(2));

  return Object.keys(bindings).length > 0 ? logger.child(bindings) : logger;
}

export function getLoggerOptionsFromEnv(configOptions: LoggerOptions = {}): LoggerOptions {
  const options: LoggerOptions = { ...configOptions };

  const envLevel = process.env.CLOUDSIGMA_INVENTORY_LOG_LEVEL?.toLowerCase();
  if (isLogLevel(envLevel)) {
    options.level = envLevel;
  }

  const envFormat = process.env.CLOUDSIGMA_INVENTORY_LOG_FORMAT?.toLowerCase();
  if (envFormat === 'json' || envFormat === 'pretty') {
    options.format = envFormat;
  }

  return options;
}

export function getGlobalLogger(options: LoggerOptions = {}): Logger {
  if (!globalLogger) {
    globalLogger = createLogger(getLoggerOptionsFromEnv({ level: 'warn', name: 'cloudsigma-inventory', ...options }));
  }
  return globalLogger;
}

export function resetGlobalLogger(): void {
  globalLogger = null;
}

export default createLogger;

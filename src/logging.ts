/**
 * Structured JSON Logging
 *
 * Factory for the pino-based structured logger.
 * Supports JSON and pretty output via RQC_BRIDGE_LOG_FORMAT env var.
 */

import pino from 'pino';

export type LogFormat = 'json' | 'pretty';
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

const LOG_FORMATS: readonly LogFormat[] = ['json', 'pretty'];
const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export interface LoggerOptions {
  format?: LogFormat;
  level?: LogLevel;
  name?: string;
  /** Write JSON lines to this stream instead of stdout (ignored for pretty output) */
  destination?: pino.DestinationStream;
}

function isLogFormat(value: string | undefined): value is LogFormat {
  return LOG_FORMATS.some((format) => format === value);
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Create a pino logger instance.
 *
 * Reads from env:
 *   RQC_BRIDGE_LOG_FORMAT = json | pretty (default: json)
 *   RQC_BRIDGE_LOG_LEVEL  = trace | debug | info | warn | error | fatal | silent (default: info)
 */
export function createLogger(options?: LoggerOptions): pino.Logger {
  const envFormat = process.env['RQC_BRIDGE_LOG_FORMAT'];
  const envLevel = process.env['RQC_BRIDGE_LOG_LEVEL'];
  const format = options?.format ?? (isLogFormat(envFormat) ? envFormat : 'json');
  const level = options?.level ?? (isLogLevel(envLevel) ? envLevel : 'info');

  const pinoOptions: pino.LoggerOptions = {
    level,
    name: options?.name ?? 'rqc-bridge',
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level(label) {
        return { level: label };
      },
    },
    redact: ['apiKey', '*.apiKey'],
  };

  if (format === 'pretty') {
    return pino({
      ...pinoOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    });
  }

  if (options?.destination) {
    return pino(pinoOptions, options.destination);
  }
  return pino(pinoOptions);
}

/** Singleton logger for the application */
let _logger: pino.Logger | undefined;

export function getLogger(): pino.Logger {
  if (!_logger) {
    _logger = createLogger();
  }
  return _logger;
}

/** Replace the global logger (useful for testing) */
export function setLogger(logger: pino.Logger): void {
  _logger = logger;
}

/** Create a child logger with additional bindings */
export function createChildLogger(bindings: Record<string, unknown>): pino.Logger {
  return getLogger().child(bindings);
}

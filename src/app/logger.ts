import pino from 'pino';
import type { LogConfig } from './config.js';
import { resolveProjectPath } from './paths.js';

// Determine transport based on config
function getTransport(config: LogConfig): pino.TransportSingleOptions | pino.TransportMultiOptions {
  if (config.target === 'file') {
    return {
      targets: [
        {
          target: 'pino/file',
          options: {
            destination: resolveProjectPath(config.filePath),
            mkdir: true,
          },
          level: config.level,
        },
        // Warnings and errors still reach the terminal (stderr), without stacks
        {
          target: 'pino-pretty',
          options: {
            colorize: true,
            ignore: 'pid,hostname,time,stack,err,error',
            messageFormat: '{if msg}{msg}{end}{if error.message}{if msg}: {end}{error.message}{end}',
            destination: 2,
          },
          level: 'warn',
        },
      ],
    };
  }

  // Default: stderr with pretty printing, stdout stays clean for data output
  return {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'HH:MM:ss',
      ignore: 'pid,hostname',
      singleLine: true,
      destination: 2,
    },
  };
}

export function createLogger(config: LogConfig): pino.Logger {
  return pino({
    level: config.level,
    transport: getTransport(config),
    // Log calls pass error objects under `error`; pino only serializes `err`
    // by default, so register the same serializer for `error`.
    serializers: { error: pino.stdSerializers.err },
  });
}

// Module-level logger instance, set by initLogger()
let _logger: pino.Logger | undefined;

/**
 * Initialize the global logger. Must be called early in the entry point,
 * before other modules log. Tests pass a pre-built (silent) logger.
 */
export function initLogger(config: LogConfig | pino.Logger): void {
  _logger = 'child' in config ? config : createLogger(config);
}

export function getLogger(): pino.Logger {
  if (!_logger) {
    throw new Error('Logger not initialized. Call initLogger() first.');
  }
  return _logger;
}

/**
 * Shorten an identifier, token or cookie value for log output.
 */
export function redact(value: string | undefined, visible = 4): string {
  if (!value) return '<empty>';
  if (value.length <= visible * 2) return '***';
  return `${value.slice(0, visible)}...`;
}

// Getter-backed logger so modules can import it before initLogger() runs
export const logger = new Proxy({} as pino.Logger, {
  get(_target, prop) {
    return Reflect.get(getLogger(), prop);
  },
});

export default logger;

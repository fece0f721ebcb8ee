import pino from 'pino';
import { getLoggerConfigFromEnv, validateLoggerConfig } from './config.js';
import type { LineageLogger, LoggerConfig, LoggerContext } from './types.js';

function serializeError(error: Error): Record<string, unknown> {
  return {
    name: error.name,
    message: error.message,
    stack: error.stack,
  };
}

/**
 * Pino-based implementation of LineageLogger
 */
class PinoLogger implements LineageLogger {
  constructor(private readonly pinoLogger: pino.Logger) {}

  trace(msg: string, meta?: Record<string, unknown>): void {
    this.pinoLogger.trace(meta ?? {}, msg);
  }

  debug(msg: string, meta?: Record<string, unknown>): void {
    this.pinoLogger.debug(meta ?? {}, msg);
  }

  info(msg: string, meta?: Record<string, unknown>): void {
    this.pinoLogger.info(meta ?? {}, msg);
  }

  warn(msg: string, meta?: Record<string, unknown>): void {
    this.pinoLogger.warn(meta ?? {}, msg);
  }

  error(msg: string, error?: Error, meta?: Record<string, unknown>): void {
    const logData: Record<string, unknown> = { ...meta };
    if (error) {
      logData.error = serializeError(error);
    }
    this.pinoLogger.error(logData, msg);
  }

  fatal(msg: string, error?: Error, meta?: Record<string, unknown>): void {
    const logData: Record<string, unknown> = { ...meta };
    if (error) {
      logData.error = serializeError(error);
    }
    this.pinoLogger.fatal(logData, msg);
  }

  child(bindings: Record<string, unknown>): LineageLogger {
    return new PinoLogger(this.pinoLogger.child(bindings));
  }
}

/**
 * Create a logger with the specified configuration, layered over the
 * environment configuration
 */
export function createLogger(config?: Partial<LoggerConfig>): LineageLogger {
  const finalConfig: LoggerConfig = { ...getLoggerConfigFromEnv(), ...config };
  validateLoggerConfig(finalConfig);

  const pinoOptions: pino.LoggerOptions = {
    level: finalConfig.level,
    timestamp: finalConfig.options?.timestamp !== false,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  let transport: pino.TransportSingleOptions | undefined;

  if (finalConfig.pretty) {
    transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        destination: 2,
      },
    };
  } else if (finalConfig.destination && finalConfig.destination !== 'stderr') {
    transport = {
      target: 'pino/file',
      options: {
        destination: finalConfig.destination,
      },
    };
  }

  // Rendered trees own stdout; logs go to stderr unless a file is named
  const pinoLogger = transport
    ? pino(pinoOptions, pino.transport(transport))
    : pino(pinoOptions, pino.destination(2));

  return new PinoLogger(pinoLogger);
}

export function createContextLogger(
  context: LoggerContext,
  config?: Partial<LoggerConfig>
): LineageLogger {
  return createLogger(config).child(context);
}

/**
 * Default logger instance using environment configuration
 */
export const logger: LineageLogger = createLogger();

/**
 * Create a component-specific logger
 */
export function getComponentLogger(
  component: string,
  additionalContext?: Record<string, unknown>
): LineageLogger {
  return logger.child({ component, ...additionalContext });
}

/**
 * Create a logger bound to a single render of the lineage tree
 */
export function getRenderLogger(
  rootUid: string,
  additionalContext?: Record<string, unknown>
): LineageLogger {
  return logger.child({ component: 'tree-renderer', rootUid, ...additionalContext });
}

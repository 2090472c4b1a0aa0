/**
 * Logger
 *
 * Pino-based structured logger shared by every package. Output goes to
 * stderr: stdout belongs to command results (the CLI's --json output).
 */

import { pino, type LoggerOptions, type Logger as PinoLogger } from 'pino';

const STDERR = 2;

export function buildLoggerOptions(env: NodeJS.ProcessEnv): LoggerOptions {
  const nodeEnv = env['NODE_ENV'] ?? 'development';

  return {
    level: env['LOG_LEVEL'] ?? 'info',
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: 'transcoder',
      env: nodeEnv,
    },
    transport: nodeEnv === 'development' ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        ignore: 'pid,hostname',
        destination: STDERR,
      },
    } : undefined,
  };
}

function createRootLogger(env: NodeJS.ProcessEnv): PinoLogger {
  const options = buildLoggerOptions(env);
  // pino takes either a transport or a destination stream, never both
  return options.transport ? pino(options) : pino(options, pino.destination(STDERR));
}

export const logger = createRootLogger(process.env);

export type Logger = typeof logger;

/**
 * Create a child logger with additional context
 */
export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}

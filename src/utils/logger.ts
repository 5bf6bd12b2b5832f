import pino, { type Logger, type LoggerOptions } from 'pino';

const nodeEnv = process.env['NODE_ENV'];
const usePretty = nodeEnv !== 'production' && nodeEnv !== 'test';

// Transport is only attached when pretty printing
const options: LoggerOptions = {
  level: process.env['VARIANT_PUBLISH_LOG_LEVEL'] ?? 'warn',
  base: {
    pid: undefined,
    hostname: undefined,
  },
};

// Operator output owns stdout, so logs always go to stderr
if (usePretty) {
  options.transport = {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
      destination: 2,
    },
  };
}

export const logger = usePretty ? pino(options) : pino(options, pino.destination(2));

export function createLogger(module: string): Logger {
  return logger.child({ module });
}

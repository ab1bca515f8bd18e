import { pino, type Logger, type LoggerOptions } from 'pino';

const env = process.env['NODE_ENV'];
const isDev = env !== 'production';
const isTest = env === 'test';

function resolveLevel(): string {
  if (process.env['WARMBOX_LOG_LEVEL']) {
    return process.env['WARMBOX_LOG_LEVEL'];
  }
  if (isTest) {
    return 'silent';
  }
  return isDev ? 'debug' : 'info';
}

// Build options conditionally to satisfy exactOptionalPropertyTypes
const options: LoggerOptions = {
  level: resolveLevel(),
  base: {
    pid: process.pid,
    hostname: undefined,
  },
};

// Pretty output for interactive development only
if (isDev && !isTest) {
  options.transport = {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'hostname',
    },
  };
}

export const logger = pino(options);

export function createLogger(module: string): Logger {
  return logger.child({ module });
}

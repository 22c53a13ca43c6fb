import pino, { type LoggerOptions } from 'pino';

const env = process.env['NODE_ENV'];
const isTest = env === 'test';
const isDev = env !== 'production' && !isTest;

/**
 * Level for the root logger. CPC_LOG_LEVEL wins; otherwise silent under
 * test, debug in development and info in production.
 */
export function resolveLogLevel(vars: NodeJS.ProcessEnv = process.env): string {
  const override = vars['CPC_LOG_LEVEL'];
  if (override) {
    return override;
  }
  const nodeEnv = vars['NODE_ENV'];
  if (nodeEnv === 'test') {
    return 'silent';
  }
  return nodeEnv === 'production' ? 'info' : 'debug';
}

const options: LoggerOptions = {
  level: resolveLogLevel(),
  base: { pid: undefined, hostname: undefined },
};

// stdout carries command results; logs go to stderr
if (isDev) {
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

export const logger = isDev ? pino(options) : pino(options, pino.destination(2));

export function createLogger(module: string): pino.Logger {
  return logger.child({ module });
}

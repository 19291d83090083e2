import { pino, type Logger, type LoggerOptions } from 'pino';

const isProduction = process.env['NODE_ENV'] === 'production';
const isTest = process.env['NODE_ENV'] === 'test';

function defaultLevel(): string {
  if (isTest) return 'silent';
  return isProduction ? 'info' : 'debug';
}

const options: LoggerOptions = {
  level: process.env['VALOHAI_FLOW_LOG_LEVEL'] ?? defaultLevel(),
  base: {
    pid: undefined,
    hostname: undefined,
  },
};

// Pretty output only for interactive development
if (!isProduction && !isTest) {
  options.transport = {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
    },
  };
}

export const logger = pino(options);

export function createLogger(module: string): Logger {
  return logger.child({ module });
}

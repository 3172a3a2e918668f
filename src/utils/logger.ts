import pino, { type Logger } from 'pino';
import { loadLoggingConfig } from '../config';

const settings = loadLoggingConfig();

export const logger = pino({
  level: settings.level,
  base: { service: 'exchange-netflow-monitor' },
  serializers: { err: pino.stdSerializers.err },
  transport: settings.pretty
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'yyyy-mm-dd HH:MM:ss',
          ignore: 'pid,hostname,service',
        },
      }
    : undefined,
});

/** Child logger tagged with the module it logs for. */
export function createLogger(name: string): Logger {
  return logger.child({ module: name });
}

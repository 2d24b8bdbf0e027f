import pino from 'pino';
import config from '../config/config';

/**
 * Logger contract used by the services. Both the standalone pino logger and
 * Fastify's `request.log` satisfy it, so request-scoped work can log with the
 * request id attached.
 */
export type Logger = pino.BaseLogger;

export function createLogger(level: string = config.logLevel): pino.Logger {
  return pino({
    level,
    transport: config.nodeEnv === 'development' ? { target: 'pino-pretty' } : undefined,
  });
}

export const logger = createLogger();

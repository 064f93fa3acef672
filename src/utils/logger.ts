import pino from 'pino';
import { config } from '../config/index.js';

export const logger = pino({
  name: 'incident-graph',
  level: config.server.logLevel,
  redact: ['password', 'apiKey', '*.password', '*.apiKey'],
  transport:
    config.server.nodeEnv === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
});

/** Child logger tagged with the pipeline stage that writes through it */
export const createLogger = (component: string) => logger.child({ component });

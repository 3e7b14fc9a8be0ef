import pino from 'pino';

const nodeEnv = process.env.NODE_ENV || 'development';

function defaultLevel(): string {
  if (nodeEnv === 'test') return 'silent';
  return nodeEnv === 'production' ? 'info' : 'debug';
}

const logger = pino({
  level: process.env.LOG_LEVEL || defaultLevel(),
  transport: nodeEnv === 'development'
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
  formatters: {
    level: (label) => ({ level: label }),
  },
  base: {
    service: 'orchestrator',
  },
});

export const dbLogger = logger.child({ component: 'db' });
export const storageLogger = logger.child({ component: 'storage' });
export const deploymentLogger = logger.child({ component: 'deployments' });

export default logger;

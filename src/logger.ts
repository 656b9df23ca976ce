import pino from 'pino';

// Read LOG_LEVEL directly: config.ts logs through this module.
export const logger = pino({
  name: 'snbl-payments',
  level: process.env.LOG_LEVEL || 'info',
});

export function moduleLogger(module: string) {
  return logger.child({ module });
}

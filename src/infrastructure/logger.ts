import pino from 'pino';

export const logger = pino({
  name: 'text-anomaly-detection',
  level: process.env.LOG_LEVEL ?? 'info',
});

export function createInvocationLogger(invocationId: string, url?: string) {
  return logger.child({
    invocationId,
    ...(url !== undefined && { url }),
  });
}

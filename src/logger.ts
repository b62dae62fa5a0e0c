import pino from 'pino';

const level = process.env.LOG_LEVEL ?? 'info';
const pretty = process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';

export const logger = pino({
  level,
  base: { service: 'asr-dictation-daemon' },
  transport: pretty
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:HH:MM:ss.l',
          ignore: 'pid,hostname,service',
        },
      }
    : undefined,
});

/** Line-oriented stream for morgan so access lines land in the same log. */
export const httpAccessStream = {
  write(line: string) {
    logger.debug({ event: 'http_access' }, line.trimEnd());
  },
};

import pino from 'pino';

let logger: pino.Logger | undefined;

export function createLogger(level = process.env.LOG_LEVEL ?? 'info'): pino.Logger {
  if (logger) return logger;

  // Silent loggers skip the pretty transport so no worker thread is spawned
  if (level === 'silent') {
    logger = pino({ level });
    return logger;
  }

  logger = pino({
    level,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss',
        ignore: 'pid,hostname',
        // stderr, so `--json` output on stdout stays parseable
        destination: 2,
      },
    },
  });

  return logger;
}

export function getLogger(): pino.Logger {
  return logger ?? createLogger();
}

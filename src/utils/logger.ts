import pino from 'pino';

let logger: pino.Logger | undefined;

export function createLogger(level = 'info'): pino.Logger {
  if (logger) {
    logger.level = level;
    return logger;
  }

  // Pretty output is for humans at a terminal; piped runs and tests get plain JSON lines.
  logger = process.stdout.isTTY
    ? pino({
        level,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss',
            ignore: 'pid,hostname',
          },
        },
      })
    : pino({ level });

  return logger;
}

export function getLogger(): pino.Logger {
  if (!logger) return createLogger(process.env.LOG_LEVEL ?? 'info');
  return logger;
}

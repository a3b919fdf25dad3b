import pino, { type Logger, type DestinationStream, type Level } from 'pino';

const REDACT_PATHS = ['value', '*.value'];

export function createRootLogger(destination?: DestinationStream, level?: Level): Logger {
  return pino(
    {
      name: 'aged-cache',
      level: level || process.env.LOG_LEVEL || 'info',
      redact: {
        paths: REDACT_PATHS,
        censor: '[REDACTED]',
      },
      formatters: {
        level(label) {
          return { level: label };
        },
      },
    },
    destination ?? pino.destination(1),
  );
}

const logger = createRootLogger();

export function createLogger(context: Record<string, unknown>, level?: Level): Logger {
  return level ? logger.child(context, { level }) : logger.child(context);
}

export default logger;

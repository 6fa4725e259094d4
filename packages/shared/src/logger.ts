import pino from 'pino';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

// The one environment read outside the scripts.
function resolveLogLevel(): LogLevel {
  const envLevel = process.env['LOG_LEVEL'];
  if (isLogLevel(envLevel)) {
    return envLevel;
  }
  return process.env['VITEST'] ? 'silent' : 'info';
}

export const logger = pino({
  name: 'factsift',
  level: resolveLogLevel(),
  serializers: { err: pino.stdSerializers.err },
  transport:
    process.env['NODE_ENV'] === 'development'
      ? { target: 'pino/file', options: { destination: 1 } }
      : undefined,
});

export function createChildLogger(component: string): pino.Logger {
  return logger.child({ component });
}

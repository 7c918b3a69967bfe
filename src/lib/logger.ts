/* eslint-disable no-console */
type Level = 'debug' | 'info' | 'warn' | 'error';

type Meta = Record<string, unknown>;

const LEVEL_ORDER: Record<Level, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

const minLevel = (): Level => {
  const env = process.env.LOG_LEVEL?.toLowerCase();
  return env === 'debug' || env === 'info' || env === 'warn' || env === 'error'
    ? env
    : 'info';
};

const log = (level: Level, message: string, meta?: Meta) => {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel()]) {
    return;
  }

  const payload = {
    level,
    message,
    timestamp: new Date().toISOString(),
    ...(meta ?? {})
  };

  console.log(JSON.stringify(payload));
};

export interface Logger {
  debug(message: string, meta?: Meta): void;
  info(message: string, meta?: Meta): void;
  warn(message: string, meta?: Meta): void;
  error(message: string, meta?: Meta): void;
  child(scope: string): Logger;
}

const createLogger = (base: Meta): Logger => ({
  debug: (message, meta) => log('debug', message, { ...base, ...meta }),
  info: (message, meta) => log('info', message, { ...base, ...meta }),
  warn: (message, meta) => log('warn', message, { ...base, ...meta }),
  error: (message, meta) => log('error', message, { ...base, ...meta }),
  child: (scope) => createLogger({ ...base, scope })
});

export const logger: Logger = createLogger({});

import pino, { type DestinationStream, type LevelWithSilent, type Logger, type LoggerOptions } from 'pino';

export type { Logger };

export type LogLevel = LevelWithSilent;

/**
 * Create the application logger. In the browser pino writes through the
 * console; under Node it writes JSON lines to stdout, or to `destination`
 * when one is given.
 */
export function createLogger(level: LogLevel = 'info', destination?: DestinationStream): Logger {
  const options: LoggerOptions = {
    name: 'chip8',
    level,
    browser: {
      asObject: false,
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
  };
  return destination ? pino(options, destination) : pino(options);
}

export const logger = createLogger();

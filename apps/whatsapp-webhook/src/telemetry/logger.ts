import pino, { type Logger, type LoggerOptions } from 'pino';

export type AppLogger = Logger;

export interface LoggerConfig {
  level?: string;
  name?: string;
}

/** Create a Pino logger instance tuned for the gateway defaults. */
export function createLogger(config: LoggerConfig = {}): AppLogger {
  const options: LoggerOptions = {
    name: config.name ?? 'whatsapp-webhook',
    level: config.level ?? inferDefaultLevel(),
    redact: ['req.headers.authorization'],
  };

  return pino(options);
}

function inferDefaultLevel(): string {
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

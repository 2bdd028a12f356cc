import { pino, type Logger, type LevelWithSilent } from 'pino';

export type { Logger } from 'pino';

export type LoggerOptions = {
  readonly level?: LevelWithSilent;
  readonly base?: Record<string, unknown>;
};

const LEVELS: ReadonlyArray<LevelWithSilent> = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function levelFromEnv(): LevelWithSilent {
  const raw = process.env['LOG_LEVEL'];
  return LEVELS.find((level) => level === raw) ?? 'info';
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    level: options.level ?? levelFromEnv(),
    base: { service: 'toolloop', ...options.base },
  });
}

let defaultLogger: Logger | null = null;

export function getLogger(): Logger {
  if (!defaultLogger) {
    defaultLogger = createLogger();
  }
  return defaultLogger;
}

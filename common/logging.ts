import pino, { type Level, type LevelWithSilent, type Logger } from "pino";
import pretty from "pino-pretty";

export type LoggerName = 'default' | 'http';

export interface LeveledLogger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
}

const loggers = new Map<LoggerName, Logger>();

function initialLevel(): LevelWithSilent {
  const level = process.env['LOG_LEVEL'];
  return isLevel(level) ? level : 'info';
}

function isLevel(raw: string | undefined): raw is LevelWithSilent {
  return raw !== undefined && ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'].includes(raw);
}

function getLogger(name: LoggerName): Logger {
  let logger = loggers.get(name);
  if (!logger) {
    logger = pino({ name, level: initialLevel() });
    loggers.set(name, logger);
  }
  return logger;
}

export function setupLogs(opts: {
  logLevel: LevelWithSilent,
  logFormat: 'json' | 'console',
}) {
  const destination = opts.logFormat == 'console'
    ? pretty({ colorize: true, ignore: 'pid,hostname' })
    : pino.destination(1);

  loggers.set('default', pino({ name: 'default', level: opts.logLevel }, destination));
  loggers.set('http', pino({
    name: 'http',
    level: opts.logLevel == 'info' ? 'warn' : opts.logLevel,
  }, destination));
}

function leveled(name: LoggerName): LeveledLogger {
  const emit = (level: Level) => (msg: string, data?: Record<string, unknown>) => {
    const logger = getLogger(name);
    if (data) {
      logger[level](data, msg);
    } else {
      logger[level](msg);
    }
  };
  return {
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
  };
}

/** Looked up per call, so setupLogs() also reaches modules imported before it ran */
export const log = leveled('default');
export const httpLog = leveled('http');

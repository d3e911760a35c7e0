/**
 * @fileoverview Sistema de logging centralizado (electron-log, entrada para Node).
 * @module utils/logger
 *
 * Proporciona logger con scope (child), formato de objetos, operaciones cronometradas
 * y un transport de archivo opcional. Sin configurar, solo escribe en consola.
 */

import log from 'electron-log/node';
import path from 'path';
import type { LogLevelName } from '../config.types';

export type LogLevel = LogLevelName;

export interface ConfigureLoggerOptions {
  consoleLevel?: LogLevel | false;
  fileLevel?: LogLevel | false;
  /** Ruta del archivo de log; sin ella el transport de archivo queda desactivado. */
  logFile?: string | null;
  maxSize?: number;
}

/**
 * Convierte un valor a string para logging: Errors con stack, objetos a JSON, primitivos a String.
 */
export function formatObject(obj: unknown): string {
  if (obj === null) return 'null';
  if (obj === undefined) return 'undefined';
  if (typeof obj === 'string') return obj;
  if (obj instanceof Error) {
    return `${obj.message}\n${obj.stack ?? ''}`;
  }
  try {
    return JSON.stringify(obj, null, 2);
  } catch {
    return String(obj);
  }
}

function defaultConsoleLevel(): LogLevel | false {
  if (process.env.NODE_ENV === 'test') return 'error';
  return process.env.NODE_ENV === 'development' ? 'debug' : 'info';
}

log.transports.file.level = false;
log.transports.console.level = defaultConsoleLevel();
log.transports.console.format = '[{h}:{i}:{s}] [{level}]{scope} {text}';

export interface ScopedLogger {
  error: (..._args: unknown[]) => void;
  warn: (..._args: unknown[]) => void;
  info: (..._args: unknown[]) => void;
  verbose: (..._args: unknown[]) => void;
  debug: (..._args: unknown[]) => void;
  silly: (..._args: unknown[]) => void;
  log: (..._args: unknown[]) => void;
  startOperation: (_operation: string) => (_result?: string) => void;
  object: (_label: string, _obj: unknown) => void;
  child: (_subScope: string) => ScopedLogger;
}

const childLoggers = new Map<string, ScopedLogger>();

export function createScopedLogger(scope: string): ScopedLogger {
  const existing = childLoggers.get(scope);
  if (existing) return existing;

  const baseChildLog = log.scope(scope);

  const logMethod =
    (method: LogLevel) =>
    (...args: unknown[]) => {
      if (
        args.length === 2 &&
        typeof args[0] === 'string' &&
        typeof args[1] === 'object' &&
        args[1] !== null
      ) {
        baseChildLog[method](`${args[0]}`, formatObject(args[1]));
      } else {
        baseChildLog[method](...args);
      }
    };

  const extendedChildLog: ScopedLogger = {
    error: logMethod('error'),
    warn: logMethod('warn'),
    info: logMethod('info'),
    verbose: logMethod('verbose'),
    debug: logMethod('debug'),
    silly: logMethod('silly'),
    log: logMethod('info'),
    startOperation(operation: string) {
      const start = Date.now();
      baseChildLog.info(`▶ Iniciando: ${operation}`);
      return (result = 'completado') => {
        const duration = Date.now() - start;
        baseChildLog.info(`✓ ${operation}: ${result} (${duration}ms)`);
      };
    },
    object(label: string, obj: unknown) {
      baseChildLog.info(`${label}:\n${formatObject(obj)}`);
    },
    child(subScope: string) {
      return createScopedLogger(`${scope}:${subScope}`);
    },
  };

  childLoggers.set(scope, extendedChildLog);
  return extendedChildLog;
}

/**
 * Configura el logger global (consola y, si se indica logFile, archivo con rotación por tamaño).
 * Por defecto: consoleLevel 'info' ('debug' en desarrollo), fileLevel 'info', maxSize 10 MB.
 */
export function configureLogger(options: ConfigureLoggerOptions = {}): typeof log {
  const {
    consoleLevel = defaultConsoleLevel(),
    fileLevel = 'info',
    logFile = null,
    maxSize = 10 * 1024 * 1024,
  } = options;

  log.transports.console.level = consoleLevel;

  if (logFile) {
    const resolvedLogFile = path.resolve(logFile);
    log.transports.file.resolvePathFn = () => resolvedLogFile;
    log.transports.file.level = fileLevel;
    log.transports.file.maxSize = maxSize;
    log.transports.file.format = '[{y}-{m}-{d} {h}:{i}:{s}.{ms}] [{level}]{scope} {text}';
    log.info(`Archivo de log: ${resolvedLogFile}`);
  } else {
    log.transports.file.level = false;
  }

  return log;
}

export interface LoggerInstance {
  error: (..._args: unknown[]) => void;
  warn: (..._args: unknown[]) => void;
  info: (..._args: unknown[]) => void;
  verbose: (..._args: unknown[]) => void;
  debug: (..._args: unknown[]) => void;
  silly: (..._args: unknown[]) => void;
  child: (_scope: string) => ScopedLogger;
  startOperation: (_operation: string) => (_result?: string) => void;
  configure: typeof configureLogger;
}

export const logger: LoggerInstance = {
  error: (...args: unknown[]) => log.error(...args),
  warn: (...args: unknown[]) => log.warn(...args),
  info: (...args: unknown[]) => log.info(...args),
  verbose: (...args: unknown[]) => log.verbose(...args),
  debug: (...args: unknown[]) => log.debug(...args),
  silly: (...args: unknown[]) => log.silly(...args),
  child: (scope: string) => createScopedLogger(scope),
  startOperation(operation: string) {
    const start = Date.now();
    log.info(`▶ Iniciando: ${operation}`);
    return (result = 'completado') => {
      const duration = Date.now() - start;
      log.info(`✓ ${operation}: ${result} (${duration}ms)`);
    };
  },
  configure: configureLogger,
};

/**
 * @fileoverview Sistema de logging centralizado del motor (electron-log en modo Node).
 * @module utils/logger
 *
 * Proporciona logger con scope (child), formato de objetos, operaciones cronometradas
 * y limpieza de archivos antiguos. El transport de archivo queda desactivado hasta
 * que se llama a configureLogger con un directorio.
 */

import log from 'electron-log/node';
import path from 'path';
import { promises as fs } from 'fs';
import { isError } from './errors';

export type LogLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug' | 'silly';

export interface ConfigureLoggerOptions {
  /** Directorio de los archivos de log. Sin él no se escribe a disco. */
  logDir?: string;
  fileName?: string;
  fileLevel?: LogLevel | false;
  consoleLevel?: LogLevel | false;
  maxSize?: number;
}

const isTestRun = process.env.NODE_ENV === 'test';

log.transports.file.level = false;
log.transports.console.level = isTestRun ? false : 'warn';
log.transports.console.format = '[{h}:{i}:{s}] [{level}]{scope} {text}';

let currentLogDir: string | null = null;
let currentFileName = 'download-engine.log';

/**
 * Convierte un valor a string para logging: Errors con stack, objetos a JSON, primitivos a String.
 */
export function formatObject(obj: unknown): string {
  if (obj === null) return 'null';
  if (obj === undefined) return 'undefined';
  if (typeof obj === 'string') return obj;
  if (isError(obj)) {
    return `${obj.message}\n${obj.stack ?? ''}`;
  }
  try {
    return JSON.stringify(obj, null, 2);
  } catch {
    return String(obj);
  }
}

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
    (...args: unknown[]): void => {
      if (
        args.length === 2 &&
        typeof args[0] === 'string' &&
        typeof args[1] === 'object' &&
        args[1] !== null
      ) {
        baseChildLog[method](args[0], formatObject(args[1]));
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
      baseChildLog.debug(`▶ Iniciando: ${operation}`);
      return (result = 'completado') => {
        const duration = Date.now() - start;
        baseChildLog.info(`✓ ${operation}: ${result} (${duration}ms)`);
      };
    },
    object(label: string, obj: unknown) {
      baseChildLog.debug(`${label}:\n${formatObject(obj)}`);
    },
    child(subScope: string) {
      return createScopedLogger(`${scope}:${subScope}`);
    },
  };

  childLoggers.set(scope, extendedChildLog);
  return extendedChildLog;
}

/**
 * Configura los transports. Por defecto: fileLevel 'info', consoleLevel 'warn', maxSize 10 MB.
 * En ejecuciones de test la consola queda silenciada salvo que se indique otro nivel.
 */
export function configureLogger(options: ConfigureLoggerOptions = {}): void {
  const {
    logDir,
    fileName = currentFileName,
    fileLevel = 'info',
    consoleLevel = isTestRun ? false : 'warn',
    maxSize = 10 * 1024 * 1024,
  } = options;

  log.transports.console.level = consoleLevel;

  if (!logDir) {
    log.transports.file.level = false;
    currentLogDir = null;
    return;
  }

  currentLogDir = logDir;
  currentFileName = fileName;
  log.transports.file.resolvePathFn = () => path.join(logDir, fileName);
  log.transports.file.level = fileLevel;
  log.transports.file.maxSize = maxSize;
  log.transports.file.format = '[{y}-{m}-{d} {h}:{i}:{s}.{ms}] [{level}]{scope} {text}';

  log.info(`Logger inicializado; archivo: ${path.join(logDir, fileName)}`);
}

/** Ruta absoluta del archivo de log actual, o null si no está configurado. */
export function getLogFilePath(): string | null {
  return currentLogDir ? path.join(currentLogDir, currentFileName) : null;
}

export function getLogDirectory(): string | null {
  return currentLogDir;
}

/**
 * Elimina archivos .log del directorio de logs cuya fecha de modificación
 * sea anterior a daysToKeep días.
 */
export async function cleanOldLogs(daysToKeep = 30): Promise<number> {
  const logDir = getLogDirectory();
  if (!logDir) {
    return 0;
  }
  let removed = 0;
  try {
    const files = await fs.readdir(logDir);
    const now = Date.now();
    const maxAge = daysToKeep * 24 * 60 * 60 * 1000;
    for (const file of files) {
      if (!file.endsWith('.log')) continue;
      const filePath = path.join(logDir, file);
      const stats = await fs.stat(filePath);
      if (now - stats.mtime.getTime() > maxAge) {
        await fs.unlink(filePath);
        removed++;
        log.info(`Log antiguo eliminado: ${file}`);
      }
    }
  } catch (error) {
    log.error('Error limpiando logs antiguos:', formatObject(error));
  }
  return removed;
}

export interface LoggerInstance {
  error: (..._args: unknown[]) => void;
  warn: (..._args: unknown[]) => void;
  info: (..._args: unknown[]) => void;
  debug: (..._args: unknown[]) => void;
  child: (_scope: string) => ScopedLogger;
  getFilePath: typeof getLogFilePath;
  cleanOldLogs: typeof cleanOldLogs;
  configure: typeof configureLogger;
}

export const logger: LoggerInstance = {
  error: (...args: unknown[]) => log.error(...args),
  warn: (...args: unknown[]) => log.warn(...args),
  info: (...args: unknown[]) => log.info(...args),
  debug: (...args: unknown[]) => log.debug(...args),
  child: (scope: string) => createScopedLogger(scope),
  getFilePath: getLogFilePath,
  cleanOldLogs,
  configure: configureLogger,
};

export { logger as log };

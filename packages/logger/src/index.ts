import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import process from 'node:process';

import pino, { multistream, type Logger as PinoLogger, type StreamEntry } from 'pino';

export type Logger = PinoLogger;

export interface LoggerOptions {
  level?: string;
  /** Directory receiving one log file per run. Falls back to LOG_DIR; no file when neither is set. */
  logDir?: string;
}

interface ManagedLogger {
  logger: Logger;
  fileStream: fs.WriteStream | null;
  filePath: string | null;
  detach: () => void;
}

const managedLoggers = new Map<string, ManagedLogger>();

function resolveLogDir(options: LoggerOptions): string | null {
  const configured = (options.logDir ?? process.env.LOG_DIR)?.trim();
  if (!configured) {
    return null;
  }
  return path.resolve(configured);
}

function openRunFile(logDir: string, serviceName: string): { filePath: string; stream: fs.WriteStream } {
  const serviceDir = path.join(logDir, serviceName);
  fs.mkdirSync(serviceDir, { recursive: true });

  const stamp = new Date().toISOString().replace(/[:.]/g, '-');
  const filePath = path.join(serviceDir, `run-${stamp}-${process.pid}.log`);
  const stream = fs.createWriteStream(filePath, { flags: 'a', encoding: 'utf8' });
  return { filePath, stream };
}

function attachProcessHandlers(logger: Logger): () => void {
  const handleRejection = (reason: unknown) => {
    logger.error({ err: reason }, 'Unhandled promise rejection');
  };

  const handleException = (error: Error) => {
    logger.fatal({ err: error }, 'Uncaught exception');
  };

  process.on('unhandledRejection', handleRejection);
  process.on('uncaughtException', handleException);

  return () => {
    process.off('unhandledRejection', handleRejection);
    process.off('uncaughtException', handleException);
  };
}

export function makeLogger(serviceName: string, options: LoggerOptions = {}): Logger {
  const existing = managedLoggers.get(serviceName);
  if (existing) {
    return existing.logger;
  }

  const level = (options.level ?? process.env.LOG_LEVEL ?? 'info').toLowerCase();
  const logDir = resolveLogDir(options);
  const runFile = logDir ? openRunFile(logDir, serviceName) : null;

  const streams: StreamEntry[] = [{ stream: process.stdout }];
  if (runFile) {
    streams.push({ stream: runFile.stream });
  }

  const logger = pino(
    {
      level,
      base: {
        service: serviceName,
        pid: process.pid,
        hostname: os.hostname(),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    multistream(streams),
  );

  managedLoggers.set(serviceName, {
    logger,
    fileStream: runFile?.stream ?? null,
    filePath: runFile?.filePath ?? null,
    detach: attachProcessHandlers(logger),
  });

  return logger;
}

export function getLogFilePath(serviceName: string): string | null {
  return managedLoggers.get(serviceName)?.filePath ?? null;
}

export function closeLogger(serviceName: string): void {
  const entry = managedLoggers.get(serviceName);
  if (!entry) {
    return;
  }

  entry.detach();
  entry.logger.flush();
  entry.fileStream?.end();
  managedLoggers.delete(serviceName);
}

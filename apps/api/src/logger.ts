import fs from 'node:fs';
import path from 'node:path';

export type LogLevel = 'INFO' | 'WARNING' | 'ERROR';

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function formatLogLine(level: LogLevel, message: string, at: Date = new Date()): string {
  return `${at.toISOString()} - ${level} - ${message}`;
}

/**
 * Appends one line per call to `<dir>/<fileName>` and echoes it to the console.
 * The directory is created when the logger is built and again on any write that
 * finds it missing. A failed append is reported on the console and never thrown.
 */
export function createLogger(options: { dir: string; fileName: string; echo?: boolean }): Logger {
  const filePath = path.resolve(options.dir, options.fileName);
  const logDir = path.dirname(filePath);
  fs.mkdirSync(logDir, { recursive: true });
  const echo = options.echo ?? true;

  const write = (level: LogLevel, message: string) => {
    const line = formatLogLine(level, message);
    try {
      fs.mkdirSync(logDir, { recursive: true });
      fs.appendFileSync(filePath, `${line}\n`, { encoding: 'utf8' });
    } catch (err) {
      // eslint-disable-next-line no-console
      console.error('[logger] failed to append to log file', {
        filePath,
        line,
        error: errorMessage(err)
      });
    }
    if (!echo) return;

    // eslint-disable-next-line no-console
    if (level === 'ERROR') console.error(line);
    // eslint-disable-next-line no-console
    else if (level === 'WARNING') console.warn(line);
    // eslint-disable-next-line no-console
    else console.log(line);
  };

  return {
    info: (message) => write('INFO', message),
    warn: (message) => write('WARNING', message),
    error: (message) => write('ERROR', message)
  };
}

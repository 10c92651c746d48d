import { writeFileSync, appendFileSync, existsSync, mkdirSync, statSync, renameSync, unlinkSync, readdirSync } from 'fs';
import { basename, dirname, join } from 'path';
import { isErrnoException } from '../errors/ComplaintDeskError.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Minimal logging surface shared by Logger and its children,
 * so components can be handed either one.
 */
export interface LogSink {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}

/**
 * Logger for the complaint desk server
 * Writes to stderr (stdout carries the MCP protocol) and an optional log file
 */
export class Logger implements LogSink {
  private logFilePath: string | null = null;
  private readonly logLevel: LogLevel;
  private readonly isDebugMode: boolean;
  private readonly maxLogSizeBytes: number = 10 * 1024 * 1024; // 10MB
  private readonly maxRotatedLogs: number = 5;

  constructor(logLevel: LogLevel = 'info', logFilePath?: string) {
    this.logLevel = logLevel;
    this.isDebugMode = process.env.COMPLAINT_DESK_DEBUG === 'true';

    if (logFilePath) {
      this.initializeLogFile(logFilePath);
    }
  }

  /**
   * Initialize log file with rotation
   */
  private initializeLogFile(logFilePath: string): void {
    try {
      const logDir = dirname(logFilePath);

      if (!existsSync(logDir)) {
        mkdirSync(logDir, { recursive: true });
      }

      this.logFilePath = logFilePath;

      this.rotateLogIfNeeded();
      this.cleanupOldRotatedLogs();

      const header = `\n${'='.repeat(80)}\nComplaint Desk Log - ${new Date().toISOString()}\n${'='.repeat(80)}\n`;
      writeFileSync(this.logFilePath, header, { flag: 'a' });

      this.info(`Logging initialized: ${this.logFilePath}`);
    } catch (error) {
      this.logFilePath = null;
      this.error(`Failed to initialize log file: ${error}`);
    }
  }

  /**
   * Rotate log file if it exceeds max size
   */
  private rotateLogIfNeeded(): void {
    if (!this.logFilePath || !existsSync(this.logFilePath)) {
      return;
    }

    try {
      const stats = statSync(this.logFilePath);

      if (stats.size > this.maxLogSizeBytes) {
        const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
        renameSync(this.logFilePath, `${this.logFilePath}.${timestamp}`);
      }
    } catch (error) {
      // Keep appending to the oversized file
      process.stderr.write(`[Logger] Log rotation skipped: ${error}\n`);
    }
  }

  /**
   * Keep only the most recent N rotated logs
   */
  private cleanupOldRotatedLogs(): void {
    if (!this.logFilePath) {
      return;
    }

    const logDir = dirname(this.logFilePath);
    const logFileName = basename(this.logFilePath);

    let rotatedLogs: { path: string; mtime: number }[];
    try {
      rotatedLogs = readdirSync(logDir)
        .filter(f => f.startsWith(logFileName + '.'))
        .map(f => ({
          path: join(logDir, f),
          mtime: statSync(join(logDir, f)).mtime.getTime()
        }))
        .sort((a, b) => b.mtime - a.mtime); // newest first
    } catch (error) {
      process.stderr.write(`[Logger] Rotated log cleanup skipped: ${error}\n`);
      return;
    }

    for (const log of rotatedLogs.slice(this.maxRotatedLogs)) {
      try {
        unlinkSync(log.path);
      } catch (error) {
        process.stderr.write(`[Logger] Could not remove old log ${log.path}: ${error}\n`);
      }
    }
  }

  debug(message: string, meta?: unknown): void {
    if (!this.isDebugMode && this.logLevel !== 'debug') return;
    this.log('DEBUG', message, meta);
  }

  info(message: string, meta?: unknown): void {
    if (!this.shouldLog('info')) return;
    this.log('INFO', message, meta);
  }

  warn(message: string, meta?: unknown): void {
    if (!this.shouldLog('warn')) return;
    this.log('WARN', message, meta);
  }

  error(message: string, meta?: unknown): void {
    if (!this.shouldLog('error')) return;
    this.log('ERROR', message, meta);
  }

  /**
   * Core logging function
   */
  private log(level: string, message: string, meta?: unknown): void {
    const formattedMessage = this.formatMessage(new Date().toISOString(), level, message, meta);

    // EPIPE means the client closed the pipe; anything else is a real fault
    try {
      process.stderr.write(formattedMessage + '\n');
    } catch (error) {
      if (!isErrnoException(error) || error.code !== 'EPIPE') {
        throw error;
      }
    }

    if (this.logFilePath) {
      try {
        appendFileSync(this.logFilePath, formattedMessage + '\n');
      } catch (error) {
        // Stop writing to a file that cannot be written; stderr keeps working
        this.logFilePath = null;
        process.stderr.write(`[Logger] Log file disabled: ${error}\n`);
      }
    }
  }

  /**
   * Format log message
   */
  private formatMessage(timestamp: string, level: string, message: string, meta?: unknown): string {
    let formatted = `[${timestamp}] [${level.padEnd(5)}] ${message}`;

    if (meta !== undefined) {
      if (meta instanceof Error) {
        formatted += ` ${meta.name}: ${meta.message}`;
      } else if (typeof meta === 'object') {
        formatted += '\n' + JSON.stringify(meta, null, 2);
      } else {
        formatted += ` ${String(meta)}`;
      }
    }

    return formatted;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.logLevel);
  }

  /**
   * Create a child logger with prefix
   */
  child(prefix: string): ChildLogger {
    return new ChildLogger(this, prefix);
  }
}

/**
 * Child logger with prefix
 */
export class ChildLogger implements LogSink {
  constructor(
    private readonly parent: LogSink,
    private readonly prefix: string
  ) {}

  debug(message: string, meta?: unknown): void {
    this.parent.debug(`[${this.prefix}] ${message}`, meta);
  }

  info(message: string, meta?: unknown): void {
    this.parent.info(`[${this.prefix}] ${message}`, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.parent.warn(`[${this.prefix}] ${message}`, meta);
  }

  error(message: string, meta?: unknown): void {
    this.parent.error(`[${this.prefix}] ${message}`, meta);
  }
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

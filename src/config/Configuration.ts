import * as dotenv from 'dotenv';
import { existsSync } from 'fs';
import { join, resolve } from 'path';
import { homedir } from 'os';
import {
  DEFAULT_HASH_ITERATIONS,
  DEFAULT_TICKET_PREFIX,
  DEFAULT_TICKET_START,
  LEDGER_FILE,
  MIN_HASH_ITERATIONS,
  SESSION_FILE,
  USERS_FILE
} from '../constants.js';
import { isLogLevel, LogLevel } from '../infrastructure/logging/Logger.js';

type Env = Record<string, string | undefined>;

/**
 * Application Configuration
 * Loads and validates environment variables for the flat-file stores
 */
export class Configuration {
  // Storage
  public readonly dataDir: string;

  // Password hashing
  public readonly globalSalt: string;
  public readonly hashIterations: number;

  // Ticket numbering
  public readonly ticketPrefix: string;
  public readonly ticketStart: number;

  // Identity fallback when no session file was handed off
  public readonly fallbackUsername: string;
  public readonly fallbackPasswordHash: string;

  // Logging
  public readonly logLevel: LogLevel;
  public readonly logFile: string | null;

  /**
   * @param env - variables to read; defaults to process.env after loading .env
   */
  constructor(env?: Env) {
    const source = env ?? Configuration.loadEnvironment();

    this.dataDir = resolve(this.get(source, 'COMPLAINT_DESK_DATA_DIR', './data'));

    this.globalSalt = this.get(source, 'COMPLAINT_DESK_GLOBAL_SALT', 'complaint-desk-global-salt-v1');
    this.hashIterations = this.getInteger(source, 'COMPLAINT_DESK_HASH_ITERATIONS', DEFAULT_HASH_ITERATIONS);

    this.ticketPrefix = this.get(source, 'COMPLAINT_DESK_TICKET_PREFIX', DEFAULT_TICKET_PREFIX);
    this.ticketStart = this.getInteger(source, 'COMPLAINT_DESK_TICKET_START', DEFAULT_TICKET_START);

    this.fallbackUsername = this.get(source, 'COMPLAINT_DESK_USERNAME', '');
    this.fallbackPasswordHash = this.get(source, 'COMPLAINT_DESK_PASSWORD_HASH', '');

    const logLevel = this.get(source, 'LOG_LEVEL', 'info');
    if (!isLogLevel(logLevel)) {
      throw new Error(`Invalid LOG_LEVEL: ${logLevel} (expected debug, info, warn or error)`);
    }
    this.logLevel = logLevel;
    const logFile = this.get(source, 'COMPLAINT_DESK_LOG_FILE', '');
    this.logFile = logFile ? resolve(logFile) : null;

    this.validate();
  }

  get usersFile(): string {
    return join(this.dataDir, USERS_FILE);
  }

  get ledgerFile(): string {
    return join(this.dataDir, LEDGER_FILE);
  }

  get sessionFile(): string {
    return join(this.dataDir, SESSION_FILE);
  }

  /**
   * Load .env from COMPLAINT_DESK_HOME (or ~/.complaint-desk), falling back to the CWD
   */
  private static loadEnvironment(): Env {
    const home = process.env.COMPLAINT_DESK_HOME || join(homedir(), '.complaint-desk');
    const envPath = join(home, '.env');
    if (existsSync(envPath)) {
      dotenv.config({ path: envPath });
    } else {
      dotenv.config();
    }
    return process.env;
  }

  private get(env: Env, key: string, defaultValue: string): string {
    return env[key] || defaultValue;
  }

  private getInteger(env: Env, key: string, defaultValue: number): number {
    const raw = env[key];
    if (!raw) {
      return defaultValue;
    }
    if (!/^\d+$/.test(raw.trim())) {
      throw new Error(`Invalid ${key}: ${raw} (expected a positive integer)`);
    }
    return parseInt(raw.trim(), 10);
  }

  private validate(): void {
    if (this.hashIterations < MIN_HASH_ITERATIONS) {
      throw new Error(`COMPLAINT_DESK_HASH_ITERATIONS must be at least ${MIN_HASH_ITERATIONS}`);
    }

    if (this.globalSalt.trim().length === 0) {
      throw new Error('COMPLAINT_DESK_GLOBAL_SALT cannot be empty');
    }

    if (!/^[A-Za-z]+$/.test(this.ticketPrefix)) {
      throw new Error(`Invalid COMPLAINT_DESK_TICKET_PREFIX: ${this.ticketPrefix} (letters only)`);
    }

    if (this.ticketStart < 1) {
      throw new Error('COMPLAINT_DESK_TICKET_START must be at least 1');
    }

    // Both halves of the fallback identity, or neither
    if (Boolean(this.fallbackUsername) !== Boolean(this.fallbackPasswordHash)) {
      throw new Error('COMPLAINT_DESK_USERNAME and COMPLAINT_DESK_PASSWORD_HASH must be set together');
    }
  }

  /**
   * Log configuration (without sensitive data)
   */
  public summary(): Record<string, string | number> {
    return {
      dataDir: this.dataDir,
      globalSalt: this.globalSalt === 'complaint-desk-global-salt-v1' ? 'default' : 'custom',
      hashIterations: this.hashIterations,
      ticketPrefix: this.ticketPrefix,
      ticketStart: this.ticketStart,
      fallbackIdentity: this.fallbackUsername ? this.fallbackUsername : 'not set',
      logLevel: this.logLevel,
      logFile: this.logFile ?? 'stderr only'
    };
  }
}

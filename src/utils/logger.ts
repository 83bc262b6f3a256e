/**
 * Logging Utility
 *
 * Structured JSON logging for the repartitioning planner.
 */

import { createWriteStream, existsSync } from 'fs';
import path from 'path';
import type { LogLevel } from '../contracts/types.js';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  data?: unknown;
  error?: unknown;
}

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

function parseLevel(value: string | undefined): LogLevel {
  const match = LEVELS.find((level) => level === value?.toLowerCase());
  return match ?? 'info';
}

class Logger {
  private logLevel: LogLevel;
  private logStream: NodeJS.WritableStream | null = null;

  constructor() {
    this.logLevel = parseLevel(process.env.MIGRATION_LOG_LEVEL);

    // File logging only when a logs/ directory is present
    const logDir = path.join(process.cwd(), 'logs');
    if (existsSync(logDir)) {
      const stream = createWriteStream(path.join(logDir, 'repartition-planner.log'), { flags: 'a' });
      stream.on('error', (err) => {
        this.logStream = null;
        console.error(`File logging disabled: ${err.message}`);
      });
      this.logStream = stream;
    }
  }

  setLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  debug(message: string, data?: unknown): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log('warn', message, data);
  }

  error(message: string, error?: unknown): void {
    this.log('error', message, undefined, error);
  }

  private log(level: LogLevel, message: string, data?: unknown, error?: unknown): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
    };

    if (data !== undefined) {
      entry.data = data;
    }

    if (error) {
      entry.error = error instanceof Error ? {
        message: error.message,
        stack: error.stack,
        name: error.name,
      } : error;
    }

    const logString = JSON.stringify(entry);

    // Console output with color coding
    const coloredMessage = this.colorizeLog(level, logString);
    if (level === 'error' || level === 'warn') {
      console.error(coloredMessage);
    } else {
      console.log(coloredMessage);
    }

    // File output
    if (this.logStream) {
      this.logStream.write(logString + '\n');
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.logLevel);
  }

  private colorizeLog(level: LogLevel, message: string): string {
    const colors: Record<LogLevel, string> = {
      debug: '\x1b[36m', // Cyan
      info: '\x1b[32m',  // Green
      warn: '\x1b[33m',  // Yellow
      error: '\x1b[31m', // Red
    };

    const reset = '\x1b[0m';
    return `${colors[level]}${message}${reset}`;
  }
}

export const logger = new Logger();

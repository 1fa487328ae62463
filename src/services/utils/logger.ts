import fs from 'fs';
import os from 'os';
import path from 'path';
import { type LogLevelName } from '@/types/settings';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  NONE = 4,
}

export interface LogEntry {
  timestamp: string;
  level: 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';
  message: string;
  data?: unknown;
}

const LEVEL_BY_NAME: Record<LogLevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  none: LogLevel.NONE,
};

export function parseLogLevel(name: LogLevelName): LogLevel {
  return LEVEL_BY_NAME[name];
}

class Logger {
  private level: LogLevel = LogLevel.INFO;
  private logs: LogEntry[] = [];
  private maxLogs = 1000;
  private logFile: string | null = null;
  private console = true;

  setLevel(level: LogLevel) {
    this.level = level;
  }

  /** Silence console output; the buffer and the log file still receive entries */
  setConsoleEnabled(enabled: boolean) {
    this.console = enabled;
  }

  /**
   * Append every formatted line to a file as well.
   * Pass null to stop writing to the file.
   */
  setLogFile(filePath: string | null) {
    if (filePath) {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
    }
    this.logFile = filePath;
  }

  getLogs() {
    return this.logs;
  }

  clear() {
    this.logs = [];
  }

  private addLog(level: LogEntry['level'], message: string, data?: unknown) {
    const entry: LogEntry = { timestamp: new Date().toISOString(), level, message, data };

    this.logs.push(entry);
    if (this.logs.length > this.maxLogs) {
      this.logs.shift();
    }

    const line = this.formatMessage(level, message, data);
    if (this.logFile) {
      try {
        fs.appendFileSync(this.logFile, line + os.EOL);
      } catch (err) {
        this.logFile = null;
        console.error(`[Logger] Disabled log file after write failure: ${String(err)}`);
      }
    }

    if (!this.console) return;
    if (level === 'DEBUG') console.debug(line);
    else if (level === 'INFO') console.info(line);
    else if (level === 'WARN') console.warn(line);
    else console.error(line);
  }

  private formatMessage(level: string, message: string, data?: unknown) {
    const now = new Date();
    // Format local time as YYYY-MM-DD HH:MM:SS with timezone
    const year = now.getFullYear();
    const month = String(now.getMonth() + 1).padStart(2, '0');
    const day = String(now.getDate()).padStart(2, '0');
    const hours = String(now.getHours()).padStart(2, '0');
    const minutes = String(now.getMinutes()).padStart(2, '0');
    const seconds = String(now.getSeconds()).padStart(2, '0');
    const timezoneOffset = -now.getTimezoneOffset();
    const offsetHours = Math.floor(Math.abs(timezoneOffset) / 60);
    const offsetMinutes = Math.abs(timezoneOffset) % 60;
    const offsetSign = timezoneOffset >= 0 ? '+' : '-';
    const offsetMinutesStr = offsetMinutes > 0 ? `:${String(offsetMinutes).padStart(2, '0')}` : '';
    const timestamp = `${year}-${month}-${day} ${hours}:${minutes}:${seconds} UTC${offsetSign}${offsetHours}${offsetMinutesStr}`;

    let dataString = '';
    if (data !== undefined) {
      try {
        dataString = `\nData: ${JSON.stringify(data instanceof Error ? serializeError(data) : data, null, 2)}`;
      } catch {
        dataString = `\nData: [Circular or Non-Serializable Object]`;
      }
    }
    return `[${timestamp}] [${level}] ${message}${dataString}`;
  }

  debug(message: string, data?: unknown) {
    if (this.level <= LogLevel.DEBUG) {
      this.addLog('DEBUG', message, data);
    }
  }

  info(message: string, data?: unknown) {
    if (this.level <= LogLevel.INFO) {
      this.addLog('INFO', message, data);
    }
  }

  warn(message: string, data?: unknown) {
    if (this.level <= LogLevel.WARN) {
      this.addLog('WARN', message, data);
    }
  }

  error(message: string, data?: unknown) {
    if (this.level <= LogLevel.ERROR) {
      this.addLog('ERROR', message, data);
    }
  }
}

function serializeError(error: Error): Record<string, unknown> {
  const { name, message, ...rest } = error;
  return { name, message, ...rest };
}

export const logger = new Logger();

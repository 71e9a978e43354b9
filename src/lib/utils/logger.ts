/**
 * Log severity levels
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARNING = 2,
  ERROR = 3,
}

/**
 * Types of events that can be logged
 */
export enum LogEventType {
  SCAN_START = "scan_start",
  DEVICE_FOUND = "device_found",
  CONNECT_START = "connect_start",
  CONNECTED = "connected",
  DISCOVER_CHAR = "discover_char",
  FRAMES_BUILT = "frames_built",
  HANDSHAKE_START = "handshake_start",
  HANDSHAKE_COMPLETE = "handshake_complete",
  TRANSFER_START = "transfer_start",
  FRAME_RETRY = "frame_retry",
  TRANSFER_COMPLETE = "transfer_complete",
  TEARDOWN_START = "teardown_start",
  TEARDOWN_COMPLETE = "teardown_complete",
}

/**
 * A single log entry
 */
export type LogEntry = {
  level: LogLevel;
  message: string;
  timestamp: number;
  eventType?: LogEventType;
  data?: unknown;
};

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: "DEBUG",
  [LogLevel.INFO]: "INFO",
  [LogLevel.WARNING]: "WARN",
  [LogLevel.ERROR]: "ERR",
};

/**
 * Logger class for handling application logging with severity levels and event tracking.
 * Writes to the console at or above the configured level. Listeners see every
 * entry regardless of level, since the terminal UI drives its step list from
 * INFO events even when the console is quiet.
 */
export class Logger {
  private level: LogLevel = LogLevel.WARNING;
  private listeners: Set<(entry: LogEntry) => void> = new Set();
  private consoleEnabled = true;

  /**
   * Sets the minimum log level to output. Messages below this level will be ignored.
   */
  public setLevel(level: LogLevel): void {
    this.level = level;
  }

  public getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Maps a repeated `-v` count onto a level: 0 → WARNING, 1 → INFO, 2+ → DEBUG.
   */
  public setVerbosity(count: number): void {
    if (count >= 2) {
      this.setLevel(LogLevel.DEBUG);
    } else if (count === 1) {
      this.setLevel(LogLevel.INFO);
    } else {
      this.setLevel(LogLevel.WARNING);
    }
  }

  /**
   * Turns console output on or off. Listeners still receive entries.
   */
  public setConsoleOutput(enabled: boolean): void {
    this.consoleEnabled = enabled;
  }

  /**
   * Registers a callback to be invoked for each log entry.
   * @returns Unsubscribe function to remove the listener
   */
  public onLog(listener: (entry: LogEntry) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private log(
    level: LogLevel,
    message: string,
    eventType?: LogEventType,
    data?: unknown,
  ): void {
    const entry: LogEntry = {
      level,
      message,
      timestamp: Date.now(),
      eventType,
      data,
    };

    if (this.consoleEnabled && this.level <= level) {
      const output = `[${LEVEL_NAMES[level].padEnd(4)}] ${message}`;
      switch (level) {
        case LogLevel.DEBUG:
          console.debug(output);
          break;
        case LogLevel.INFO:
          console.log(output);
          break;
        case LogLevel.WARNING:
          console.warn(output);
          break;
        case LogLevel.ERROR:
          console.error(output);
          break;
      }
    }

    this.listeners.forEach((listener) => listener(entry));
  }

  public debug(message: string, eventType?: LogEventType, data?: unknown): void {
    this.log(LogLevel.DEBUG, message, eventType, data);
  }

  public info(message: string, eventType?: LogEventType, data?: unknown): void {
    this.log(LogLevel.INFO, message, eventType, data);
  }

  public warning(
    message: string,
    eventType?: LogEventType,
    data?: unknown,
  ): void {
    this.log(LogLevel.WARNING, message, eventType, data);
  }

  public error(message: string, eventType?: LogEventType, data?: unknown): void {
    this.log(LogLevel.ERROR, message, eventType, data);
  }
}

/**
 * Global logger instance for application-wide logging.
 */
export const logger = new Logger();

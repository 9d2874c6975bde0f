/**
 * Logging interfaces
 *
 * Loggers are always handed to the components that use them, there is no
 * process wide logger to configure
 */

import { HiResClock, type Timestamp } from "./time.js"

/**
 * Levels for logging information
 */
export enum LogLevel {
  FATAL = 0,
  ERROR = 10,
  WARN = 20,
  INFO = 30,
  DEBUG = 40,
}

/**
 * Defines some simple structure for log information
 */
export interface LogData {
  level: LogLevel
  message: string
  timestamp?: Timestamp
  source?: string
  context?: unknown
}

/**
 * Simple interface for writing {@link LogData} to some source
 */
export interface LogWriter {
  /**
   * Writes the {@link LogData} to the underlying source
   *
   * @param data The {@link LogData} to write
   */
  log(data: LogData): void
}

/**
 * {@link LogWriter} that does nothing
 */
export const NoopLogWriter: LogWriter = {
  log(_data: LogData): void {},
}

/**
 * Simple interface for logging information
 */
export interface Logger {
  /** The current {@link LogLevel} */
  readonly level: LogLevel

  /** The source for events logged here */
  readonly name?: string

  /**
   * Update the {@link LogLevel} minimum to write with
   *
   * @param level The new {@link LogLevel} to use
   */
  setLevel(level: LogLevel): void

  debug(message: string, context?: unknown): void
  info(message: string, context?: unknown): void
  warn(message: string, context?: unknown): void
  error(message: string, context?: unknown): void

  /**
   * Writes a {@link LogLevel.FATAL} event, these are never filtered
   *
   * @param message The message to log
   * @param context The additional context for the message
   */
  fatal(message: string, context?: unknown): void

  /**
   * Create a {@link Logger} sharing this writer and level with a new source
   * name
   *
   * @param name The source name for the new logger
   */
  child(name: string): Logger
}

/**
 * Options for configuring loggers
 */
export interface LoggerOptions {
  /** Optional {@link LogLevel} for initial logging, default is {@link LogLevel.INFO} */
  level?: LogLevel
  /** Optional source for the logs */
  name?: string
  /** Optional {@link LogWriter} with default of {@link NoopLogWriter} */
  writer?: LogWriter
}

type MessageLogger = (message: string, context?: unknown) => void
const NO_OP_LOGGER: MessageLogger = (
  _message: string,
  _context?: unknown,
): void => {}

/**
 * Simple logger that swaps the level methods for no-ops when they are
 * filtered so disabled levels cost a single call
 */
export class DefaultLogger implements Logger {
  private _level: LogLevel
  private readonly _writer: LogWriter
  readonly name?: string

  debug: MessageLogger = NO_OP_LOGGER
  info: MessageLogger = NO_OP_LOGGER
  warn: MessageLogger = NO_OP_LOGGER
  error: MessageLogger = NO_OP_LOGGER
  readonly fatal: MessageLogger

  constructor(options?: LoggerOptions) {
    this._level = options?.level ?? LogLevel.INFO
    this._writer = options?.writer ?? NoopLogWriter
    this.name = options?.name

    this.fatal = this._writerFor(LogLevel.FATAL)
    this.setLevel(this._level)
  }

  get level(): LogLevel {
    return this._level
  }

  setLevel(level: LogLevel): void {
    this._level = level

    this.debug = this._enabled(LogLevel.DEBUG)
    this.info = this._enabled(LogLevel.INFO)
    this.warn = this._enabled(LogLevel.WARN)
    this.error = this._enabled(LogLevel.ERROR)
  }

  child(name: string): Logger {
    return new DefaultLogger({
      name,
      level: this._level,
      writer: this._writer,
    })
  }

  private _enabled(level: LogLevel): MessageLogger {
    return this._level >= level ? this._writerFor(level) : NO_OP_LOGGER
  }

  private _writerFor(level: LogLevel): MessageLogger {
    return (message: string, context?: unknown): void => {
      this._writer.log({
        source: this.name,
        timestamp: HiResClock.timestamp(),
        message,
        level,
        context,
      })
    }
  }
}

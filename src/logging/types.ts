/**
 * Logging type definitions
 *
 * Types for the logging system including:
 * - Logger interface and configuration
 * - Sink interfaces (console, rotating file)
 */

// ═══════════════════════════════════════════════════════════════
// LOG LEVEL TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Log level (matches LOG_LEVELS values)
 */
export type LogLevel = 0 | 1 | 2 | 3; // DEBUG | INFO | WARNING | ERROR

/**
 * Log level constants structure
 * Passed to the logger instead of importing LOG_LEVELS
 */
export interface LogLevels {
  DEBUG: 0;
  INFO: 1;
  WARNING: 2;
  ERROR: 3;
}

/**
 * Printable level name
 */
export type LogLevelName = keyof LogLevels;

// ═══════════════════════════════════════════════════════════════
// LOGGER TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Main logger interface
 * Provides leveled logging methods and runtime configuration
 */
export interface Logger {
  /** Log at specified level */
  log(level: LogLevel, msg: string): void;
  /** Log DEBUG level message */
  debug(msg: string): void;
  /** Log INFO level message */
  info(msg: string): void;
  /** Log WARNING level message */
  warning(msg: string): void;
  /** Log ERROR level message */
  error(msg: string): void;
  /** Update log level at runtime */
  setLevel(newLevel: LogLevel): void;
  /** Get current log level */
  getLevel(): LogLevel;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Current log level (0=DEBUG, 1=INFO, 2=WARNING, 3=ERROR) */
  level: LogLevel;
}

/**
 * Sink with its minimum log level
 * Logger filters records before handing them to each sink
 */
export interface SinkWithLevel {
  /** The output sink */
  sink: LogSink;
  /** Minimum level this sink receives */
  minLevel: LogLevel;
}

/**
 * Logger external dependencies
 */
export interface LoggerDependencies {
  /** Function returning current time in epoch milliseconds */
  timeSource: () => number;
  /** Array of sinks with their minimum levels */
  sinks: SinkWithLevel[];
}

// ═══════════════════════════════════════════════════════════════
// SINK TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * A single log event as seen by sinks
 */
export interface LogRecord {
  level: LogLevel;
  levelName: LogLevelName;
  message: string;
  /** Epoch milliseconds */
  time: number;
}

/**
 * Base sink interface
 * Level filtering happens in the logger before write() is called;
 * each sink does its own formatting
 */
export interface LogSink {
  write(record: LogRecord): void;
}

/**
 * Console sink configuration
 */
export interface ConsoleSinkConfig {
  /** Colour the level tag */
  colors: boolean;
}

/**
 * Console API interface
 * Abstraction over global console for testability
 */
export interface ConsoleAPI {
  /** Write to stdout */
  log(message: string): void;
  /** Write to stderr */
  error(message: string): void;
}

/**
 * Rotating file sink configuration
 */
export interface FileSinkConfig {
  /** Log file path */
  path: string;
  /** Roll over when a write would exceed this size */
  maxBytes: number;
  /** Number of rolled files kept (path.1 .. path.N) */
  backupCount: number;
}

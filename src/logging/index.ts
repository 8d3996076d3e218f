/**
 * 统一日志系统主入口
 */

export type { LogContext, UnifiedLogEntry, LogError, LoggerConfig, LogStats, UnifiedLogger } from './types.js';
export { LogLevel } from './types.js';
export { DEFAULT_CONFIG, LOG_LEVEL_PRIORITY, SENSITIVE_FIELDS } from './constants.js';
export { UnifiedModuleLogger } from './UnifiedLogger.js';
export { formatValueForConsole, clampStringLength } from './console-format.js';
export type { ConsoleFormatOptions } from './console-format.js';

import { LogLevel } from './types.js';
import type { LoggerConfig, UnifiedLogger } from './types.js';
import { UnifiedModuleLogger } from './UnifiedLogger.js';

const LEVELS: readonly LogLevel[] = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

export function parseLogLevel(value: string): LogLevel | undefined {
  const normalized = value.trim().toLowerCase();
  return LEVELS.find((level) => level === normalized);
}

/**
 * Loggers are created per operation call; nothing is cached between calls.
 */
export function createLogger(config: LoggerConfig): UnifiedLogger {
  return new UnifiedModuleLogger(config);
}

/**
 * UnifiedLogger 核心实现类
 *
 * 按模块记录结构化日志, 支持级别过滤、上下文、敏感字段脱敏和有限历史
 */

import { EventEmitter } from 'node:events';

import { LogLevel } from './types.js';
import type { LogContext, LogError, LogStats, LoggerConfig, UnifiedLogEntry, UnifiedLogger } from './types.js';
import { DEFAULT_CONFIG, ERROR_CONSTANTS, LOG_LEVEL_PRIORITY, SENSITIVE_FIELDS } from './constants.js';
import { formatValueForConsole } from './console-format.js';
import { readErrorCode } from '../error-handling/error-classifier.js';

type ResolvedLoggerConfig = Required<Omit<LoggerConfig, 'sink'>> & { sink: (line: string) => void };

export class UnifiedModuleLogger extends EventEmitter implements UnifiedLogger {
  private readonly config: ResolvedLoggerConfig;
  private context: LogContext = {};
  private history: UnifiedLogEntry[] = [];
  private stats: LogStats;

  constructor(config: LoggerConfig) {
    super();

    this.config = {
      moduleId: config.moduleId,
      moduleType: config.moduleType,
      logLevel: config.logLevel ?? DEFAULT_CONFIG.LOG_LEVEL,
      enableConsole: config.enableConsole ?? DEFAULT_CONFIG.ENABLE_CONSOLE,
      maxHistory: config.maxHistory ?? DEFAULT_CONFIG.MAX_HISTORY,
      sensitiveFields: [...(config.sensitiveFields ?? SENSITIVE_FIELDS.DEFAULT)],
      sink: config.sink ?? ((line: string) => console.error(line)),
    };

    this.stats = {
      totalLogs: 0,
      levelCounts: {
        [LogLevel.DEBUG]: 0,
        [LogLevel.INFO]: 0,
        [LogLevel.WARN]: 0,
        [LogLevel.ERROR]: 0,
      },
      errorCount: 0,
    };
  }

  debug(message: string, data?: unknown): void {
    this.writeLog(LogLevel.DEBUG, message, data);
  }

  info(message: string, data?: unknown): void {
    this.writeLog(LogLevel.INFO, message, data);
  }

  warn(message: string, data?: unknown): void {
    this.writeLog(LogLevel.WARN, message, data);
  }

  error(message: string, error?: unknown, data?: unknown): void {
    this.writeLog(LogLevel.ERROR, message, data, error);
  }

  setContext(context: LogContext): void {
    this.context = { ...context };
  }

  updateContext(updates: Partial<LogContext>): void {
    this.context = { ...this.context, ...updates };
  }

  getContext(): LogContext {
    return { ...this.context };
  }

  getModuleId(): string {
    return this.config.moduleId;
  }

  getHistory(limit?: number): UnifiedLogEntry[] {
    const logs = limit ? this.history.slice(-limit) : [...this.history];
    return logs.map((log) => ({ ...log }));
  }

  getStats(): LogStats {
    return { ...this.stats, levelCounts: { ...this.stats.levelCounts } };
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.config.logLevel];
  }

  private writeLog(level: LogLevel, message: string, data?: unknown, error?: unknown): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const entry: UnifiedLogEntry = {
      timestamp: Date.now(),
      level,
      moduleId: this.config.moduleId,
      moduleType: this.config.moduleType,
      context: this.sanitizeRecord(this.context),
      message: message.trim(),
      data: data === undefined ? undefined : this.removeSensitiveData(data),
      error: error === undefined ? undefined : formatError(error),
    };

    if (this.config.maxHistory > 0) {
      this.history.push(entry);
      if (this.history.length > this.config.maxHistory) {
        this.history.shift();
      }
    }

    this.updateStats(entry);

    if (this.config.enableConsole) {
      this.config.sink(this.formatLine(entry));
    }

    this.emit('log_written', entry);
  }

  private removeSensitiveData(value: unknown): unknown {
    if (typeof value !== 'object' || value === null) {
      return value;
    }
    if (Array.isArray(value)) {
      return value.map((item) => this.removeSensitiveData(item));
    }
    return this.sanitizeRecord(value);
  }

  private sanitizeRecord(record: object): Record<string, unknown> {
    const sanitized: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(record)) {
      const lowerKey = key.toLowerCase();
      if (this.config.sensitiveFields.some((field) => lowerKey.includes(field.toLowerCase()))) {
        sanitized[key] = SENSITIVE_FIELDS.REDACTED_VALUE;
      } else {
        sanitized[key] = this.removeSensitiveData(inner);
      }
    }
    return sanitized;
  }

  private updateStats(entry: UnifiedLogEntry): void {
    this.stats.totalLogs++;
    this.stats.levelCounts[entry.level]++;
    if (entry.error) {
      this.stats.errorCount++;
    }
  }

  private formatLine(entry: UnifiedLogEntry): string {
    const timestamp = new Date(entry.timestamp).toISOString();
    const levelStr = entry.level.toUpperCase().padEnd(5);
    let output = `${timestamp} [${levelStr}] [${entry.moduleId}] ${entry.message}`;

    if (Object.keys(entry.context).length > 0) {
      output += ` ${formatValueForConsole(entry.context)}`;
    }
    if (entry.data !== undefined) {
      output += ` ${formatValueForConsole(entry.data)}`;
    }
    if (entry.error) {
      output += ` ERROR: ${entry.error.message}`;
      if (entry.error.stack && entry.level === LogLevel.ERROR) {
        output += `\n${entry.error.stack}`;
      }
    }
    return output;
  }
}

function formatError(error: unknown): LogError {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message.substring(0, ERROR_CONSTANTS.MAX_MESSAGE_LENGTH),
      stack: error.stack?.substring(0, ERROR_CONSTANTS.MAX_STACK_LENGTH),
      code: readErrorCode(error),
    };
  }
  return { name: 'NonError', message: formatValueForConsole(error, { maxLength: ERROR_CONSTANTS.MAX_MESSAGE_LENGTH }) };
}

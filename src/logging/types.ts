/**
 * 统一日志系统类型定义
 */

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

/**
 * 日志上下文信息
 */
export interface LogContext {
  /** 操作名称 (translate / run / validate) */
  operation?: string;
  /** 模型ID */
  modelId?: string;
  /** 提供商名称 */
  provider?: string;
  [key: string]: unknown;
}

export interface LogError {
  name: string;
  message: string;
  stack?: string;
  code?: string;
}

export interface UnifiedLogEntry {
  /** 时间戳 (epoch ms) */
  timestamp: number;
  level: LogLevel;
  moduleId: string;
  moduleType: string;
  context: Record<string, unknown>;
  message: string;
  /** 结构化数据 (已脱敏) */
  data?: unknown;
  error?: LogError;
}

/**
 * Logger配置接口
 */
export interface LoggerConfig {
  moduleId: string;
  moduleType: string;
  /** 日志级别 (默认: warn) */
  logLevel?: LogLevel;
  /** 是否启用控制台输出 (默认: true) */
  enableConsole?: boolean;
  /** 最大历史记录数 (默认: 0, 不保留) */
  maxHistory?: number;
  /** 敏感字段过滤 */
  sensitiveFields?: string[];
  /** 控制台输出目标 (默认: console.error) */
  sink?: (line: string) => void;
}

export interface LogStats {
  totalLogs: number;
  levelCounts: Record<LogLevel, number>;
  errorCount: number;
}

export interface UnifiedLogger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, error?: unknown, data?: unknown): void;
  setContext(context: LogContext): void;
  updateContext(updates: Partial<LogContext>): void;
  getContext(): LogContext;
  getHistory(limit?: number): UnifiedLogEntry[];
  getStats(): LogStats;
  isLevelEnabled(level: LogLevel): boolean;
}

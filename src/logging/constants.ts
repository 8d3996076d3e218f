import { LogLevel } from './types.js';

export const DEFAULT_CONFIG = {
  LOG_LEVEL: LogLevel.WARN,
  ENABLE_CONSOLE: true,
  MAX_HISTORY: 0,
} as const;

export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

export const SENSITIVE_FIELDS = {
  DEFAULT: ['authorization', 'api_key', 'apikey', 'x-api-key', 'access_token', 'password', 'secret'],
  REDACTED_VALUE: '[REDACTED]',
} as const;

export const ERROR_CONSTANTS = {
  MAX_MESSAGE_LENGTH: 500,
  MAX_STACK_LENGTH: 2000,
} as const;

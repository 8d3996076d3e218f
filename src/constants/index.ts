/**
 * specforge 统一常量定义
 * 所有硬编码值应在此处集中管理
 */

export const ENGINE_INFO = {
  NAME: 'specforge',
  VERSION: '0.1.0',
} as const;

// 默认配置值
export const ENGINE_DEFAULTS = {
  TIMEOUT_SECONDS: 30,
  // setTimeout delays are capped at 2^31 - 1 ms
  MAX_TIMEOUT_SECONDS: 2147483,
  MIN_SPEC_VERSION: '1.0.0',
  MAX_SPEC_VERSION: '2.0.0',
  USER_AGENT: `${ENGINE_INFO.NAME}/${ENGINE_INFO.VERSION}`,
  // Anthropic requires max_tokens on every request
  ANTHROPIC_MAX_TOKENS: 4096,
  IMAGE_MEDIA_TYPE: 'image/png',
} as const;

export const ENV_VARS = {
  CONFIG: 'SPECFORGE_CONFIG',
  DEFAULT_TIMEOUT_SECONDS: 'SPECFORGE_DEFAULT_TIMEOUT_SECONDS',
  LOG_LEVEL: 'SPECFORGE_LOG_LEVEL',
  MIN_SPEC_VERSION: 'SPECFORGE_MIN_SPEC_VERSION',
  MAX_SPEC_VERSION: 'SPECFORGE_MAX_SPEC_VERSION',
} as const;

export const HTTP_HEADERS = {
  CONTENT_TYPE: 'content-type',
  ACCEPT: 'accept',
  AUTHORIZATION: 'authorization',
  USER_AGENT: 'user-agent',
  RETRY_AFTER: 'retry-after',
} as const;

export const CONTENT_TYPES = {
  JSON: 'application/json',
  EVENT_STREAM: 'text/event-stream',
} as const;

// `${ENV:NAME}` 凭证模板
export const ENV_TEMPLATE_PATTERN = /\$\{ENV:([A-Za-z_][A-Za-z0-9_]*)\}/g;

/**
 * Engine configuration
 *
 * 配置来源优先级: 环境变量 > 配置文件 > 默认值
 */

import fs from 'node:fs';
import { z } from 'zod';

import { ENGINE_DEFAULTS, ENV_VARS } from '../constants/index.js';
import { ErrorKind, fail, ok } from '../error-handling/error-kinds.js';
import type { Outcome } from '../error-handling/error-kinds.js';
import { LogLevel, parseLogLevel } from '../logging/index.js';
import { compareSpecVersions, parseSpecVersion } from '../validation/semver.js';
import { isPlainObject } from '../utils/json-guards.js';

const versionString = z
  .string()
  .refine((value) => parseSpecVersion(value) !== undefined, { message: 'must be a MAJOR.MINOR.PATCH version' });

export const EngineConfigSchema = z
  .object({
    defaultTimeoutSeconds: z
      .number()
      .int()
      .positive()
      .max(ENGINE_DEFAULTS.MAX_TIMEOUT_SECONDS, {
        message: `must be at most ${ENGINE_DEFAULTS.MAX_TIMEOUT_SECONDS} seconds`
      })
      .default(ENGINE_DEFAULTS.TIMEOUT_SECONDS),
    supportedSpecVersions: z
      .object({
        min: versionString.default(ENGINE_DEFAULTS.MIN_SPEC_VERSION),
        max: versionString.default(ENGINE_DEFAULTS.MAX_SPEC_VERSION),
      })
      .strict()
      .default({}),
    logLevel: z.nativeEnum(LogLevel).default(LogLevel.WARN),
    userAgent: z.string().min(1).default(ENGINE_DEFAULTS.USER_AGENT),
  })
  .strict()
  .superRefine((config, ctx) => {
    const min = parseSpecVersion(config.supportedSpecVersions.min);
    const max = parseSpecVersion(config.supportedSpecVersions.max);
    if (min && max && compareSpecVersions(min, max) >= 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['supportedSpecVersions'],
        message: `min (${config.supportedSpecVersions.min}) must be lower than max (${config.supportedSpecVersions.max})`,
      });
    }
  });

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = Object.freeze({
  defaultTimeoutSeconds: ENGINE_DEFAULTS.TIMEOUT_SECONDS,
  supportedSpecVersions: Object.freeze({
    min: ENGINE_DEFAULTS.MIN_SPEC_VERSION,
    max: ENGINE_DEFAULTS.MAX_SPEC_VERSION,
  }),
  logLevel: LogLevel.WARN,
  userAgent: ENGINE_DEFAULTS.USER_AGENT,
});

export interface LoadEngineConfigOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Reads the optional JSON config file and applies `SPECFORGE_*` overrides.
 */
export function loadEngineConfig(options: LoadEngineConfigOptions = {}): Outcome<EngineConfig> {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? nonEmpty(env[ENV_VARS.CONFIG]);

  let fileConfig: Record<string, unknown> = {};
  if (configPath) {
    const loaded = readConfigFile(configPath);
    if (!loaded.ok) {
      return loaded;
    }
    fileConfig = loaded.value;
  }

  const overrides = readEnvOverrides(env);
  if (!overrides.ok) {
    return overrides;
  }

  const fileVersions = isPlainObject(fileConfig.supportedSpecVersions) ? fileConfig.supportedSpecVersions : {};
  const merged: Record<string, unknown> = { ...fileConfig, ...overrides.value.top };
  if (Object.keys(overrides.value.versions).length > 0) {
    merged.supportedSpecVersions = { ...fileVersions, ...overrides.value.versions };
  }

  const parsed = EngineConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return fail(ErrorKind.InvalidInput, `Invalid engine configuration at ${where}: ${issue.message}`);
  }
  return ok(parsed.data);
}

function readConfigFile(configPath: string): Outcome<Record<string, unknown>> {
  let text: string;
  try {
    text = fs.readFileSync(configPath, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return fail(ErrorKind.InvalidInput, `Cannot read config file ${configPath}: ${reason}`);
  }
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return fail(ErrorKind.JsonError, `Config file ${configPath} is not valid JSON: ${reason}`);
  }
  if (!isPlainObject(value)) {
    return fail(ErrorKind.InvalidInput, `Config file ${configPath} must contain a JSON object`);
  }
  return ok(value);
}

type EnvOverrides = {
  top: Record<string, unknown>;
  versions: Record<string, string>;
};

function readEnvOverrides(env: NodeJS.ProcessEnv): Outcome<EnvOverrides> {
  const top: Record<string, unknown> = {};
  const versions: Record<string, string> = {};

  const timeout = nonEmpty(env[ENV_VARS.DEFAULT_TIMEOUT_SECONDS]);
  if (timeout !== undefined) {
    const seconds = Number(timeout);
    if (!Number.isInteger(seconds) || seconds <= 0) {
      return fail(
        ErrorKind.InvalidInput,
        `${ENV_VARS.DEFAULT_TIMEOUT_SECONDS} must be a positive integer, got '${timeout}'`
      );
    }
    top.defaultTimeoutSeconds = seconds;
  }

  const level = nonEmpty(env[ENV_VARS.LOG_LEVEL]);
  if (level !== undefined) {
    const parsedLevel = parseLogLevel(level);
    if (!parsedLevel) {
      return fail(ErrorKind.InvalidInput, `${ENV_VARS.LOG_LEVEL} must be one of debug, info, warn, error; got '${level}'`);
    }
    top.logLevel = parsedLevel;
  }

  const min = nonEmpty(env[ENV_VARS.MIN_SPEC_VERSION]);
  if (min !== undefined) {
    versions.min = min;
  }
  const max = nonEmpty(env[ENV_VARS.MAX_SPEC_VERSION]);
  if (max !== undefined) {
    versions.max = max;
  }

  return ok({ top, versions });
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== '' ? value.trim() : undefined;
}

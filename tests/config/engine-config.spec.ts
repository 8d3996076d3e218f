import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';

import { DEFAULT_ENGINE_CONFIG, loadEngineConfig } from '../../src/config/engine-config.js';
import { ErrorKind } from '../../src/error-handling/error-kinds.js';
import { LogLevel } from '../../src/logging/index.js';

describe('loadEngineConfig', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'engine-config-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function writeConfig(content: string): string {
    const file = path.join(tmpDir, 'config.json');
    fs.writeFileSync(file, content, 'utf8');
    return file;
  }

  it('returns the defaults without a file or overrides', () => {
    const result = loadEngineConfig({ env: {} });
    expect(result).toEqual({ ok: true, kind: ErrorKind.Success, value: DEFAULT_ENGINE_CONFIG });
    expect(DEFAULT_ENGINE_CONFIG).toEqual({
      defaultTimeoutSeconds: 30,
      supportedSpecVersions: { min: '1.0.0', max: '2.0.0' },
      logLevel: LogLevel.WARN,
      userAgent: 'specforge/0.1.0'
    });
  });

  it('reads the file named by SPECFORGE_CONFIG and lets env override it', () => {
    const file = writeConfig(
      JSON.stringify({ defaultTimeoutSeconds: 12, supportedSpecVersions: { min: '1.2.0' }, logLevel: 'info' })
    );
    const result = loadEngineConfig({
      env: { SPECFORGE_CONFIG: file, SPECFORGE_LOG_LEVEL: 'DEBUG', SPECFORGE_MAX_SPEC_VERSION: '3.0.0' }
    });
    expect(result.ok && result.value).toEqual({
      defaultTimeoutSeconds: 12,
      supportedSpecVersions: { min: '1.2.0', max: '3.0.0' },
      logLevel: LogLevel.DEBUG,
      userAgent: 'specforge/0.1.0'
    });
  });

  it('an explicit path wins over SPECFORGE_CONFIG', () => {
    const file = writeConfig(JSON.stringify({ userAgent: 'tests/1.0' }));
    const result = loadEngineConfig({ configPath: file, env: { SPECFORGE_CONFIG: path.join(tmpDir, 'missing.json') } });
    expect(result.ok && result.value.userAgent).toBe('tests/1.0');
  });

  it('reports syntax errors as JsonError', () => {
    const file = writeConfig('{ "defaultTimeoutSeconds": ');
    const result = loadEngineConfig({ configPath: file, env: {} });
    expect(result.ok).toBe(false);
    expect(result.kind).toBe(ErrorKind.JsonError);
  });

  it('reports unreadable files and schema violations as InvalidInput', () => {
    const missing = loadEngineConfig({ configPath: path.join(tmpDir, 'nope.json'), env: {} });
    expect(missing.kind).toBe(ErrorKind.InvalidInput);

    const unknownField = loadEngineConfig({ configPath: writeConfig('{"retries": 3}'), env: {} });
    expect(unknownField.ok).toBe(false);
    expect(!unknownField.ok && unknownField.message.startsWith('Invalid engine configuration at (root): ')).toBe(true);

    const notObject = loadEngineConfig({ configPath: writeConfig('[1, 2]'), env: {} });
    expect(!notObject.ok && notObject.message).toMatch(/must contain a JSON object$/);
  });

  it('rejects an empty version range', () => {
    const result = loadEngineConfig({
      env: { SPECFORGE_MIN_SPEC_VERSION: '2.0.0', SPECFORGE_MAX_SPEC_VERSION: '2.0.0' }
    });
    expect(result).toEqual({
      ok: false,
      kind: ErrorKind.InvalidInput,
      message: 'Invalid engine configuration at supportedSpecVersions: min (2.0.0) must be lower than max (2.0.0)'
    });
  });

  it('rejects malformed env overrides', () => {
    expect(loadEngineConfig({ env: { SPECFORGE_DEFAULT_TIMEOUT_SECONDS: '1.5' } })).toEqual({
      ok: false,
      kind: ErrorKind.InvalidInput,
      message: "SPECFORGE_DEFAULT_TIMEOUT_SECONDS must be a positive integer, got '1.5'"
    });
    expect(loadEngineConfig({ env: { SPECFORGE_LOG_LEVEL: 'loud' } })).toEqual({
      ok: false,
      kind: ErrorKind.InvalidInput,
      message: "SPECFORGE_LOG_LEVEL must be one of debug, info, warn, error; got 'loud'"
    });
  });

  it('caps the default timeout at what a timer can hold', () => {
    expect(loadEngineConfig({ env: { SPECFORGE_DEFAULT_TIMEOUT_SECONDS: '2147484' } })).toEqual({
      ok: false,
      kind: ErrorKind.InvalidInput,
      message: 'Invalid engine configuration at defaultTimeoutSeconds: must be at most 2147483 seconds'
    });
    const atLimit = loadEngineConfig({ env: { SPECFORGE_DEFAULT_TIMEOUT_SECONDS: '2147483' } });
    expect(atLimit.ok && atLimit.value.defaultTimeoutSeconds).toBe(2147483);
  });
});

import { describe, expect, it } from '@jest/globals';

import { LogLevel, UnifiedModuleLogger, clampStringLength, parseLogLevel } from '../../src/logging/index.js';
import type { UnifiedLogEntry } from '../../src/logging/index.js';

function createCapturingLogger(logLevel: LogLevel = LogLevel.DEBUG): { logger: UnifiedModuleLogger; lines: string[] } {
  const lines: string[] = [];
  const logger = new UnifiedModuleLogger({
    moduleId: 'engine.run',
    moduleType: 'engine',
    logLevel,
    maxHistory: 10,
    sink: (line) => lines.push(line)
  });
  return { logger, lines };
}

describe('UnifiedModuleLogger', () => {
  it('filters by level and formats console lines', () => {
    const { logger, lines } = createCapturingLogger(LogLevel.INFO);
    logger.debug('hidden');
    logger.info('Sending provider request', { status: 200 });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2}T[\d:.]+Z \[INFO \] \[engine\.run\] Sending provider request \{ status: 200 \}$/);
    expect(logger.isLevelEnabled(LogLevel.DEBUG)).toBe(false);
    expect(logger.isLevelEnabled(LogLevel.WARN)).toBe(true);
  });

  it('redacts sensitive keys in data and context', () => {
    const { logger, lines } = createCapturingLogger();
    logger.setContext({ operation: 'run', api_key: 'test-secret' });
    logger.info('headers', {
      headers: { authorization: 'Bearer test-secret', 'X-Api-Key': 'test-secret', accept: 'application/json' },
      usage: { prompt_tokens: 3 }
    });

    const [entry] = logger.getHistory();
    expect(entry.context).toEqual({ operation: 'run', api_key: '[REDACTED]' });
    expect(entry.data).toEqual({
      headers: { authorization: '[REDACTED]', 'X-Api-Key': '[REDACTED]', accept: 'application/json' },
      usage: { prompt_tokens: 3 }
    });
    expect(lines[0]).not.toContain('test-secret');
  });

  it('tracks stats per level and errors', () => {
    const { logger, lines } = createCapturingLogger();
    logger.info('one');
    logger.warn('two');
    logger.error('Failed', new Error('boom'));

    expect(logger.getStats()).toEqual({
      totalLogs: 3,
      levelCounts: { debug: 0, info: 1, warn: 1, error: 1 },
      errorCount: 1
    });
    const [firstLine] = lines[2].split('\n');
    expect(firstLine.endsWith('[engine.run] Failed ERROR: boom')).toBe(true);
  });

  it('keeps bounded history and emits log_written', () => {
    const { logger } = createCapturingLogger();
    const written: UnifiedLogEntry[] = [];
    logger.on('log_written', (entry: UnifiedLogEntry) => written.push(entry));
    for (let index = 0; index < 12; index++) {
      logger.debug(`entry ${index}`);
    }

    expect(written).toHaveLength(12);
    const history = logger.getHistory();
    expect(history).toHaveLength(10);
    expect(history[0].message).toBe('entry 2');
    expect(logger.getHistory(2).map((entry) => entry.message)).toEqual(['entry 10', 'entry 11']);
  });

  it('keeps no history by default', () => {
    const logger = new UnifiedModuleLogger({ moduleId: 'm', moduleType: 't', enableConsole: false });
    logger.error('dropped from history', new Error('x'));
    expect(logger.getHistory()).toEqual([]);
    expect(logger.getStats().errorCount).toBe(1);
  });
});

describe('logging helpers', () => {
  it('parseLogLevel accepts known levels case-insensitively', () => {
    expect(parseLogLevel(' INFO ')).toBe(LogLevel.INFO);
    expect(parseLogLevel('verbose')).toBeUndefined();
  });

  it('clampStringLength marks truncated output', () => {
    expect(clampStringLength('short', 40)).toBe('short');
    expect(clampStringLength('a'.repeat(100), 40)).toBe('aaaaaaaa...[truncated 92 chars]');
  });
});

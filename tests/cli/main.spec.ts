import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, it } from '@jest/globals';

import { parseTimeoutOption } from '../../src/cli/commands/run.js';
import { runCli } from '../../src/cli/main.js';
import type { CliRuntime } from '../../src/cli/runtime.js';
import { ErrorKind } from '../../src/error-handling/error-kinds.js';
import { fixturePath } from '../helpers/fixtures.js';
import { sendJson, startStubServer } from '../helpers/stub-server.js';
import type { StubServer } from '../helpers/stub-server.js';

function captureRuntime(env: NodeJS.ProcessEnv = {}): { runtime: CliRuntime; stdout: () => string; stderr: () => string } {
  const out: string[] = [];
  const err: string[] = [];
  return {
    runtime: { writeOut: (text) => out.push(text), writeErr: (text) => err.push(text), env },
    stdout: () => out.join(''),
    stderr: () => err.join('')
  };
}

function cli(args: string[], runtime: CliRuntime): Promise<number> {
  return runCli(['node', 'specforge', ...args], { cliVersion: '9.9.9', runtime });
}

describe('runCli', () => {
  let server: StubServer | undefined;
  const tmpDirs: string[] = [];

  afterEach(async () => {
    await server?.close();
    server = undefined;
    for (const dir of tmpDirs.splice(0)) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  function tmpFile(name: string, text: string): string {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'specforge-main-'));
    tmpDirs.push(dir);
    const file = path.join(dir, name);
    fs.writeFileSync(file, text, 'utf8');
    return file;
  }

  it('prints the version', async () => {
    const io = captureRuntime();
    expect(await cli(['--version'], io.runtime)).toBe(0);
    expect(io.stdout()).toBe('9.9.9\n');
  });

  it('returns 1 for a missing required option', async () => {
    const io = captureRuntime();
    expect(await cli(['validate', fixturePath('chat-prompt.json')], io.runtime)).toBe(1);
    expect(io.stderr()).toContain("required option '-t, --type <type>' not specified");
  });

  it('returns 0 for a valid spec', async () => {
    const io = captureRuntime();
    expect(await cli(['validate', fixturePath('chat-prompt.json'), '-t', 'prompt_spec'], io.runtime)).toBe(0);
    expect(io.stdout()).toContain('prompt_spec is valid (basic): 0 error(s), 0 warning(s)');
  });

  it('applies the global --config file', async () => {
    const config = tmpFile('engine.json', JSON.stringify({ supportedSpecVersions: { min: '2.0.0', max: '3.0.0' } }));
    const io = captureRuntime();
    const code = await cli(['-c', config, 'validate', fixturePath('chat-prompt.json'), '-t', 'prompt_spec', '-m', 'strict'], io.runtime);
    expect(code).toBe(1);
    expect(io.stdout()).toContain('prompt_spec is invalid (strict): 1 error(s), 0 warning(s)');
  });

  it('reports a broken config file', async () => {
    const config = tmpFile('engine.json', '[]');
    const io = captureRuntime();
    expect(await cli(['--config', config, 'validate', fixturePath('chat-prompt.json'), '-t', 'prompt_spec'], io.runtime)).toBe(1);
    expect(io.stderr()).toContain(`InvalidInput: Config file ${config} must contain a JSON object`);
  });

  it('runs a translated request and normalizes the response', async () => {
    server = await startStubServer((_req, res) =>
      sendJson(res, 200, {
        id: 'chatcmpl-9',
        model: 'gpt-x',
        choices: [{ message: { role: 'assistant', content: '2' }, finish_reason: 'stop' }],
        usage: { prompt_tokens: 9, completion_tokens: 1, total_tokens: 10 }
      })
    );
    const translateIo = captureRuntime();
    const translateCode = await cli(
      [
        'translate',
        '--prompt',
        fixturePath('chat-prompt.json'),
        '--provider',
        fixturePath('openai-provider.json'),
        '--model',
        'gpt-x-latest'
      ],
      translateIo.runtime
    );
    expect(translateCode).toBe(0);
    const translation = JSON.parse(translateIo.stdout());
    translation.request.endpoint.url = `${server.url}/v1/chat/completions`;
    const requestFile = tmpFile('request.json', JSON.stringify(translation));

    const io = captureRuntime({ ACME_API_KEY: 'test-secret' });
    expect(await cli(['run', requestFile, '--timeout', '5', '--normalize'], io.runtime)).toBe(0);
    expect(JSON.parse(io.stdout())).toEqual({
      content: '2',
      role: 'assistant',
      finish_reason: 'stop',
      usage: { input_tokens: 9, output_tokens: 1, total_tokens: 10 },
      model: 'gpt-x',
      id: 'chatcmpl-9'
    });
    expect(server.requests[0].url).toBe('/v1/chat/completions');
    expect(JSON.parse(server.requests[0].body).model).toBe('gpt-x');
  });

  it('rejects a bad timeout before reading the request', async () => {
    const io = captureRuntime();
    expect(await cli(['run', fixturePath('missing.json'), '--timeout', 'soon'], io.runtime)).toBe(1);
    expect(io.stderr()).toContain("InvalidInput: Timeout must be a non-negative whole number of seconds, got 'soon'");
  });
});

describe('parseTimeoutOption', () => {
  it('accepts whole seconds only', () => {
    expect(parseTimeoutOption(' 30 ')).toEqual({ ok: true, kind: ErrorKind.Success, value: 30 });
    expect(parseTimeoutOption('0')).toEqual({ ok: true, kind: ErrorKind.Success, value: 0 });
    expect(parseTimeoutOption('1.5').kind).toBe(ErrorKind.InvalidInput);
    expect(parseTimeoutOption('-3').kind).toBe(ErrorKind.InvalidInput);
  });
});

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, it } from '@jest/globals';
import { Command } from 'commander';

import { createTranslateCommand } from '../../../src/cli/commands/translate.js';
import type { CommandContext } from '../../../src/cli/commands/shared.js';
import { fixturePath } from '../../helpers/fixtures.js';

function harness(): { ctx: CommandContext; out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    ctx: {
      log: (line) => out.push(line),
      error: (line) => err.push(line),
      exit: (code) => {
        throw new Error(`exit:${code}`);
      },
      env: {}
    }
  };
}

describe('cli translate command', () => {
  const tmpDirs: string[] = [];

  afterEach(() => {
    for (const dir of tmpDirs.splice(0)) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('prints the translation document', async () => {
    const { ctx, out, err } = harness();
    const program = new Command();
    createTranslateCommand(program, ctx);

    await program.parseAsync(
      [
        'node',
        'specforge',
        'translate',
        '--prompt',
        fixturePath('chat-prompt.json'),
        '--provider',
        fixturePath('anthropic-provider.json'),
        '--model',
        'claude-x'
      ],
      { from: 'node' }
    );

    expect(err).toEqual([]);
    const translation = JSON.parse(out.join('\n'));
    expect(translation.mode).toBe('standard');
    expect(translation.request.endpoint.url).toBe('https://anthropic.example.test/v1/messages');
    expect(translation.request.body).toEqual({
      model: 'claude-x',
      system: 'You are terse.',
      messages: [{ role: 'user', content: 'Name a prime number.' }],
      max_tokens: 64,
      temperature: 0.2,
      top_p: 0.9
    });
    expect(translation.diagnostics).toEqual([]);
  });

  it('writes the translation to --output', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'specforge-cli-'));
    tmpDirs.push(dir);
    const output = path.join(dir, 'request.json');
    const { ctx, out } = harness();
    const program = new Command();
    createTranslateCommand(program, ctx);

    await program.parseAsync(
      [
        'node',
        'specforge',
        'translate',
        '--prompt',
        fixturePath('tool-prompt.json'),
        '--provider',
        fixturePath('openai-provider.json'),
        '--model',
        'gpt-x-mini',
        '-o',
        output
      ],
      { from: 'node' }
    );

    expect(out).toHaveLength(1);
    expect(out[0]).toContain(`Translation written to ${output}`);
    const written = JSON.parse(fs.readFileSync(output, 'utf8'));
    expect(written.diagnostics.map((entry: { feature: string }) => entry.feature)).toEqual(['tools', 'seed']);
  });

  it('exits with the failure kind in strict mode', async () => {
    const { ctx, out, err } = harness();
    const program = new Command();
    createTranslateCommand(program, ctx);

    await expect(
      program.parseAsync(
        [
          'node',
          'specforge',
          'translate',
          '--prompt',
          fixturePath('tool-prompt.json'),
          '--provider',
          fixturePath('openai-provider.json'),
          '--model',
          'gpt-x-mini',
          '--mode',
          'strict'
        ],
        { from: 'node' }
      )
    ).rejects.toThrow('exit:1');

    expect(out).toEqual([]);
    expect(err).toHaveLength(1);
    expect(err[0]).toContain("NotImplemented: Capability mismatch for model 'gpt-x-mini': missing features [seed, tools]");
  });

  it('reports unreadable spec files', async () => {
    const { ctx, err } = harness();
    const program = new Command();
    createTranslateCommand(program, ctx);
    const missing = fixturePath('missing.json');

    await expect(
      program.parseAsync(
        ['node', 'specforge', 'translate', '--prompt', missing, '--provider', missing, '--model', 'gpt-x'],
        { from: 'node' }
      )
    ).rejects.toThrow('exit:1');
    expect(err[0]).toContain(`InvalidInput: Cannot read prompt spec file '${missing}'`);
  });
});

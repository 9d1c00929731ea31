/**
 * End-to-end tests for CLI command dispatch, with in-process input and output.
 */

import { mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { getVersionFromPackageJson } from './commands/version.js';
import { runCli } from './main.js';
import type { InputReader, OutputWriter } from './types.js';

const FIXTURES = fileURLToPath(new URL('../../test-fixtures/scripts/', import.meta.url));
const REGISTRATION = path.join(FIXTURES, 'registration.yml');

interface FakeTerminal {
  readonly input: InputReader;
  readonly output: OutputWriter;
  readonly prompts: string[];
  readonly lines: string[];
  readonly errors: string[];
}

function fakeTerminal(answers: string[]): FakeTerminal {
  const prompts: string[] = [];
  const lines: string[] = [];
  const errors: string[] = [];
  return {
    prompts,
    lines,
    errors,
    input: {
      readLine(prompt) {
        prompts.push(prompt);
        const answer = answers.shift();
        return answer === undefined
          ? Promise.reject(new Error('Input ended before an answer was given'))
          : Promise.resolve(answer);
      },
      close() {
        answers.length = 0;
      },
    },
    output: {
      line(text = '') {
        lines.push(text);
      },
      error(text = '') {
        errors.push(text);
      },
    },
  };
}

function silenceStderr() {
  return vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
}

describe('runCli', () => {
  let cwd: string;
  let stderr: ReturnType<typeof silenceStderr>;

  beforeEach(async () => {
    cwd = await mkdtemp(path.join(tmpdir(), 'interview-cli-'));
    stderr = silenceStderr();
  });

  afterEach(async () => {
    stderr.mockRestore();
    await rm(cwd, { recursive: true, force: true });
  });

  function run(argv: string[], terminal: FakeTerminal): Promise<number> {
    return runCli(argv, {
      cwd,
      env: {},
      input: terminal.input,
      output: terminal.output,
      display: { colors: false, unicode: false },
    });
  }

  it('should run an interview to completion, asking again after a rejection', async () => {
    const terminal = fakeTerminal(['9', '4']);

    const exitCode = await run(['run', 'survey', '--script', REGISTRATION], terminal);

    expect(exitCode).toBe(0);
    expect(terminal.prompts).toEqual(['field_0: ', 'field_0: ']);
    expect(terminal.lines).toEqual([
      '',
      'How was it?',
      'field_0: must be <= 5',
      '',
      'How was it?',
      '',
      'Interview complete.',
      '{\n  "rating": 4,\n  "done": true\n}',
    ]);
  });

  it('should show the exit message when an interview ends early', async () => {
    const terminal = fakeTerminal(['Ada', 'Lovelace', '', 'ada@example.com']);

    const exitCode = await run(
      ['run', 'registration', '--script', REGISTRATION, '--context', '{"closed": true}'],
      terminal
    );

    expect(exitCode).toBe(0);
    expect(terminal.prompts).toEqual([
      'First Name: ',
      'Last Name: ',
      'field_2 (optional): ',
      'Email: ',
    ]);
    expect(terminal.lines.at(-1)).toBe(
      [
        '+---------------------+',
        '| Registration closed |',
        '| Come back next year |',
        '+---------------------+',
      ].join('\n')
    );
  });

  it('should read scripts and file storage from interview.toml', async () => {
    await writeFile(
      path.join(cwd, 'interview.toml'),
      [
        '[scripts]',
        `paths = [${JSON.stringify(REGISTRATION)}]`,
        '',
        '[storage]',
        'backend = "file"',
        'directory = "state"',
        '',
      ].join('\n')
    );
    const terminal = fakeTerminal(['5']);

    expect(await run(['run', 'survey'], terminal)).toBe(0);
    const files = await readdir(path.join(cwd, 'state'));
    expect(files).toHaveLength(3);
    expect(files.every((name) => name.endsWith('.json'))).toBe(true);
  });

  it('should list the interviews of valid scripts', async () => {
    const terminal = fakeTerminal([]);

    expect(await run(['validate', '--script', REGISTRATION], terminal)).toBe(0);
    expect(terminal.lines).toEqual([
      'Configuration: (defaults)',
      'OK 2 interview(s) in 1 script(s)',
      '  - registration: 4 question(s), 5 step(s)',
      '  - survey: 1 question(s), 3 step(s)',
    ]);
  });

  it('should report script errors with their location', async () => {
    const terminal = fakeTerminal([]);
    const invalid = path.join(FIXTURES, 'invalid.yml');

    expect(await run(['validate', '--script', invalid], terminal)).toBe(1);
    expect(terminal.errors).toEqual([
      [
        `Error: ${invalid}#interviews[0].steps[0]: A step needs exactly one of "ask", "set", "exit", "ensure"`,
        '',
        'Suggestions:',
        '  1. Fix the element at the reported location',
        '  2. Check the scripts without running an interview',
        '     interview validate',
      ].join('\n'),
    ]);
  });

  it('should report unknown interviews', async () => {
    const terminal = fakeTerminal([]);

    expect(await run(['run', 'missing', '--script', REGISTRATION], terminal)).toBe(1);
    expect(terminal.errors[0]?.split('\n')[0]).toBe('Error: Unknown interview "missing"');
  });

  it('should report usage errors', async () => {
    const terminal = fakeTerminal([]);

    expect(await run(['run'], terminal)).toBe(1);
    expect(terminal.errors).toEqual([
      [
        'Error: Missing interview id',
        '',
        'Suggestions:',
        '  1. Show the usage of the command',
        '     interview help <command>',
      ].join('\n'),
    ]);

    const badContext = fakeTerminal([]);
    expect(
      await run(['run', 'survey', '--script', REGISTRATION, '--context', '[1]'], badContext)
    ).toBe(1);
    expect(badContext.errors[0]?.split('\n')[0]).toBe('Error: --context must be a JSON object');
  });

  it('should reject unknown commands', async () => {
    const terminal = fakeTerminal([]);

    expect(await run(['launch'], terminal)).toBe(1);
    expect(terminal.errors).toEqual([
      'Error: Unknown command: launch',
      '\nRun "interview help" for usage information.',
    ]);
  });

  it('should print the version from package.json', async () => {
    const terminal = fakeTerminal([]);

    expect(await run(['--version'], terminal)).toBe(0);
    expect(terminal.lines).toEqual([`interview v${getVersionFromPackageJson()}`]);
    expect(getVersionFromPackageJson()).toMatch(/^\d+\.\d+\.\d+/);
  });

  it('should document environment variables under help config', async () => {
    const terminal = fakeTerminal([]);

    expect(await run(['help', 'config'], terminal)).toBe(0);
    expect(terminal.lines[1]).toContain('INTERVIEW_STORAGE_BACKEND');
    expect(await run(['help', 'nothing'], terminal)).toBe(1);
  });
});

/**
 * Tests for loading script documents from disk.
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConfigurationError } from '../errors.js';
import { evaluateCondition, evaluateValue } from '../logic/condition.js';
import { Logger } from '../utils/logger.js';
import { loadScript, loadScripts, readScriptFile } from './loader.js';

const FIXTURES = fileURLToPath(new URL('../../test-fixtures/scripts/', import.meta.url));
const REGISTRATION = path.join(FIXTURES, 'registration.yml');

function silenceStderr() {
  return vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
}

function logEntries(spy: ReturnType<typeof silenceStderr>): unknown[] {
  return spy.mock.calls.map((call): unknown => JSON.parse(String(call[0])));
}

describe('loadScript', () => {
  let stderr: ReturnType<typeof silenceStderr>;

  beforeEach(() => {
    stderr = silenceStderr();
  });

  afterEach(() => {
    stderr.mockRestore();
  });

  it('should load interviews including files by relative path', async () => {
    const interviews = await loadScript(REGISTRATION);

    expect(interviews.map((interview) => interview.id)).toEqual(['registration', 'survey']);
    const [registration, survey] = interviews;
    expect([...(registration?.questions.keys() ?? [])]).toEqual([
      'name',
      'preferred-name',
      'email',
      'birth-date',
    ]);
    expect([...(survey?.questions.keys() ?? [])]).toEqual(['rating']);
    expect(survey?.questions.get('rating')?.fields[0]?.field).toEqual({
      type: 'number',
      optional: false,
      integer: true,
      min: 1,
      max: 5,
    });
  });

  it('should turn YAML dates into calendar date text', async () => {
    const [registration] = await loadScript(REGISTRATION);
    const field = registration?.questions.get('birth-date')?.fields[0]?.field;
    expect(field?.type === 'date' && field.min).toBe('1900-01-01');
  });

  it('should compile step expressions and conditions', async () => {
    const [registration] = await loadScript(REGISTRATION);
    const steps = registration?.steps ?? [];
    expect(steps.map((step) => step.type)).toEqual(['ensure', 'ask', 'set', 'set', 'exit']);

    const displayName = steps[2];
    const scope = { use_preferred_name: null, registration: { first_name: 'Ada' } };
    expect(displayName?.type === 'set' && evaluateValue(displayName.value, scope)).toBe('Ada');

    const exit = steps[4];
    expect(exit !== undefined && evaluateCondition(exit.when, { context: { closed: true } })).toBe(
      true
    );
    expect(exit !== undefined && evaluateCondition(exit.when, { context: {} })).toBe(false);
  });

  it('should log warnings for unsatisfied references', async () => {
    const warningsPath = path.join(FIXTURES, 'warnings.yml');
    await loadScript(warningsPath);

    expect(logEntries(stderr)).toEqual([
      expect.objectContaining({
        level: 'warn',
        event: 'script_warning',
        data: {
          location: `${warningsPath}#interviews[0].steps[0]`,
          message: 'Ask step names unknown question "missing-question"',
        },
      }),
      expect.objectContaining({
        level: 'warn',
        event: 'script_warning',
        data: {
          location: `${warningsPath}#interviews[0].steps[1]`,
          message: 'No question provides "phone"',
        },
      }),
    ]);
  });

  it('should warn about the included interview at its own index', async () => {
    await loadScript(REGISTRATION);

    expect(logEntries(stderr)).toEqual([
      expect.objectContaining({
        event: 'script_warning',
        data: {
          location: `${REGISTRATION}#interviews[1].steps[1]`,
          message: 'Ask step names unknown question "comments"',
        },
      }),
    ]);
  });

  it('should log the loaded ids in debug mode', async () => {
    const logger = new Logger({ component: 'ScriptLoader', debugMode: true });
    const warningsPath = path.join(FIXTURES, 'warnings.yml');
    await loadScript(warningsPath, { logger });

    expect(logEntries(stderr)).toContainEqual(
      expect.objectContaining({
        level: 'debug',
        event: 'script_loaded',
        data: { path: warningsPath, interviews: ['incomplete'] },
      })
    );
  });

  it('should load the bundled example without warnings', async () => {
    const example = fileURLToPath(new URL('../../examples/interviews.yml', import.meta.url));
    const interviews = await loadScript(example);

    expect(interviews.map((interview) => interview.id)).toEqual(['meetup']);
    expect(stderr).not.toHaveBeenCalled();
  });

  it('should report malformed steps with their location', async () => {
    const invalidPath = path.join(FIXTURES, 'invalid.yml');
    await expect(loadScript(invalidPath)).rejects.toThrow(
      `${invalidPath}#interviews[0].steps[0]: A step needs exactly one of "ask", "set", "exit", "ensure"`
    );
  });
});

describe('readScriptFile', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(path.join(tmpdir(), 'script-loader-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('should reject unknown extensions', async () => {
    await expect(readScriptFile(path.join(directory, 'script.txt'))).rejects.toThrow(
      'Unsupported script extension ".txt"; use .yml, .yaml, .json or .toml'
    );
  });

  it('should reject missing files', async () => {
    const missing = path.join(directory, 'missing.yml');
    await expect(readScriptFile(missing)).rejects.toThrow(`${missing}: Script file not found`);
  });

  it('should wrap parse errors', async () => {
    const broken = path.join(directory, 'broken.json');
    await writeFile(broken, '{ "interviews": [');

    const error: unknown = await readScriptFile(broken).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(ConfigurationError);
    if (error instanceof ConfigurationError) {
      expect(error.location).toBe(broken);
      expect(error.message.startsWith(`${broken}: Invalid JSON: `)).toBe(true);
      expect(error.cause).toBeInstanceOf(SyntaxError);
    }
  });

  it('should parse TOML documents', async () => {
    const tomlPath = path.join(directory, 'script.toml');
    await writeFile(tomlPath, '[[interviews]]\nid = "t"\nsteps = []\n');
    await expect(readScriptFile(tomlPath)).resolves.toEqual({
      interviews: [{ id: 't', steps: [] }],
    });
  });

  it('should reject documents whose interviews are not a list', async () => {
    const scriptPath = path.join(directory, 'script.yml');
    await writeFile(scriptPath, 'interviews: 3\n');
    await expect(loadScript(scriptPath)).rejects.toThrow(
      `${scriptPath}#interviews: "interviews" must be a list`
    );
  });
});

describe('loadScripts', () => {
  let stderr: ReturnType<typeof silenceStderr>;

  beforeEach(() => {
    stderr = silenceStderr();
  });

  afterEach(() => {
    stderr.mockRestore();
  });

  it('should merge documents into one registry', async () => {
    const registry = await loadScripts([path.join(FIXTURES, 'warnings.yml'), REGISTRATION]);
    expect([...registry.keys()]).toEqual(['incomplete', 'registration', 'survey']);
  });

  it('should reject an interview id defined twice', async () => {
    await expect(loadScripts([REGISTRATION, REGISTRATION])).rejects.toThrow(
      `${REGISTRATION}: Duplicate interview id "registration"`
    );
  });
});

import { describe, expect, it, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { ConfigParseError, ConfigValidationError, DEFAULT_CONFIG } from './index.js';
import { loadConfig, resolveConfigPath } from './load.js';

describe('loadConfig', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'config-load-test-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('should use defaults when interview.toml is absent', async () => {
    const loaded = await loadConfig({ cwd: tempDir, env: {} });
    expect(loaded).toEqual({ config: DEFAULT_CONFIG, source: null, baseDirectory: tempDir });
  });

  it('should read interview.toml from the working directory', async () => {
    await writeFile(join(tempDir, 'interview.toml'), '[logging]\ndebug = true\n');
    const loaded = await loadConfig({ cwd: tempDir, env: {} });
    expect(loaded.config.logging.debug).toBe(true);
    expect(loaded.source).toBe(join(tempDir, 'interview.toml'));
  });

  it('should anchor relative paths at the configuration file', async () => {
    await writeFile(join(tempDir, 'custom.toml'), '[scripts]\npaths = ["scripts/a.yml"]\n');
    const loaded = await loadConfig({ configPath: join(tempDir, 'custom.toml'), env: {} });
    const [first = ''] = loaded.config.scripts.paths;
    expect(resolveConfigPath(loaded, first)).toBe(join(tempDir, 'scripts', 'a.yml'));
  });

  it('should fail when an explicit file is missing', async () => {
    await expect(loadConfig({ configPath: join(tempDir, 'absent.toml'), env: {} })).rejects.toThrow(
      ConfigParseError
    );
  });

  it('should apply and validate environment overrides', async () => {
    const loaded = await loadConfig({ cwd: tempDir, env: { INTERVIEW_EVALUATION_CACHE_SIZE: '8' } });
    expect(loaded.config.evaluation.cache_size).toBe(8);

    await expect(
      loadConfig({ cwd: tempDir, env: { INTERVIEW_EVALUATION_CACHE_SIZE: '0' } })
    ).rejects.toBeInstanceOf(ConfigValidationError);
  });
});

import { describe, test, expect, vi, beforeEach } from 'vitest';
import { DEFAULT_CONFIG, loadConfig, mergeConfig } from './config.js';

vi.mock('node:fs/promises', () => ({
  default: {
    readFile: vi.fn(),
    writeFile: vi.fn(),
  },
}));

import fs from 'node:fs/promises';

const mockedReadFile = vi.mocked(fs.readFile);

beforeEach(() => {
  vi.clearAllMocks();
});

describe('loadConfig', () => {
  test('given ENOENT, should return default config', async () => {
    const err = new Error('ENOENT') as NodeJS.ErrnoException;
    err.code = 'ENOENT';
    mockedReadFile.mockRejectedValue(err);

    const config = await loadConfig('/tmp/project');

    expect(config).toEqual({
      manifest: 'modules/manifest.yaml',
      contentDir: 'modules',
      contentExtension: '.md',
      separator: '\n\n',
      composeTolerance: 0.1,
      sessionsDir: '.rcomp/sessions',
    });
    expect(mockedReadFile).toHaveBeenCalledWith('/tmp/project/.rcomp/config.yaml', 'utf-8');
  });

  test('given valid YAML, should merge with defaults', async () => {
    mockedReadFile.mockResolvedValue(`
manifest: review/modules.json
defaultBudget: 12000
`);

    const config = await loadConfig('/tmp/project');

    expect(config.manifest).toBe('review/modules.json');
    expect(config.defaultBudget).toBe(12000);
    expect(config.contentDir).toBe('modules');
  });

  test('given an empty file, should return defaults', async () => {
    mockedReadFile.mockResolvedValue('');

    expect(await loadConfig('/tmp/project')).toEqual(DEFAULT_CONFIG);
  });

  test('given non-ENOENT error, should throw', async () => {
    const err = new Error('EACCES') as NodeJS.ErrnoException;
    err.code = 'EACCES';
    mockedReadFile.mockRejectedValue(err);

    await expect(loadConfig('/tmp/project')).rejects.toThrow('EACCES');
  });
});

describe('mergeConfig', () => {
  test('given an unknown key, should throw INVALID_CONFIG', () => {
    expect(() => mergeConfig(DEFAULT_CONFIG, { budget: 10 })).toThrow('Invalid config: unknown key "budget"');
  });

  test('given a negative tolerance, should throw', () => {
    expect(() => mergeConfig(DEFAULT_CONFIG, { composeTolerance: -0.5 })).toThrow(
      'Invalid config: "composeTolerance" must be a non-negative number',
    );
  });

  test('given a list at the top level, should throw', () => {
    expect(() => mergeConfig(DEFAULT_CONFIG, ['manifest'])).toThrow(
      'Invalid config: expected a mapping at the top level',
    );
  });

  test('given overrides, should not mutate the defaults', () => {
    mergeConfig(DEFAULT_CONFIG, { separator: '\n---\n' });

    expect(DEFAULT_CONFIG.separator).toBe('\n\n');
  });
});

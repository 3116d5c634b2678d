import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { composeCommand } from './compose.js';
import { resolveCommand } from './resolve.js';
import { initCommand } from './init.js';
import { getProjectRoot } from '../core/project.js';
import { output } from '../lib/output.js';
import { ContentNotFoundError, InvalidPlanError, RcompError } from '../lib/errors.js';
import { starterContent } from '../bundled/starter.js';

vi.mock('../core/project.js', () => ({
  getProjectRoot: vi.fn(),
}));

vi.mock('../lib/output.js', async () => {
  const actual = await vi.importActual<typeof import('../lib/output.js')>('../lib/output.js');
  return {
    ...actual,
    output: vi.fn(),
    success: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
  };
});

const mockedGetProjectRoot = vi.mocked(getProjectRoot);
const mockedOutput = vi.mocked(output);

let TMP_ROOT: string;
let PLAN_PATH: string;

beforeEach(async () => {
  vi.clearAllMocks();
  TMP_ROOT = await fs.mkdtemp(path.join(os.tmpdir(), 'rcomp-compose-test-'));
  PLAN_PATH = path.join(TMP_ROOT, 'plan.json');
  mockedGetProjectRoot.mockResolvedValue(TMP_ROOT);
  vi.spyOn(console, 'log').mockImplementation(() => {});
  await initCommand({ json: true });
  await resolveCommand({ explicit: ['injection'], output: PLAN_PATH, json: true });
  vi.clearAllMocks();
});

afterEach(async () => {
  vi.restoreAllMocks();
  await fs.rm(TMP_ROOT, { recursive: true, force: true });
});

describe('composeCommand', () => {
  test('given a plan and an output file, should write content in plan order', async () => {
    const artifactPath = path.join(TMP_ROOT, 'prompt.md');

    await composeCommand({ plan: PLAN_PATH, output: artifactPath });

    const artifact = await fs.readFile(artifactPath, 'utf-8');
    expect(artifact).toBe(`${starterContent['review-core']}\n\n${starterContent['injection']}`);
  });

  test('given --json without an output file, should include the artifact', async () => {
    await composeCommand({ plan: PLAN_PATH, json: true });

    expect(mockedOutput).toHaveBeenCalledTimes(1);
    const [data, json] = mockedOutput.mock.calls[0];
    expect(json).toBe(true);
    expect(data).toMatchObject({
      declaredTokens: 2700,
      warnings: [],
      artifact: `${starterContent['review-core']}\n\n${starterContent['injection']}`,
    });
  });

  test('given a module without content, should throw ContentNotFoundError', async () => {
    await fs.rm(path.join(TMP_ROOT, 'modules', 'injection.md'));

    await expect(composeCommand({ plan: PLAN_PATH })).rejects.toThrow(ContentNotFoundError);
  });

  test('given a plan listing a module before its dependency, should throw InvalidPlanError', async () => {
    await fs.writeFile(PLAN_PATH, JSON.stringify({ orderedModules: ['injection', 'review-core'] }));

    await expect(composeCommand({ plan: PLAN_PATH })).rejects.toThrow(
      'Invalid plan: injection appears before its dependency review-core',
    );
    await expect(composeCommand({ plan: PLAN_PATH })).rejects.toThrow(InvalidPlanError);
  });

  test('given a plan file that is not JSON, should throw InvalidPlanError naming it', async () => {
    await fs.writeFile(PLAN_PATH, '{ not json');

    await expect(composeCommand({ plan: PLAN_PATH })).rejects.toThrow(
      `Invalid plan: not valid JSON: ${PLAN_PATH}`,
    );
    await expect(composeCommand({ plan: PLAN_PATH })).rejects.toThrow(InvalidPlanError);
  });

  test('given a missing plan file, should throw', async () => {
    await expect(composeCommand({ plan: path.join(TMP_ROOT, 'nope.json') })).rejects.toThrow(RcompError);
  });
});

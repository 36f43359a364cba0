import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { loadRunConfig, validateRunConfig } from '../src/config/run-config.js';
import { ConfigurationError } from '../src/errors/index.js';

function validRaw(): Record<string, unknown> {
  return {
    container: 'exports',
    tempDirectory: './tmp',
    jobs: [{ name: 'daily-sales', blobPath: 'sales/%Y/%m/%d', files: ['./out/sales.csv'] }],
  };
}

function parameterOf(run: () => unknown): string | undefined {
  try {
    run();
  } catch (error: unknown) {
    if (error instanceof ConfigurationError) {
      return error.parameter;
    }
    throw error;
  }
  return undefined;
}

describe('validateRunConfig', () => {
  const baseDir = path.resolve('/work');

  it('resolves relative paths against the base directory', () => {
    const config = validateRunConfig(validRaw(), baseDir);

    expect(config).toEqual({
      container: 'exports',
      tempDirectory: path.join(baseDir, 'tmp'),
      completeMarker: 'root',
      jobs: [
        {
          name: 'daily-sales',
          blobPath: 'sales/%Y/%m/%d',
          files: [path.join(baseDir, 'out', 'sales.csv')],
        },
      ],
    });
  });

  it('keeps an explicit per-path marker placement', () => {
    const config = validateRunConfig({ ...validRaw(), completeMarker: 'per-path' }, baseDir);

    expect(config.completeMarker).toBe('per-path');
  });

  it('names the missing jobs field', () => {
    const raw = validRaw();
    delete raw['jobs'];

    expect(parameterOf(() => validateRunConfig(raw, baseDir))).toBe('jobs');
  });

  it('names the dotted path of an invalid nested field', () => {
    const raw = {
      ...validRaw(),
      jobs: [{ name: 'daily-sales', blobPath: 'sales', files: [] }],
    };

    expect(parameterOf(() => validateRunConfig(raw, baseDir))).toBe('jobs.0.files');
  });

  it('rejects an unknown marker placement', () => {
    expect(
      parameterOf(() => validateRunConfig({ ...validRaw(), completeMarker: 'everywhere' }, baseDir)),
    ).toBe('completeMarker');
  });

  it('rejects input that is not an object', () => {
    expect(parameterOf(() => validateRunConfig('exports', baseDir))).toBe('runConfig');
  });
});

describe('loadRunConfig', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'run-config-test-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('loads a file and resolves paths against its directory', async () => {
    const filePath = path.join(tmpDir, 'run.json');
    await fs.writeFile(filePath, JSON.stringify(validRaw()));

    const config = await loadRunConfig(filePath);

    expect(config.tempDirectory).toBe(path.join(tmpDir, 'tmp'));
    expect(config.jobs[0]?.files).toEqual([path.join(tmpDir, 'out', 'sales.csv')]);
  });

  it('throws ConfigurationError for a missing file', async () => {
    await expect(loadRunConfig(path.join(tmpDir, 'absent.json'))).rejects.toMatchObject({
      name: 'ConfigurationError',
      parameter: 'runConfig',
    });
  });

  it('throws ConfigurationError for a file that is not JSON', async () => {
    const filePath = path.join(tmpDir, 'run.json');
    await fs.writeFile(filePath, '{ not json');

    await expect(loadRunConfig(filePath)).rejects.toMatchObject({
      name: 'ConfigurationError',
      parameter: 'runConfig',
    });
  });
});

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { join, resolve } from 'node:path';
import { homedir } from 'node:os';

vi.mock('../../src/util/fs.js', () => ({
  exists: vi.fn(),
}));

vi.mock('node:fs/promises', () => ({
  readFile: vi.fn(),
}));

import { readFile } from 'node:fs/promises';
import { exists } from '../../src/util/fs.js';
import { ConfigLoadError, applyOverrides, expandEnv, loadConfig } from '../../src/config/loader.js';
import { makeConfigInput, makeRuntimeConfig } from '../helpers/fixtures.js';

const mockExists = vi.mocked(exists);
const mockReadFile = vi.mocked(readFile);

function setupFs(config: object) {
  mockExists.mockResolvedValue(true);
  mockReadFile.mockResolvedValue(JSON.stringify(config));
}

describe('loadConfig', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should load a valid config and apply defaults', async () => {
    setupFs(makeConfigInput());

    const config = await loadConfig('/abs/cluster-relay.config.json');

    expect(config.stateDir).toBe('/abs/state');
    expect(config.run.mode).toBe('skip');
    expect(config.feed.sources).toEqual(['*']);
    expect(config.spatial.port).toBe(5432);
    expect(config.reporting.headerKeyword).toBe('CLUSTER_RELAY');
    expect(config.catalog['7170']?.idColumn).toBe('id');
  });

  it('should return a frozen config', async () => {
    setupFs(makeConfigInput());

    const config = await loadConfig('/abs/cluster-relay.config.json');

    expect(Object.isFrozen(config)).toBe(true);
  });

  it('should default stateDir to ~/.cluster-relay/<projectName>', async () => {
    const input = makeConfigInput();
    setupFs({ ...input, stateDir: undefined });

    const config = await loadConfig('/abs/cluster-relay.config.json');

    expect(config.stateDir).toBe(join(homedir(), '.cluster-relay', 'test-project'));
  });

  it('should resolve a relative stateDir against the working directory', async () => {
    setupFs(makeConfigInput({ stateDir: 'state' }));

    const config = await loadConfig('/abs/cluster-relay.config.json');

    expect(config.stateDir).toBe(resolve(process.cwd(), 'state'));
  });

  it('should throw when the file does not exist', async () => {
    mockExists.mockResolvedValue(false);

    await expect(loadConfig('/abs/missing.json')).rejects.toThrow('Config file not found: /abs/missing.json');
  });

  it('should throw on invalid JSON', async () => {
    mockExists.mockResolvedValue(true);
    mockReadFile.mockResolvedValue('{ nope');

    await expect(loadConfig('/abs/cluster-relay.config.json')).rejects.toThrow('Failed to parse config file');
  });

  it('should list every schema issue', async () => {
    setupFs(makeConfigInput({ projectName: 'Bad Name', feed: { countries: [], items: [7170] } }));

    const err = await loadConfig('/abs/cluster-relay.config.json').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ConfigLoadError);
    expect(err instanceof Error && err.message).toContain('  - projectName:');
    expect(err instanceof Error && err.message).toContain('  - feed.countries:');
  });

  it('should reject feed items absent from the catalog', async () => {
    setupFs(makeConfigInput({ feed: { countries: ['france'], items: [7170, 8010] } }));

    await expect(loadConfig('/abs/cluster-relay.config.json')).rejects.toThrow(
      'feed.items reference items absent from the catalog: 8010',
    );
  });

  it('should reject both territorial filters at once', async () => {
    setupFs(makeConfigInput({ run: { departments: ['38'], regions: ['84'] } }));

    await expect(loadConfig('/abs/cluster-relay.config.json')).rejects.toThrow(
      'departments and regions filters are mutually exclusive',
    );
  });

  it('should expand environment variables in credentials', async () => {
    vi.stubEnv('RELAY_TEST_PASSWORD', 'test-secret-from-env');
    const input = makeConfigInput();
    setupFs({ ...input, reporting: { ...input.reporting, password: '${RELAY_TEST_PASSWORD}' } });

    const config = await loadConfig('/abs/cluster-relay.config.json');

    expect(config.reporting.password).toBe('test-secret-from-env');
    vi.unstubAllEnvs();
  });
});

describe('expandEnv', () => {
  it('should replace placeholders in nested strings', () => {
    expect(expandEnv({ a: ['x-${USER_NAME}'], b: { c: '${USER_NAME}' }, d: 3 }, { USER_NAME: 'relay' })).toEqual({
      a: ['x-relay'],
      b: { c: 'relay' },
      d: 3,
    });
  });

  it('should name the referencing path of an unset variable', () => {
    expect(() => expandEnv({ spatial: { password: '${MISSING_VAR}' } }, {})).toThrow(
      'Environment variable MISSING_VAR is not set (referenced by spatial.password)',
    );
  });
});

describe('applyOverrides', () => {
  const base = makeRuntimeConfig({ run: { departments: ['38'] } });

  it('should override the report mode', () => {
    expect(applyOverrides(base, { mode: 'dry-run' }).run.mode).toBe('dry-run');
    expect(base.run.mode).toBe('skip');
  });

  it('should replace the feed items', () => {
    const config = makeRuntimeConfig({
      catalog: {
        '7170': makeConfigInput().catalog['7170'],
        '8010': { ...makeConfigInput().catalog['7170'], name: 'Road' },
      },
    });

    expect(applyOverrides(config, { items: [8010] }).feed.items).toEqual([8010]);
  });

  it('should reject unknown items', () => {
    expect(() => applyOverrides(base, { items: [9999] })).toThrow('Unknown item(s): 9999');
  });

  it('should replace the department filter with a region filter', () => {
    const result = applyOverrides(base, { regions: ['84'] });

    expect(result.run.regions).toEqual(['84']);
    expect(result.run.departments).toBeUndefined();
  });

  it('should reject departments and regions together', () => {
    expect(() => applyOverrides(base, { departments: ['38'], regions: ['84'] })).toThrow(ConfigLoadError);
  });

  it('should set the date window', () => {
    const result = applyOverrides(base, { startDate: '2024-01-01', endDate: '2024-02-01' });

    expect(result.run.startDate).toBe('2024-01-01');
    expect(result.run.endDate).toBe('2024-02-01');
  });

  it('should leave the config unchanged without overrides', () => {
    expect(applyOverrides(base, {})).toEqual(base);
  });
});

import { beforeAll, describe, expect, it } from 'vitest';
import { loadProject } from '../src/lib/loader.js';
import { buildModel, flattenConfig, type ProjectModel } from '../src/lib/model.js';
import { fromPlain } from '../src/lib/tree.js';
import { FIXTURE_FILE } from './helpers.js';

describe('ProjectModel', () => {
  let model: ProjectModel;

  beforeAll(async () => {
    const result = await loadProject(FIXTURE_FILE);
    if (result.status !== 'loaded') throw new Error(`fixture did not load: ${result.status}`);
    model = result.model;
  });

  it('lists collections in merged order', () => {
    expect([...model.schedules()].map((s) => s.name)).toEqual([
      'test-meltano-yml',
      'test-subconfig-1-yml',
      'test-subconfig-3-yml',
    ]);
    expect([...model.jobs()].map((j) => j.name)).toEqual(['my-job', 'subconfig-2-job']);
    expect([...model.environments()].map((e) => e.name)).toEqual([
      'test-meltano-environment',
      'test-subconfig-1-environment',
    ]);
    expect([...model.plugins('extractors')].map((p) => p.name)).toEqual([
      'tap-meltano-yml',
      'tap-subconfig-1-yml',
      'tap-subconfig-2-yml',
    ]);
    expect([...model.plugins('loaders')].map((p) => p.name)).toEqual(['target-meltano-yml', 'target-subconfig-1-yml']);
    expect([...model.plugins('mappers')].map((p) => p.name)).toEqual(['map-meltano-yml']);
  });

  it('can iterate the same collection more than once', () => {
    const schedules = model.schedules();
    expect([...schedules]).toEqual([...schedules]);
    expect([...schedules]).toHaveLength(3);
  });

  it('looks up schedules and fills the default transform', () => {
    expect(model.scheduleByName('test-meltano-yml')).toMatchObject({
      extractor: 'tap-meltano-yml',
      loader: 'target-meltano-yml',
      transform: 'skip',
      startDate: '2020-08-05T00:00:00Z',
      interval: '@daily',
    });
    expect(model.scheduleByName('test-subconfig-3-yml')?.transform).toBe('run');
    expect(model.scheduleByName('nope')).toBeUndefined();
  });

  it('splits job tasks into plugin chains', () => {
    expect(model.jobByName('my-job')?.tasks).toEqual([['tap-meltano-yml', 'map-meltano-yml', 'target-meltano-yml']]);
    expect(model.jobByName('subconfig-2-job')?.tasks).toEqual([
      ['tap-subconfig-2-yml', 'target-subconfig-1-yml'],
      ['tap-meltano-yml', 'transform-meltano-yml', 'target-meltano-yml'],
    ]);
  });

  it('exposes environments and the default one', () => {
    expect(model.environmentByName('test-meltano-environment')?.env).toEqual({ TEST: 'TEST-MELTANO' });
    expect(model.defaultEnvironmentModel()?.name).toBe('test-meltano-environment');
  });

  it('keeps plugin settings, config and extra keys', () => {
    const tap = model.pluginByKindAndName('extractors', 'tap-meltano-yml');
    expect(tap?.settings).toEqual([
      { name: 'token', description: 'Token for the API. This is a secret.', sensitive: true },
      { name: 'start_date', sensitive: false },
    ]);
    expect(tap?.config).toEqual({ start_date: '2020-01-01' });
    expect(tap?.extras).toEqual({ variant: 'sample' });
    expect(model.pluginByKindAndName('mappers', 'map-meltano-yml')?.mappings).toEqual(['transform-meltano-yml']);
    expect(model.pluginByKindAndName('loaders', 'tap-meltano-yml')).toBeUndefined();
  });

  it('is read-only', () => {
    const schedule = model.scheduleByName('test-meltano-yml');
    expect(Object.isFrozen(model)).toBe(true);
    expect(Object.isFrozen(schedule)).toBe(true);
    expect(Object.isFrozen(model.jobByName('my-job')?.tasks)).toBe(true);
  });
});

describe('buildModel', () => {
  const tree = fromPlain({ version: 1, default_environment: 'dev', environments: [{ name: 'dev' }] });

  it('refuses when the report has errors', () => {
    const result = buildModel(tree, {
      findings: [
        { severity: 'warning', path: 'a', message: 'w' },
        { severity: 'error', path: 'b', message: 'e' },
      ],
    });
    expect(result).toEqual({ status: 'refused', findings: [{ severity: 'error', path: 'b', message: 'e' }] });
  });

  it('builds when only warnings are present', () => {
    const result = buildModel(tree, { findings: [{ severity: 'warning', path: 'a', message: 'w' }] });
    expect(result.status).toBe('built');
    if (result.status !== 'built') return;
    expect(result.model.version).toBe(1);
    expect([...result.model.schedules()]).toEqual([]);
  });
});

describe('flattenConfig', () => {
  it('joins nested keys with dots', () => {
    const config = fromPlain({ api: { token: 'test-secret', retries: 3 }, streams: ['a', 'b'], enabled: true });
    expect(flattenConfig(config)).toEqual({ 'api.token': 'test-secret', 'api.retries': 3, streams: '["a","b"]', enabled: true });
  });
});

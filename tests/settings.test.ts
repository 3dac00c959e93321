import { describe, expect, it } from 'vitest';
import { buildModel, type ProjectModel } from '../src/lib/model.js';
import { resolveSettings, settingEnvVar, SettingsLookupError } from '../src/lib/settings.js';
import { fromPlain } from '../src/lib/tree.js';

function makeModel(): ProjectModel {
  const tree = fromPlain({
    version: 1,
    default_environment: 'dev',
    environments: [
      { name: 'dev', env: { TAP_GITLAB_PROJECT: 'from-environment' } },
      { name: 'prod', env: {} },
    ],
    plugins: {
      extractors: [
        {
          name: 'tap-gitlab',
          settings: [
            { name: 'api.token', sensitive: true },
            { name: 'project' },
            { name: 'start_date' },
            { name: 'page.size' },
            { name: 'password', sensitive: true },
          ],
          config: { start_date: '2021-01-01', page: { size: 50 } },
        },
      ],
    },
  });
  const result = buildModel(tree, { findings: [] });
  if (result.status !== 'built') throw new Error('model was refused');
  return result.model;
}

const env = { TAP_GITLAB_API_TOKEN: 'test-secret', TAP_GITLAB_PROJECT: 'from-process' };

describe('settingEnvVar', () => {
  it('upper-cases and replaces separators', () => {
    expect(settingEnvVar({ name: 'tap-gitlab' }, { name: 'api.token' })).toBe('TAP_GITLAB_API_TOKEN');
    expect(settingEnvVar({ name: 'target.s3' }, { name: 'bucket-name' })).toBe('TARGET_S3_BUCKET_NAME');
  });
});

describe('resolveSettings', () => {
  const model = makeModel();

  it('applies environment overrides, process env, then config', () => {
    expect(resolveSettings(model, 'extractors', 'tap-gitlab', { env, redacted: true })).toEqual([
      {
        name: 'api.token',
        envVar: 'TAP_GITLAB_API_TOKEN',
        value: '(redacted)',
        source: 'env',
        sensitive: true,
        redacted: true,
      },
      {
        name: 'project',
        envVar: 'TAP_GITLAB_PROJECT',
        value: 'from-environment',
        source: 'environment',
        sensitive: false,
        redacted: false,
      },
      {
        name: 'start_date',
        envVar: 'TAP_GITLAB_START_DATE',
        value: '2021-01-01',
        source: 'config',
        sensitive: false,
        redacted: false,
      },
      { name: 'page.size', envVar: 'TAP_GITLAB_PAGE_SIZE', value: 50, source: 'config', sensitive: false, redacted: false },
      { name: 'password', envVar: 'TAP_GITLAB_PASSWORD', value: null, source: 'default', sensitive: true, redacted: false },
    ]);
  });

  it('uses the selected environment', () => {
    const [, project] = resolveSettings(model, 'extractors', 'tap-gitlab', { env, environment: 'prod' });
    expect(project).toMatchObject({ value: 'from-process', source: 'env' });
  });

  it('reveals sensitive values unless redaction is requested', () => {
    const [token] = resolveSettings(model, 'extractors', 'tap-gitlab', { env });
    expect(token).toMatchObject({ value: 'test-secret', redacted: false });
  });

  it('rejects unknown plugins and environments', () => {
    expect(() => resolveSettings(model, 'loaders', 'tap-gitlab', { env })).toThrow(
      new SettingsLookupError("loader 'tap-gitlab' is not declared"),
    );
    expect(() => resolveSettings(model, 'extractors', 'tap-gitlab', { env, environment: 'staging' })).toThrow(
      "environment 'staging' is not declared",
    );
  });
});

import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { resolveCliSettings } from '../src/lib/config.js';
import { CliError } from '../src/types.js';

describe('resolveCliSettings', () => {
  it('falls back to defaults', () => {
    expect(resolveCliSettings({}, {})).toEqual({
      file: path.resolve('pipedef.yml'),
      json: false,
      verbose: false,
      strict: false,
      readTimeoutMs: 10_000,
    });
  });

  it('reads PIPEDEF_* variables', () => {
    const settings = resolveCliSettings(
      {},
      { PIPEDEF_FILE: 'conf/project.yml', PIPEDEF_STRICT: 'true', PIPEDEF_DEBUG: '1', PIPEDEF_READ_TIMEOUT_MS: '2500' },
    );
    expect(settings).toEqual({
      file: path.resolve('conf/project.yml'),
      json: false,
      verbose: true,
      strict: true,
      readTimeoutMs: 2500,
    });
  });

  it('prefers flags over the environment', () => {
    const settings = resolveCliSettings({ file: 'other.yml', json: true }, { PIPEDEF_FILE: 'conf/project.yml', PIPEDEF_STRICT: 'no' });
    expect(settings.file).toBe(path.resolve('other.yml'));
    expect(settings.json).toBe(true);
    expect(settings.strict).toBe(false);
  });

  it('rejects a bad read timeout with exit code 2', () => {
    expect(() => resolveCliSettings({}, { PIPEDEF_READ_TIMEOUT_MS: 'soon' })).toThrow(CliError);
    try {
      resolveCliSettings({}, { PIPEDEF_READ_TIMEOUT_MS: '-5' });
    } catch (err) {
      expect(err).toBeInstanceOf(CliError);
      expect(err).toHaveProperty('exitCode', 2);
      return;
    }
    throw new Error('expected a CliError');
  });
});

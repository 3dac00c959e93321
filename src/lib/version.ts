import { existsSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import pkg from '../../package.json' with { type: 'json' };

function pad2(num: number): string {
  return String(num).padStart(2, '0');
}

function formatTimestampUtc(date: Date): string {
  return [
    date.getUTCFullYear(),
    pad2(date.getUTCMonth() + 1),
    pad2(date.getUTCDate()),
    'T',
    pad2(date.getUTCHours()),
    pad2(date.getUTCMinutes()),
    pad2(date.getUTCSeconds()),
  ].join('');
}

function hasGitDir(): boolean {
  return existsSync(fileURLToPath(new URL('../../.git', import.meta.url)));
}

export type VersionMode = 'auto' | 'release' | 'dev';

/**
 * Release builds report `v<version>`; a working tree (a `.git` directory next
 * to the package) reports `v<version>-dev+<utc stamp>`.
 */
export function getCliVersion(mode: VersionMode = 'auto', now = new Date()): string {
  const envMode = (process.env.PIPEDEF_VERSION_MODE || '').toLowerCase();
  const effectiveMode: VersionMode = envMode === 'release' || envMode === 'dev' || envMode === 'auto' ? envMode : mode;

  if (effectiveMode === 'release' || (effectiveMode === 'auto' && !hasGitDir())) {
    return `v${pkg.version}`;
  }
  return `v${pkg.version}-dev+${formatTimestampUtc(now)}`;
}

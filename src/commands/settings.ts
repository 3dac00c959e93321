import { Command } from 'commander';
import { CliError } from '../types.js';
import { emitJson, logStdout } from '../lib/io.js';
import { resolveSettings, SettingsLookupError, type ResolvedSetting } from '../lib/settings.js';
import { renderTable } from '../lib/table.js';
import { PLUGIN_KINDS, isPluginKind, type PluginKind } from '../lib/validator.js';
import { loadModelForCli, settingsFor } from './common.js';

/** Accepts `extractor` as well as `extractors`. */
export function normalizeKind(raw: string): PluginKind | undefined {
  const lower = raw.toLowerCase();
  if (isPluginKind(lower)) return lower;
  const plural = `${lower}s`;
  return isPluginKind(plural) ? plural : undefined;
}

function renderValue(setting: ResolvedSetting): string {
  return setting.value === null ? '' : String(setting.value);
}

export function createSettingsCommand() {
  const cmd = new Command('settings');
  cmd
    .description('Show the settings of one plugin with their environment variables and effective values')
    .argument('<kind>', `Plugin kind: ${PLUGIN_KINDS.join(', ')}`)
    .argument('<name>', 'Plugin name')
    .option('--environment <name>', 'Environment whose overrides apply (default: default_environment)')
    .option('--reveal', 'Print sensitive values instead of redacting them')
    .action(async (rawKind: string, name: string, options: { environment?: string; reveal?: boolean }, command: Command) => {
      const kind = normalizeKind(rawKind);
      if (!kind) {
        throw new CliError(`Unknown plugin kind: ${rawKind}. Valid kinds: ${PLUGIN_KINDS.join(', ')}`, 2);
      }
      const settings = settingsFor(command);
      const model = await loadModelForCli(settings);

      let resolved: ResolvedSetting[];
      try {
        resolved = resolveSettings(model, kind, name, {
          environment: options.environment,
          redacted: !options.reveal,
        });
      } catch (err) {
        if (err instanceof SettingsLookupError) throw new CliError(err.message, 2);
        throw err;
      }

      if (settings.json) {
        emitJson(resolved);
        return;
      }
      if (resolved.length === 0) {
        logStdout(`${name} declares no settings.`);
        return;
      }
      logStdout(
        renderTable({
          columns: [
            { key: 'name', header: 'Setting', maxWidth: 40 },
            { key: 'envVar', header: 'Env var', maxWidth: 60 },
            { key: 'value', header: 'Value', maxWidth: 60 },
            { key: 'source', header: 'Source' },
          ],
          rows: resolved.map((s) => ({ name: s.name, envVar: s.envVar, value: renderValue(s), source: s.source })),
        }),
      );
    });

  return cmd;
}

import type { Plugin, PluginSetting, ProjectModel } from './model.js';
import { REDACTED_VALUE } from './redact.js';
import { PLUGIN_KIND_LABELS, type PluginKind } from './validator.js';
import type { ScalarValue } from './tree.js';

export type SettingSource = 'environment' | 'env' | 'config' | 'default';

export type ResolvedSetting = {
  name: string;
  envVar: string;
  value: ScalarValue;
  source: SettingSource;
  sensitive: boolean;
  redacted: boolean;
};

export type ResolveSettingsOptions = {
  /** Environment whose `env` overrides apply; defaults to the project default. */
  environment?: string;
  env?: Readonly<Record<string, string | undefined>>;
  redacted?: boolean;
};

function envToken(value: string): string {
  return value.toUpperCase().replace(/[^A-Z0-9]/g, '_');
}

/** `tap-gitlab` + `api.token` -> `TAP_GITLAB_API_TOKEN`. */
export function settingEnvVar(plugin: Pick<Plugin, 'name'>, setting: Pick<PluginSetting, 'name'>): string {
  return `${envToken(plugin.name)}_${envToken(setting.name)}`;
}

export class SettingsLookupError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SettingsLookupError';
  }
}

/**
 * Effective value of every declared setting of one plugin.
 *
 * Lookup order: the selected environment's `env` overrides, the process
 * environment, the plugin's `config`, then nothing.
 */
export function resolveSettings(
  model: ProjectModel,
  kind: PluginKind,
  name: string,
  options: ResolveSettingsOptions = {},
): ResolvedSetting[] {
  const plugin = model.pluginByKindAndName(kind, name);
  if (!plugin) throw new SettingsLookupError(`${PLUGIN_KIND_LABELS[kind]} '${name}' is not declared`);

  const environmentName = options.environment ?? model.defaultEnvironment;
  const environment = model.environmentByName(environmentName);
  if (!environment) throw new SettingsLookupError(`environment '${environmentName}' is not declared`);

  const processEnv = options.env ?? process.env;

  return plugin.settings.map((setting) => {
    const envVar = settingEnvVar(plugin, setting);
    let value: ScalarValue = null;
    let source: SettingSource = 'default';

    const override = environment.env[envVar];
    const fromProcess = processEnv[envVar];
    if (override !== undefined) {
      value = override;
      source = 'environment';
    } else if (fromProcess !== undefined) {
      value = fromProcess;
      source = 'env';
    } else if (Object.prototype.hasOwnProperty.call(plugin.config, setting.name)) {
      value = plugin.config[setting.name];
      source = 'config';
    }

    const redacted = Boolean(options.redacted && setting.sensitive && value !== null && value !== '');
    return {
      name: setting.name,
      envVar,
      value: redacted ? REDACTED_VALUE : value,
      source,
      sensitive: setting.sensitive,
      redacted,
    };
  });
}

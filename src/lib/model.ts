import {
  hasErrors,
  taskTokens,
  type PluginKind,
  type ValidationFinding,
  type ValidationReport,
} from './validator.js';
import { PLUGINS_KEY } from './merge.js';
import {
  getEntry,
  getSequence,
  getString,
  setOwn,
  toPlain,
  type PlainValue,
  type ScalarValue,
  type TreeNode,
} from './tree.js';

export type Transform = 'run' | 'skip' | 'only';

export type Schedule = {
  readonly name: string;
  readonly extractor: string;
  readonly loader: string;
  readonly transform: Transform;
  readonly startDate?: string;
  readonly interval: string;
  readonly source?: string;
};

export type Job = {
  readonly name: string;
  /** One chain per task; each chain lists plugin tokens in invocation order. */
  readonly tasks: readonly (readonly string[])[];
  readonly source?: string;
};

export type Environment = {
  readonly name: string;
  readonly env: Readonly<Record<string, string>>;
  readonly source?: string;
};

export type PluginSetting = {
  readonly name: string;
  readonly description?: string;
  readonly sensitive: boolean;
};

export type Plugin = {
  readonly kind: PluginKind;
  readonly name: string;
  readonly settings: readonly PluginSetting[];
  /** Named sub-transforms; only mappers declare any. */
  readonly mappings: readonly string[];
  /** `config` flattened to dotted keys, e.g. `api.token`. */
  readonly config: Readonly<Record<string, ScalarValue>>;
  /** Remaining keys such as `variant` or `pip_url`, as plain values. */
  readonly extras: Readonly<Record<string, PlainValue>>;
  readonly source?: string;
};

export type ProjectData = {
  version: number;
  defaultEnvironment: string;
  databaseUri?: string;
  includePaths: readonly string[];
  schedules: readonly Schedule[];
  jobs: readonly Job[];
  environments: readonly Environment[];
  plugins: Readonly<Record<PluginKind, readonly Plugin[]>>;
};

export type BuildResult =
  | { status: 'built'; model: ProjectModel }
  | { status: 'refused'; findings: ValidationFinding[] };

function iterate<T>(items: readonly T[]): Iterable<T> {
  return {
    *[Symbol.iterator]() {
      yield* items;
    },
  };
}

function indexByName<T extends { name: string }>(items: readonly T[]): ReadonlyMap<string, T> {
  return new Map(items.map((item) => [item.name, item]));
}

/** Read-only view over a validated project. Built once per load. */
export class ProjectModel {
  readonly version: number;
  readonly defaultEnvironment: string;
  readonly databaseUri?: string;
  readonly includePaths: readonly string[];

  private readonly data: ProjectData;
  private readonly schedulesByName: ReadonlyMap<string, Schedule>;
  private readonly jobsByName: ReadonlyMap<string, Job>;
  private readonly environmentsByName: ReadonlyMap<string, Environment>;
  private readonly pluginsByKind: Readonly<Record<PluginKind, ReadonlyMap<string, Plugin>>>;

  constructor(data: ProjectData) {
    this.data = data;
    this.version = data.version;
    this.defaultEnvironment = data.defaultEnvironment;
    this.databaseUri = data.databaseUri;
    this.includePaths = data.includePaths;
    this.schedulesByName = indexByName(data.schedules);
    this.jobsByName = indexByName(data.jobs);
    this.environmentsByName = indexByName(data.environments);
    this.pluginsByKind = {
      extractors: indexByName(data.plugins.extractors),
      loaders: indexByName(data.plugins.loaders),
      mappers: indexByName(data.plugins.mappers),
    };
    Object.freeze(this);
  }

  scheduleByName(name: string): Schedule | undefined {
    return this.schedulesByName.get(name);
  }

  jobByName(name: string): Job | undefined {
    return this.jobsByName.get(name);
  }

  environmentByName(name: string): Environment | undefined {
    return this.environmentsByName.get(name);
  }

  pluginByKindAndName(kind: PluginKind, name: string): Plugin | undefined {
    return this.pluginsByKind[kind].get(name);
  }

  defaultEnvironmentModel(): Environment | undefined {
    return this.environmentByName(this.defaultEnvironment);
  }

  schedules(): Iterable<Schedule> {
    return iterate(this.data.schedules);
  }

  jobs(): Iterable<Job> {
    return iterate(this.data.jobs);
  }

  environments(): Iterable<Environment> {
    return iterate(this.data.environments);
  }

  plugins(kind: PluginKind): Iterable<Plugin> {
    return iterate(this.data.plugins[kind]);
  }
}

function sourceOf(node: TreeNode): { source?: string } {
  return node.source ? { source: node.source } : {};
}

function toTransform(value: string | undefined): Transform {
  return value === 'skip' || value === 'only' ? value : 'run';
}

function buildSchedule(node: TreeNode): Schedule {
  const startDate = getString(node, 'start_date');
  return Object.freeze({
    name: getString(node, 'name') ?? '',
    extractor: getString(node, 'extractor') ?? '',
    loader: getString(node, 'loader') ?? '',
    transform: toTransform(getString(node, 'transform')),
    ...(startDate !== undefined ? { startDate } : {}),
    interval: getString(node, 'interval') ?? '',
    ...sourceOf(node),
  });
}

function buildJob(node: TreeNode): Job {
  const tasks = getSequence(node, 'tasks').map((task) => Object.freeze(taskTokens(task) ?? []));
  return Object.freeze({ name: getString(node, 'name') ?? '', tasks: Object.freeze(tasks), ...sourceOf(node) });
}

function buildEnvironment(node: TreeNode): Environment {
  const env: Record<string, string> = {};
  const vars = getEntry(node, 'env');
  if (vars?.kind === 'mapping') {
    for (const [key, value] of vars.entries) {
      if (value.kind === 'scalar' && value.value !== null) setOwn(env, key, String(value.value));
    }
  }
  return Object.freeze({ name: getString(node, 'name') ?? '', env: Object.freeze(env), ...sourceOf(node) });
}

function buildSetting(node: TreeNode): PluginSetting {
  const description = getString(node, 'description');
  const sensitive = getEntry(node, 'sensitive');
  return Object.freeze({
    name: getString(node, 'name') ?? '',
    ...(description !== undefined ? { description } : {}),
    sensitive: sensitive?.kind === 'scalar' && sensitive.value === true,
  });
}

/** Flattens nested mappings to dotted keys; sequences are kept as JSON text. */
export function flattenConfig(node: TreeNode | undefined, prefix = '', out: Record<string, ScalarValue> = {}): Record<string, ScalarValue> {
  if (node?.kind !== 'mapping') return out;
  for (const [key, value] of node.entries) {
    const dotted = prefix ? `${prefix}.${key}` : key;
    if (value.kind === 'mapping') flattenConfig(value, dotted, out);
    else if (value.kind === 'sequence') setOwn(out, dotted, JSON.stringify(toPlain(value)));
    else setOwn(out, dotted, value.value);
  }
  return out;
}

const PLUGIN_OWN_KEYS = new Set(['name', 'settings', 'mappings', 'config']);

function buildPlugin(kind: PluginKind, node: TreeNode): Plugin {
  const extras: Record<string, PlainValue> = {};
  if (node.kind === 'mapping') {
    for (const [key, value] of node.entries) {
      if (!PLUGIN_OWN_KEYS.has(key)) setOwn(extras, key, toPlain(value));
    }
  }
  const mappings = getSequence(node, 'mappings')
    .map((mapping) => getString(mapping, 'name'))
    .filter((name): name is string => name !== undefined);

  return Object.freeze({
    kind,
    name: getString(node, 'name') ?? '',
    settings: Object.freeze(getSequence(node, 'settings').map(buildSetting)),
    mappings: Object.freeze(mappings),
    config: Object.freeze(flattenConfig(getEntry(node, 'config'))),
    extras: Object.freeze(extras),
    ...sourceOf(node),
  });
}

function stringList(node: TreeNode | undefined, key: string): string[] {
  return getSequence(node, key)
    .map((item) => (item.kind === 'scalar' && typeof item.value === 'string' ? item.value : undefined))
    .filter((value): value is string => value !== undefined);
}

/**
 * Builds the typed model from a merged tree. The report only gates the
 * build: any error finding refuses it.
 */
export function buildModel(tree: TreeNode, report: ValidationReport): BuildResult {
  if (hasErrors(report)) {
    return { status: 'refused', findings: report.findings.filter((finding) => finding.severity === 'error') };
  }

  const versionNode = getEntry(tree, 'version');
  const pluginsNode = getEntry(tree, PLUGINS_KEY);
  const pluginsOf = (kind: PluginKind) =>
    Object.freeze(getSequence(pluginsNode, kind).map((node) => buildPlugin(kind, node)));
  const plugins = { extractors: pluginsOf('extractors'), loaders: pluginsOf('loaders'), mappers: pluginsOf('mappers') };

  const databaseUri = getString(tree, 'database_uri');
  const model = new ProjectModel({
    version: versionNode?.kind === 'scalar' && typeof versionNode.value === 'number' ? versionNode.value : 0,
    defaultEnvironment: getString(tree, 'default_environment') ?? '',
    ...(databaseUri !== undefined ? { databaseUri } : {}),
    includePaths: Object.freeze(stringList(tree, 'include_paths')),
    schedules: Object.freeze(getSequence(tree, 'schedules').map(buildSchedule)),
    jobs: Object.freeze(getSequence(tree, 'jobs').map(buildJob)),
    environments: Object.freeze(getSequence(tree, 'environments').map(buildEnvironment)),
    plugins: Object.freeze(plugins),
  });
  return { status: 'built', model };
}

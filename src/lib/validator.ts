import AjvModule, { type ErrorObject } from 'ajv';
import schema from './schemas/project.schema.json' with { type: 'json' };
import { checkInterval } from './interval.js';
import { PLUGINS_KEY } from './merge.js';
import { assertMappingRoot } from './parser.js';
import { parseTaskChain, pluginNameOf } from './tasks.js';
import {
  formatPath,
  getEntry,
  getSequence,
  getString,
  nodeAt,
  type MappingNode,
  type PathSegment,
  type TreeNode,
  toPlain,
} from './tree.js';

export type Severity = 'error' | 'warning';

export type FindingLocation = {
  path: string;
  source?: string;
  line?: number;
};

export type ValidationFinding = {
  severity: Severity;
  path: string;
  message: string;
  locations?: FindingLocation[];
};

export type ValidationReport = {
  findings: ValidationFinding[];
};

export type ValidateOptions = {
  /** Report unresolved plugin references as errors instead of warnings. */
  strict?: boolean;
};

export const PLUGIN_KINDS = ['extractors', 'loaders', 'mappers'] as const;
export type PluginKind = (typeof PLUGIN_KINDS)[number];

export const PLUGIN_KIND_LABELS: Record<PluginKind, string> = {
  extractors: 'extractor',
  loaders: 'loader',
  mappers: 'mapper',
};

export const TOP_LEVEL_KEYS = [
  'version',
  'default_environment',
  'database_uri',
  'include_paths',
  'schedules',
  'jobs',
  'environments',
  PLUGINS_KEY,
] as const;

export function isPluginKind(value: string): value is PluginKind {
  const kinds: readonly string[] = PLUGIN_KINDS;
  return kinds.includes(value);
}

const Ajv = AjvModule.default;
const ajv = new Ajv({ allErrors: true, strict: true, allowUnionTypes: true });
const validateStructure = ajv.compile(schema);

class Findings {
  readonly items: ValidationFinding[] = [];

  constructor(readonly root: MappingNode) {}

  add(severity: Severity, path: readonly PathSegment[], message: string, locations?: FindingLocation[]): void {
    const finding: ValidationFinding = { severity, path: formatPath(path), message };
    const located = locations ?? this.locate(path);
    if (located) finding.locations = located;
    this.items.push(finding);
  }

  locate(path: readonly PathSegment[]): FindingLocation[] | undefined {
    const node = nodeAt(this.root, path);
    if (!node?.source) return undefined;
    return [locationOf(path, node)];
  }
}

function locationOf(path: readonly PathSegment[], node: TreeNode | undefined): FindingLocation {
  const location: FindingLocation = { path: formatPath(path) };
  if (node?.source) location.source = node.source;
  if (node?.line !== undefined) location.line = node.line;
  return location;
}

export function describeLocation(location: FindingLocation): string {
  if (!location.source) return location.path;
  const line = location.line !== undefined ? `:${location.line}` : '';
  return `${location.path} (${location.source}${line})`;
}

function pointerToPath(pointer: string, root: TreeNode): PathSegment[] {
  const parts = pointer
    .split('/')
    .slice(1)
    .map((part) => part.replace(/~1/g, '/').replace(/~0/g, '~'));
  const path: PathSegment[] = [];
  let node: TreeNode | undefined = root;
  for (const part of parts) {
    if (node?.kind === 'sequence') {
      const idx = Number(part);
      path.push(idx);
      node = node.items[idx];
    } else {
      path.push(part);
      node = getEntry(node, part);
    }
  }
  return path;
}

function checkStructure(findings: Findings): void {
  if (validateStructure(toPlain(findings.root))) return;
  for (const err of validateStructure.errors ?? []) {
    reportSchemaError(findings, err);
  }
}

function reportSchemaError(findings: Findings, err: ErrorObject): void {
  const path = pointerToPath(err.instancePath, findings.root);
  if (err.keyword === 'required') {
    const missing: unknown = err.params.missingProperty;
    const key = typeof missing === 'string' ? missing : 'unknown';
    findings.add('error', [...path, key], 'is required', findings.locate(path));
    return;
  }
  if (err.keyword === 'enum') {
    const allowed: unknown = err.params.allowedValues;
    const values = Array.isArray(allowed) ? allowed.map(String).join(', ') : '';
    findings.add('error', path, `must be one of: ${values}`);
    return;
  }
  findings.add('error', path, err.message ?? 'is invalid');
}

function checkTopLevelKeys(findings: Findings): void {
  const known: readonly string[] = TOP_LEVEL_KEYS;
  for (const [key] of findings.root.entries) {
    if (!known.includes(key)) findings.add('warning', [key], `unknown top-level key '${key}'`);
  }
  const plugins = getEntry(findings.root, PLUGINS_KEY);
  if (plugins?.kind !== 'mapping') return;
  for (const [kind] of plugins.entries) {
    if (!isPluginKind(kind)) findings.add('warning', [PLUGINS_KEY, kind], `unknown plugin kind '${kind}' is ignored`);
  }
}

/** `2020-08-05`, `2020-08-05T00:00:00Z`, `2020-08-05 06:30:00.5+02:00` and the like. */
const ISO_TIMESTAMP = /^\d{4}-\d{2}-\d{2}(?:[Tt ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:[Zz]|[+-]\d{2}:?\d{2})?)?$/;

export function isTimestamp(value: string): boolean {
  return ISO_TIMESTAMP.test(value) && !Number.isNaN(Date.parse(value));
}

function checkValues(findings: Findings): void {
  const uri = getString(findings.root, 'database_uri');
  if (uri !== undefined) {
    try {
      new URL(uri);
    } catch {
      findings.add('error', ['database_uri'], 'is not a valid URI');
    }
  }

  getSequence(findings.root, 'schedules').forEach((schedule, idx) => {
    const startDate = getString(schedule, 'start_date');
    if (startDate !== undefined && !isTimestamp(startDate)) {
      findings.add('error', ['schedules', idx, 'start_date'], `'${startDate}' is not a valid timestamp`);
    }
  });
}

type NamedCollection = {
  path: readonly PathSegment[];
  label: string;
  items: readonly TreeNode[];
};

function namedCollections(root: MappingNode): NamedCollection[] {
  const collections: NamedCollection[] = [
    { path: ['schedules'], label: 'schedule', items: getSequence(root, 'schedules') },
    { path: ['jobs'], label: 'job', items: getSequence(root, 'jobs') },
    { path: ['environments'], label: 'environment', items: getSequence(root, 'environments') },
  ];
  const plugins = getEntry(root, PLUGINS_KEY);
  for (const kind of PLUGIN_KINDS) {
    collections.push({ path: [PLUGINS_KEY, kind], label: PLUGIN_KIND_LABELS[kind], items: getSequence(plugins, kind) });
  }
  return collections;
}

function checkUniqueness(findings: Findings): void {
  for (const collection of namedCollections(findings.root)) {
    const occurrences = new Map<string, FindingLocation[]>();
    collection.items.forEach((item, idx) => {
      const name = getString(item, 'name');
      if (name === undefined) return;
      const path = [...collection.path, idx, 'name'];
      const list = occurrences.get(name) ?? [];
      list.push(locationOf(path, getEntry(item, 'name')));
      occurrences.set(name, list);
    });

    for (const [name, locations] of occurrences) {
      if (locations.length < 2) continue;
      const where = locations.map(describeLocation).join(', ');
      findings.items.push({
        severity: 'error',
        path: locations[1].path,
        message: `duplicate ${collection.label} name '${name}' defined ${locations.length} times: ${where}`,
        locations,
      });
    }
  }
}

function checkDefaultEnvironment(findings: Findings): void {
  const name = getString(findings.root, 'default_environment');
  if (name === undefined) return;
  const declared = getSequence(findings.root, 'environments').some((env) => getString(env, 'name') === name);
  if (!declared) {
    findings.add('error', ['default_environment'], `environment '${name}' is not declared under environments`);
  }
}

function pluginNames(root: MappingNode, kind: PluginKind): Set<string> {
  const names = new Set<string>();
  for (const plugin of getSequence(getEntry(root, PLUGINS_KEY), kind)) {
    const name = getString(plugin, 'name');
    if (name !== undefined) names.add(name);
  }
  return names;
}

function mappingNames(root: MappingNode): Set<string> {
  const names = new Set<string>();
  for (const mapper of getSequence(getEntry(root, PLUGINS_KEY), 'mappers')) {
    for (const mapping of getSequence(mapper, 'mappings')) {
      const name = getString(mapping, 'name');
      if (name !== undefined) names.add(name);
    }
  }
  return names;
}

function checkReferences(findings: Findings, strict: boolean): void {
  const severity: Severity = strict ? 'error' : 'warning';
  const declared: Record<PluginKind, Set<string>> = {
    extractors: pluginNames(findings.root, 'extractors'),
    loaders: pluginNames(findings.root, 'loaders'),
    mappers: pluginNames(findings.root, 'mappers'),
  };
  const mappings = mappingNames(findings.root);

  getSequence(findings.root, 'schedules').forEach((schedule, idx) => {
    const refs: Array<[key: string, kind: PluginKind]> = [
      ['extractor', 'extractors'],
      ['loader', 'loaders'],
    ];
    for (const [key, kind] of refs) {
      const name = getString(schedule, key);
      if (name !== undefined && !declared[kind].has(name)) {
        findings.add(severity, ['schedules', idx, key], `${PLUGIN_KIND_LABELS[kind]} '${name}' is not declared under plugins.${kind}`);
      }
    }
  });

  const isDeclared = (name: string) => PLUGIN_KINDS.some((kind) => declared[kind].has(name)) || mappings.has(name);

  getSequence(findings.root, 'jobs').forEach((job, jobIdx) => {
    getSequence(job, 'tasks').forEach((task, taskIdx) => {
      const path = ['jobs', jobIdx, 'tasks', taskIdx];
      const tokens = taskTokens(task);
      if (tokens === undefined) {
        findings.add('error', path, 'task must be a string or a list of plugin names');
        return;
      }
      if (tokens.length === 0) {
        findings.add('error', path, 'task is empty');
        return;
      }
      for (const token of tokens) {
        const name = pluginNameOf(token);
        if (!isDeclared(name)) findings.add(severity, path, `plugin '${name}' is not declared`);
      }
    });
  });
}

/** Plugin tokens of one task entry, or undefined when it has the wrong shape. */
export function taskTokens(task: TreeNode): string[] | undefined {
  if (task.kind === 'scalar') {
    return typeof task.value === 'string' ? parseTaskChain(task.value) : undefined;
  }
  if (task.kind !== 'sequence') return undefined;
  const tokens: string[] = [];
  for (const item of task.items) {
    if (item.kind !== 'scalar' || typeof item.value !== 'string') return undefined;
    tokens.push(...parseTaskChain(item.value));
  }
  return tokens;
}

function checkIntervals(findings: Findings): void {
  getSequence(findings.root, 'schedules').forEach((schedule, idx) => {
    const interval = getString(schedule, 'interval');
    if (interval === undefined) return;
    const problem = checkInterval(interval);
    if (problem) findings.add('error', ['schedules', idx, 'interval'], problem);
  });
}

/**
 * Runs every check against a merged tree and collects the findings; no check
 * stops the others. Throws a ParseError only when the root is not a mapping.
 */
export function validateTree(tree: TreeNode, options: ValidateOptions = {}): ValidationReport {
  const findings = new Findings(assertMappingRoot(tree));

  checkStructure(findings);
  checkTopLevelKeys(findings);
  checkValues(findings);
  checkUniqueness(findings);
  checkDefaultEnvironment(findings);
  checkReferences(findings, options.strict ?? false);
  checkIntervals(findings);

  return { findings: findings.items };
}

export function hasErrors(report: ValidationReport): boolean {
  return report.findings.some((finding) => finding.severity === 'error');
}

export function formatFinding(finding: ValidationFinding): string {
  const line = `${finding.severity} ${finding.path}: ${finding.message}`;
  const [only] = finding.locations ?? [];
  if (finding.locations?.length !== 1 || !only?.source) return line;
  const at = only.line !== undefined ? `${only.source}:${only.line}` : only.source;
  return `${line} (${at})`;
}

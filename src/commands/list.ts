import { Command } from 'commander';
import { CliError } from '../types.js';
import { emitJson, logStdout } from '../lib/io.js';
import { nextRun } from '../lib/interval.js';
import type { ProjectModel } from '../lib/model.js';
import { renderTable, type TableColumn } from '../lib/table.js';
import { PLUGIN_KINDS, PLUGIN_KIND_LABELS } from '../lib/validator.js';
import { loadModelForCli, settingsFor } from './common.js';

const COLLECTIONS = ['schedules', 'jobs', 'environments', 'plugins'] as const;
type Collection = (typeof COLLECTIONS)[number];

type Listing = {
  columns: TableColumn[];
  rows: Array<Record<string, string>>;
  json: unknown[];
};

function isCollection(value: string): value is Collection {
  const known: readonly string[] = COLLECTIONS;
  return known.includes(value);
}

function listSchedules(model: ProjectModel, from: Date): Listing {
  const schedules = [...model.schedules()].map((schedule) => {
    const next = nextRun(schedule.interval, from);
    return { ...schedule, nextRun: next ? next.toISOString() : null };
  });
  return {
    columns: [
      { key: 'name', header: 'Name', maxWidth: 40 },
      { key: 'extractor', header: 'Extractor', maxWidth: 30 },
      { key: 'loader', header: 'Loader', maxWidth: 30 },
      { key: 'transform', header: 'Transform' },
      { key: 'interval', header: 'Interval' },
      { key: 'nextRun', header: 'Next run' },
    ],
    rows: schedules.map((s) => ({
      name: s.name,
      extractor: s.extractor,
      loader: s.loader,
      transform: s.transform,
      interval: s.interval,
      nextRun: s.nextRun ?? '-',
    })),
    json: schedules,
  };
}

function listJobs(model: ProjectModel): Listing {
  const jobs = [...model.jobs()];
  return {
    columns: [
      { key: 'name', header: 'Name', maxWidth: 40 },
      { key: 'tasks', header: 'Tasks' },
    ],
    rows: jobs.map((job) => ({ name: job.name, tasks: job.tasks.map((chain) => chain.join(' ')).join(' | ') })),
    json: jobs,
  };
}

function listEnvironments(model: ProjectModel): Listing {
  const environments = [...model.environments()];
  return {
    columns: [
      { key: 'name', header: 'Name', maxWidth: 40 },
      { key: 'variables', header: 'Variables', maxWidth: 80 },
    ],
    rows: environments.map((env) => ({
      name: env.name,
      variables: Object.keys(env.env).join(', '),
    })),
    json: environments,
  };
}

function listPlugins(model: ProjectModel): Listing {
  const plugins = PLUGIN_KINDS.flatMap((kind) => [...model.plugins(kind)]);
  return {
    columns: [
      { key: 'kind', header: 'Kind' },
      { key: 'name', header: 'Name', maxWidth: 40 },
      { key: 'settings', header: 'Settings' },
      { key: 'mappings', header: 'Mappings', maxWidth: 60 },
    ],
    rows: plugins.map((plugin) => ({
      kind: PLUGIN_KIND_LABELS[plugin.kind],
      name: plugin.name,
      settings: String(plugin.settings.length),
      mappings: plugin.mappings.join(', '),
    })),
    json: plugins,
  };
}

function parseFrom(raw: string | undefined): Date {
  if (raw === undefined) return new Date();
  const date = new Date(raw);
  if (Number.isNaN(date.getTime())) throw new CliError(`--from must be a timestamp, got '${raw}'`, 2);
  return date;
}

export function createListCommand() {
  const cmd = new Command('list');
  cmd
    .description('List schedules, jobs, environments or plugins in declared order')
    .argument('<collection>', `One of: ${COLLECTIONS.join(', ')}`)
    .option('--from <timestamp>', 'Compute schedule next runs from this time instead of now')
    .action(async (collection: string, options: { from?: string }, command: Command) => {
      if (!isCollection(collection)) {
        throw new CliError(`Unknown collection: ${collection}. Valid collections: ${COLLECTIONS.join(', ')}`, 2);
      }
      const settings = settingsFor(command);
      const from = parseFrom(options.from);
      const model = await loadModelForCli(settings);

      let listing: Listing;
      if (collection === 'schedules') listing = listSchedules(model, from);
      else if (collection === 'jobs') listing = listJobs(model);
      else if (collection === 'environments') listing = listEnvironments(model);
      else listing = listPlugins(model);

      if (settings.json) {
        emitJson(listing.json);
        return;
      }
      if (listing.rows.length === 0) {
        logStdout(`No ${collection} declared.`);
        return;
      }
      logStdout(renderTable({ columns: listing.columns, rows: listing.rows }));
    });

  return cmd;
}

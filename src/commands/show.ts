import { Command } from 'commander';
import { emitJson, logStdout } from '../lib/io.js';
import { serializeTree } from '../lib/parser.js';
import { redactUri } from '../lib/redact.js';
import { mappingNode, scalarNode, toPlain, type MappingEntry, type MappingNode } from '../lib/tree.js';
import { loadForCli, settingsFor } from './common.js';

export function redactTree(tree: MappingNode): MappingNode {
  return mappingNode(
    tree.entries.map(([key, value]): MappingEntry =>
      key === 'database_uri' && value.kind === 'scalar' && typeof value.value === 'string'
        ? [key, scalarNode(redactUri(value.value), value)]
        : [key, value],
    ),
    tree,
  );
}

export function createShowCommand() {
  const cmd = new Command('show');
  cmd
    .description('Print the merged project tree (root file plus includes)')
    .action(async (_options: unknown, command: Command) => {
      const settings = settingsFor(command);
      const { tree } = await loadForCli(settings);
      const redacted = redactTree(tree);

      if (settings.json) {
        emitJson(toPlain(redacted));
        return;
      }
      logStdout(serializeTree(redacted).trimEnd());
    });

  return cmd;
}

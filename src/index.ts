#!/usr/bin/env node
import { realpathSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { Command } from 'commander';
import { createListCommand } from './commands/list.js';
import { createSettingsCommand } from './commands/settings.js';
import { createShowCommand } from './commands/show.js';
import { createValidateCommand } from './commands/validate.js';
import { handleError, logStdout } from './lib/io.js';
import { getCliVersion } from './lib/version.js';

export async function run(argv = process.argv.slice(2)): Promise<number> {
  // Handle version fast-path before commander parses or commands execute.
  if (argv[0] === '--version' || argv[0] === '-v') {
    logStdout(getCliVersion());
    return 0;
  }

  const program = new Command();
  program
    .name('pipedef')
    .description('Load, merge and validate data-pipeline project files')
    .option('-f, --file <path>', 'Project file (default: $PIPEDEF_FILE or ./pipedef.yml)')
    .option('--json', 'Emit JSON output')
    .option('--strict', 'Treat unresolved plugin references as errors')
    .option('--verbose', 'Emit debug logs to stderr')
    .showHelpAfterError()
    .exitOverride();

  program.addCommand(createValidateCommand());
  program.addCommand(createShowCommand());
  program.addCommand(createListCommand());
  program.addCommand(createSettingsCommand());
  for (const sub of program.commands) sub.exitOverride();

  try {
    await program.parseAsync(argv, { from: 'user' });
    return 0;
  } catch (err) {
    const opts = program.opts<{ json?: boolean }>();
    return handleError(err, Boolean(opts.json));
  }
}

// Run if invoked as main script (handles both direct and symlinked execution)
const entry = process.argv[1];
if (entry && realpathSync(entry) === fileURLToPath(import.meta.url)) {
  run()
    .then((code) => {
      process.exit(code);
    })
    .catch((err) => {
      console.error(err);
      process.exit(1);
    });
}

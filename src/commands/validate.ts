import { Command } from 'commander';
import { CliError } from '../types.js';
import { emitJson, logStdout } from '../lib/io.js';
import { formatFinding, hasErrors } from '../lib/validator.js';
import { displayPath, loadForCli, settingsFor } from './common.js';

export function createValidateCommand() {
  const cmd = new Command('validate');
  cmd
    .description('Load the project file and its includes, then report every validation finding')
    .action(async (_options: unknown, command: Command) => {
      const settings = settingsFor(command);
      const result = await loadForCli(settings);
      const { findings } = result.report;
      const valid = !hasErrors(result.report);

      if (settings.json) {
        emitJson({ valid, findings, sources: result.sources });
      } else {
        for (const finding of findings) logStdout(formatFinding(finding));
        const errors = findings.filter((f) => f.severity === 'error').length;
        const warnings = findings.length - errors;
        const file = displayPath(settings.file);
        logStdout(
          valid
            ? `${file}: valid (${result.sources.length} file(s), ${warnings} warning(s))`
            : `${file}: ${errors} error(s), ${warnings} warning(s)`,
        );
      }

      if (!valid) throw new CliError('validation failed', 1, { silent: true });
    });

  return cmd;
}

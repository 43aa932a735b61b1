import type { Command } from 'commander';

/** Adds --home and --config, which every command that reads state takes. */
export function withRuntimeOptions(command: Command): Command {
  return command
    .option('--home <dir>', 'Crucible home directory (default: $CRUCIBLE_HOME or ~/.crucible)')
    .option('--config <path>', 'Configuration file (default: <home>/config.json)');
}

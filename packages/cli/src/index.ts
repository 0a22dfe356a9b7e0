import { Command, CommanderError } from 'commander';
import { ConfigError, ProcessError } from '@treedigest/shared';
import { version } from '../package.json';
import { registerDigestCommand } from './commands/digest';
import { registerDoctorCommand } from './commands/doctor';

export const name = '@treedigest/cli';

export type { GlobalOptions } from './options';
export { OutputRenderer, toErrorOutput } from './output/renderer';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('treedigest')
    .description('Split a repository into gitingest digests that each fit a line budget')
    .version(version)
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging')
    // Parse errors surface as CommanderError so main() picks the exit code.
    .exitOverride();

  registerDigestCommand(program);
  registerDoctorCommand(program);

  return program;
}

/**
 * Process exit code for an error that ended a command.
 */
export function exitCodeFor(e: unknown): number {
  if (e instanceof CommanderError) {
    return e.exitCode === 0 ? 0 : 2;
  }
  if (e instanceof ConfigError) {
    return 2;
  }
  if (e instanceof ProcessError && e.exitCode !== undefined && e.exitCode > 0) {
    return e.exitCode;
  }
  return 1;
}

import { Command } from 'commander';
import pc from 'picocolors';
import which from 'which';
import { ConfigLoader } from '@treedigest/core';
import { DEFAULT_GITINGEST_BIN } from '@treedigest/shared';
import { INSTALL_HINT } from '@treedigest/exec';
import type { GlobalOptions } from '../options';

const CHECKS = {
  OK: pc.green('✔'),
  WARN: pc.yellow('!'),
  FAIL: pc.red('✖'),
};

export type CheckResult = [string, string];

export async function checkExecutable(name: string): Promise<CheckResult> {
  try {
    const resolved = await which(name);
    return [CHECKS.OK, `${name} found at: ${resolved}`];
  } catch {
    return [CHECKS.FAIL, `${name} not found in PATH. ${INSTALL_HINT}`];
  }
}

export function checkNodeVersion(version = process.versions.node): CheckResult {
  const major = Number.parseInt(version.split('.')[0], 10);
  if (major >= 20) {
    return [CHECKS.OK, `Node.js ${version}.`];
  }
  return [CHECKS.WARN, `Node.js ${version} is older than the supported 20.x.`];
}

/**
 * Executable named by the project and user config files, falling back to the default.
 * Problems in those files are reported instead of thrown.
 */
function configuredBin(configPath: string | undefined): [string, CheckResult | undefined] {
  try {
    const config = ConfigLoader.load({ configPath, flags: { root: '.' } });
    return [config.gitingestBin, undefined];
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    return [DEFAULT_GITINGEST_BIN, [CHECKS.FAIL, `Failed to load configuration: ${message}`]];
  }
}

export function registerDoctorCommand(program: Command) {
  program
    .command('doctor')
    .description('Check that the ingestion executable can be found')
    .option('--gitingest-bin <path>', 'Name or path of the gitingest executable')
    .action(async (options: { gitingestBin?: string }) => {
      const globalOpts = program.opts<GlobalOptions>();
      const results: CheckResult[] = [];

      results.push(checkNodeVersion());

      let bin = options.gitingestBin;
      if (!bin) {
        const [fromConfig, problem] = configuredBin(globalOpts.config);
        bin = fromConfig;
        if (problem) results.push(problem);
      }
      results.push(await checkExecutable(bin));

      const hasFailures = results.some(([status]) => status === CHECKS.FAIL);

      if (globalOpts.json) {
        console.log(
          JSON.stringify({ ok: !hasFailures, checks: results.map(([, message]) => message) }, null, 2),
        );
      } else {
        console.log(pc.bold('treedigest environment checkup'));
        console.log('---------------------------------');
        results.forEach(([status, message]) => {
          console.log(`${status} ${message}`);
        });
        console.log('---------------------------------');
        console.log(
          hasFailures
            ? pc.red(pc.bold('Doctor checks failed.')) + ' Please resolve the issues marked with ' + CHECKS.FAIL
            : pc.green(pc.bold('All checks passed.')),
        );
      }

      if (hasFailures) {
        process.exitCode = 1;
      }
    });
}

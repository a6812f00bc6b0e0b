import { Command } from 'commander';
import which from 'which';
import chalk from 'chalk';
import { loadContext, type CommandEnv, type GlobalOptions } from '../context';
import { OutputRenderer, type DoctorCheck } from '../output/renderer';

interface Requirement {
  name: string;
  purpose: string;
  required: boolean;
}

const REQUIREMENTS: Requirement[] = [
  { name: 'fzf', purpose: 'picking projects and sessions', required: true },
  { name: 'tmux', purpose: 'opening sessions and windows', required: true },
  { name: 'tree', purpose: 'the project preview', required: false },
];

async function checkExecutable(requirement: Requirement): Promise<DoctorCheck> {
  const found = await which(requirement.name, { nothrow: true });
  if (found) {
    return { status: 'ok', message: `${requirement.name} found at: ${found}` };
  }
  return {
    status: requirement.required ? 'fail' : 'warn',
    message: `${requirement.name} not found in PATH (needed for ${requirement.purpose}).`,
  };
}

function checkConfig(program: Command, env: CommandEnv): DoctorCheck[] {
  try {
    const { config, configSource } = loadContext(program, env.logger);
    const roots = config.include.reduce((count, entry) => count + entry.paths.length, 0);
    return [
      {
        status: 'ok',
        message: configSource
          ? `Configuration loaded from ${configSource}.`
          : 'No configuration file, using the built-in defaults.',
      },
      {
        status: 'ok',
        message: `${config.include.length} include entries with ${roots} roots, ${config.sessions.length} predefined sessions.`,
      },
    ];
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    return [{ status: 'fail', message: `Failed to load configuration: ${message}` }];
  }
}

export function registerDoctorCommand(program: Command, env: CommandEnv) {
  program
    .command('doctor')
    .description('Check that the tools projpick drives are installed and the config loads')
    .action(async () => {
      const json = Boolean(program.opts<GlobalOptions>().json);
      const renderer = new OutputRenderer(json);

      const checks: DoctorCheck[] = [];
      for (const requirement of REQUIREMENTS) {
        checks.push(await checkExecutable(requirement));
      }
      checks.push(...checkConfig(program, env));

      if (!json) console.log(chalk.bold('projpick environment checkup'));
      renderer.render({ kind: 'doctor', checks });
      if (json) return;

      if (checks.some((check) => check.status === 'fail')) {
        console.log(chalk.red.bold('Doctor checks failed.') + ' Resolve the issues marked above.');
      } else {
        console.log(chalk.green.bold('All checks passed.'));
      }
    });
}

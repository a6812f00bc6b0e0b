import type { Command } from 'commander';
import type { SelectOptions } from '@projpick/exec';
import { loadContext, type CommandContext, type CommandEnv } from '../context';

export const PROJECT_PICKER: SelectOptions = {
  header: 'Projects:',
  layout: 'reverse',
  preview: "tree -C '{}'",
  previewWindow: 'right:nohidden',
};

/**
 * Scans every configured root and lets the user pick one of the results.
 */
export async function pickProject(
  program: Command,
  env: CommandEnv,
): Promise<{ context: CommandContext; path: string }> {
  const context = loadContext(program, env.logger);
  const paths = env.services.scanner.scanConfig(context.config);
  const [path = ''] = await env.services.selector.select(paths, PROJECT_PICKER);
  return { context, path };
}

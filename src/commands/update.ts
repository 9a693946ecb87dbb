import { Command } from 'commander';

import { withErrorHandling } from '../utils/errors.js';
import { createCliExecutionContext } from '../cli/context.js';
import { runUpdatePipeline } from '../core/deps/deps-pipeline.js';
import type { GlobalOptions } from './global-options.js';

interface UpdateCommandOptions {
  all?: boolean;
}

export function setupUpdateCommand(program: Command): void {
  program
    .command('update')
    .description('Re-resolve the given dependencies ignoring their locked versions')
    .argument('[packages...]', 'dependencies to update')
    .option('-a, --all', 'update every dependency')
    .action(withErrorHandling(async (packages: string[], options: UpdateCommandOptions, command: Command) => {
      const { cwd } = command.optsWithGlobals<GlobalOptions>();
      const ctx = await createCliExecutionContext({ cwd });
      await runUpdatePipeline(ctx, { packages, all: Boolean(options.all) });
    }));
}

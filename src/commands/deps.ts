import { Command } from 'commander';

import { withErrorHandling } from '../utils/errors.js';
import { createCliExecutionContext } from '../cli/context.js';
import { runDepsPipeline } from '../core/deps/deps-pipeline.js';
import type { GlobalOptions } from './global-options.js';

export function setupDepsCommand(program: Command): void {
  program
    .command('deps')
    .description('List resolved dependencies and whether the lock file matches them')
    .action(withErrorHandling(async (_options: object, command: Command) => {
      const { cwd } = command.optsWithGlobals<GlobalOptions>();
      const ctx = await createCliExecutionContext({ cwd });
      await runDepsPipeline(ctx);
    }));
}

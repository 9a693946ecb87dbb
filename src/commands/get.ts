import { Command } from 'commander';

import { withErrorHandling } from '../utils/errors.js';
import { createCliExecutionContext } from '../cli/context.js';
import { runGetPipeline } from '../core/deps/deps-pipeline.js';
import type { GlobalOptions } from './global-options.js';

export function setupGetCommand(program: Command): void {
  program
    .command('get')
    .description('Resolve dependencies from deplock.yml and write the lock file')
    .action(withErrorHandling(async (_options: object, command: Command) => {
      const { cwd } = command.optsWithGlobals<GlobalOptions>();
      const ctx = await createCliExecutionContext({ cwd });
      await runGetPipeline(ctx);
    }));
}

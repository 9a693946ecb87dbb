import { Command } from 'commander';

import { withErrorHandling } from '../utils/errors.js';
import { createCliExecutionContext } from '../cli/context.js';
import { runInfoPipeline } from '../core/info/info-pipeline.js';
import type { GlobalOptions } from './global-options.js';

export function setupInfoCommand(program: Command): void {
  program
    .command('info')
    .description('Show the releases of a registry package, or the dependencies of one release')
    .argument('<package>', 'registry package name')
    .argument('[version]', 'release to show')
    .action(withErrorHandling(async (packageName: string, version: string | undefined, _options: object, command: Command) => {
      const { cwd } = command.optsWithGlobals<GlobalOptions>();
      const ctx = await createCliExecutionContext({ cwd });
      const result = await runInfoPipeline(ctx, packageName, version);
      if (!result.success) {
        process.exitCode = 1;
      }
    }));
}

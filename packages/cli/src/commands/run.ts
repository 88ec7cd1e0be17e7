import { Command } from 'commander';
import type { ToolCommand } from '@sinew/shared';
import { formatExecution } from '../output/formatter.js';
import { parseContext, withSinew, withStoreOptions, type StoreOptions } from '../setup.js';

interface RunCommandOptions extends StoreOptions {
  context?: string;
  json?: boolean;
}

export const runCommand = withStoreOptions(new Command('run'))
  .description('Execute a stored procedure concept and print the tool commands it enqueues')
  .argument('<uuid>', 'Concept uuid')
  .option('--context <json>', 'Execution context for guards (JSON object)')
  .option('--json', 'Output as JSON')
  .action(async (uuid: string, options: RunCommandOptions) => {
    const context = parseContext(options.context);

    await withSinew(options, async (sinew) => {
      const commands: ToolCommand[] = [];
      const result = await sinew.executor.execute(uuid, context, (cmd) => { commands.push(cmd); });

      if (options.json) {
        console.log(JSON.stringify({ result, commands }, null, 2));
      } else {
        console.log(formatExecution(result));
      }
      if (result.status !== 'completed') process.exitCode = 1;
    });
  });

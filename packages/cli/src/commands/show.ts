import { Command } from 'commander';
import { formatProcedure } from '../output/formatter.js';
import { withSinew, withStoreOptions, type StoreOptions } from '../setup.js';

export const showCommand = withStoreOptions(new Command('show'))
  .description('Show a stored procedure')
  .argument('<uuid>', 'Procedure uuid')
  .option('--plan', 'Print the replay plan instead')
  .action(async (uuid: string, options: StoreOptions & { plan?: boolean }) => {
    await withSinew(options, async (sinew) => {
      if (options.plan) {
        console.log(JSON.stringify(await sinew.library.toExecutionPlan(uuid), null, 2));
        return;
      }
      const procedure = await sinew.library.getProcedure(uuid);
      if (!procedure) {
        console.error(`Procedure not found: ${uuid}`);
        process.exitCode = 1;
        return;
      }
      console.log(formatProcedure(procedure));
    });
  });

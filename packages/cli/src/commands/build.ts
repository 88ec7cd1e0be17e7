import { Command } from 'commander';
import { ensureDefaultPrototypes } from '@sinew/core';
import { ValidationError, type ConstructionResult, type ToolCommand } from '@sinew/shared';
import { formatConstruction, formatExecution, formatValidation } from '../output/formatter.js';
import { parseContext, readText, withSinew, withStoreOptions, type StoreOptions } from '../setup.js';

interface BuildCommandOptions extends StoreOptions {
  skipValidation?: boolean;
  run?: boolean;
  context?: string;
  json?: boolean;
}

export const buildCommand = withStoreOptions(new Command('build'))
  .description('Store a procedure description as concepts in the graph')
  .argument('<file>', 'Procedure JSON file')
  .option('--skip-validation', 'Store without running the validator first')
  .option('--run', 'Execute the procedure right after storing it')
  .option('--context <json>', 'Execution context for guards (JSON object)')
  .option('--json', 'Output as JSON')
  .action(async (file: string, options: BuildCommandOptions) => {
    const text = await readText(file);
    const context = parseContext(options.context);

    await withSinew(options, async (sinew) => {
      await ensureDefaultPrototypes(sinew.graph);

      let built: ConstructionResult;
      try {
        built = await sinew.builder.createFromDescription(text, { skipValidation: options.skipValidation });
      } catch (err) {
        if (err instanceof ValidationError) {
          console.error(formatValidation({ valid: false, errors: err.issues, warnings: [] }));
          process.exitCode = 1;
          return;
        }
        throw err;
      }

      const commands: ToolCommand[] = [];
      const execution = options.run
        ? await sinew.executor.execute(built.procedureUuid, context, (cmd) => { commands.push(cmd); })
        : undefined;

      if (options.json) {
        console.log(JSON.stringify({ construction: built, execution, commands }, null, 2));
        return;
      }
      console.log(formatConstruction(built));
      if (execution) {
        console.log('');
        console.log(formatExecution(execution));
      }
    });
  });

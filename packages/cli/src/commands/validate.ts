import { Command } from 'commander';
import { validateProcedure } from '@sinew/core';
import { formatValidation } from '../output/formatter.js';
import { readText } from '../setup.js';

export const validateCommand = new Command('validate')
  .description('Check a procedure description without storing it')
  .argument('<file>', 'Procedure JSON file')
  .option('--json', 'Output as JSON')
  .action(async (file: string, options: { json?: boolean }) => {
    const result = validateProcedure(await readText(file));
    console.log(options.json ? JSON.stringify(result, null, 2) : formatValidation(result));
    if (!result.valid) process.exitCode = 1;
  });

#!/usr/bin/env node
import { Command } from 'commander';
import { errorMessage } from '@sinew/shared';
import { validateCommand } from '../src/commands/validate.js';
import { buildCommand } from '../src/commands/build.js';
import { runCommand } from '../src/commands/run.js';
import { showCommand } from '../src/commands/show.js';
import { searchCommand } from '../src/commands/search.js';
import { seedCommand } from '../src/commands/seed.js';
import { fingerprintCommand } from '../src/commands/fingerprint.js';
import { patternsCommand } from '../src/commands/patterns.js';
import { traceCommand } from '../src/commands/trace.js';
import { configCommand } from '../src/commands/config.js';

const program = new Command();

program
  .name('sinew')
  .description('Procedural knowledge graph: store procedures as concepts, replay them as DAGs')
  .version('0.1.0');

program.addCommand(validateCommand);
program.addCommand(buildCommand);
program.addCommand(runCommand);
program.addCommand(showCommand);
program.addCommand(searchCommand);
program.addCommand(seedCommand);
program.addCommand(fingerprintCommand);
program.addCommand(patternsCommand);
program.addCommand(traceCommand);
program.addCommand(configCommand);

program.parseAsync().catch((err: unknown) => {
  console.error(`Error: ${errorMessage(err)}`);
  process.exitCode = 1;
});

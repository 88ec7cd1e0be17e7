import { Command } from 'commander';
import { ensureDefaultPrototypes } from '@sinew/core';
import { withSinew, withStoreOptions, type StoreOptions } from '../setup.js';

export const seedCommand = withStoreOptions(new Command('seed'))
  .description('Create the default prototype hierarchy (idempotent)')
  .action(async (options: StoreOptions) => {
    await withSinew(options, async (sinew) => {
      const prototypes = await ensureDefaultPrototypes(sinew.graph);
      for (const [name, uuid] of prototypes) {
        console.log(`${name.padEnd(20)} ${uuid}`);
      }
    });
  });

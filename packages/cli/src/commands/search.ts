import { Command } from 'commander';
import { formatProcedureList } from '../output/formatter.js';
import { withSinew, withStoreOptions, type StoreOptions } from '../setup.js';

interface SearchCommandOptions extends StoreOptions {
  topK: number;
  tag?: string[];
  json?: boolean;
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

export const searchCommand = withStoreOptions(new Command('search'))
  .description('Search stored procedures')
  .argument('<query>', 'Search text')
  .option('-k, --top-k <n>', 'Maximum number of results', (v: string) => parseInt(v, 10), 5)
  .option('-t, --tag <tag>', 'Require a tag (repeatable)', collect)
  .option('--json', 'Output as JSON')
  .action(async (query: string, options: SearchCommandOptions) => {
    await withSinew(options, async (sinew) => {
      const results = await sinew.library.searchProcedures(query, { topK: options.topK, tags: options.tag });
      console.log(options.json ? JSON.stringify(results, null, 2) : formatProcedureList(results));
    });
  });

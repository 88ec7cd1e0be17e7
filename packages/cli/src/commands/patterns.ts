import { Command } from 'commander';
import { formatPatternMatches } from '../output/formatter.js';
import { readText, withSinew, withStoreOptions, type StoreOptions } from '../setup.js';

export const patternsCommand = new Command('patterns')
  .description('Inspect learned form patterns');

interface MatchOptions extends StoreOptions {
  formType?: string;
  topK: number;
  json?: boolean;
}

withStoreOptions(patternsCommand.command('match'))
  .description('Rank stored patterns against a page')
  .argument('<url>', 'Page URL')
  .argument('<html-file>', 'Saved page HTML')
  .option('--form-type <type>', 'Only consider patterns of this form type')
  .option('-k, --top-k <n>', 'Maximum number of results', (v: string) => parseInt(v, 10), 5)
  .option('--json', 'Output as JSON')
  .action(async (url: string, htmlFile: string, options: MatchOptions) => {
    const html = await readText(htmlFile);
    await withSinew(options, async (sinew) => {
      const matches = await sinew.matcher.findBestPattern(url, html, options.formType, options.topK);
      console.log(options.json ? JSON.stringify(matches, null, 2) : formatPatternMatches(matches));
    });
  });

withStoreOptions(patternsCommand.command('generalize'))
  .description('Try to generalize a pattern with its successful peers')
  .argument('<uuid>', 'Pattern uuid')
  .action(async (uuid: string, options: StoreOptions) => {
    await withSinew(options, async (sinew) => {
      const result = await sinew.generalizer.autoGeneralize(uuid);
      if (!result) {
        console.log('Not enough similar successful patterns to generalize.');
        return;
      }
      console.log(`[OK] ${result.name} (${result.generalizedUuid}) from ${result.exemplarCount} exemplars`);
    });
  });

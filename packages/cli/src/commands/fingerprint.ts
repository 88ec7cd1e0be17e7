import { Command } from 'commander';
import { fingerprint } from '@sinew/core';
import { formatFingerprint } from '../output/formatter.js';
import { readText } from '../setup.js';

export const fingerprintCommand = new Command('fingerprint')
  .description('Print the structural fingerprint of a page')
  .argument('<url>', 'Page URL')
  .argument('<html-file>', 'Saved page HTML')
  .option('--json', 'Output as JSON')
  .action(async (url: string, htmlFile: string, options: { json?: boolean }) => {
    const fp = fingerprint(url, await readText(htmlFile));
    console.log(options.json ? JSON.stringify(fp, null, 2) : formatFingerprint(fp));
  });

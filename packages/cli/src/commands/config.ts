import { Command } from 'commander';
import { ConfigManager, CONFIG_FILE_NAMES, CONFIG_ENV_VARS } from '@sinew/core';

export const configCommand = new Command('config')
  .description('Manage sinew configuration');

configCommand
  .command('show')
  .description('Show current configuration')
  .option('-c, --config <path>', 'Config file')
  .action(async (options: { config?: string }) => {
    const mgr = new ConfigManager();
    const config = await mgr.load({ configPath: options.config });
    console.log(`# source: ${mgr.getSource() ?? 'defaults'}`);
    console.log(JSON.stringify(config, null, 2));
  });

configCommand
  .command('path')
  .description('Show config file search paths')
  .action(() => {
    console.log('Config files searched in the working directory and its parents (first found wins):');
    CONFIG_FILE_NAMES.forEach((name, i) => console.log(`  ${i + 1}. ./${name}`));
    console.log('');
    console.log('Environment variables:');
    for (const name of CONFIG_ENV_VARS) console.log(`  ${name}`);
  });

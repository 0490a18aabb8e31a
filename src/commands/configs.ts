import { Command } from 'commander';
import chalk from 'chalk';
import { ADVANCED_CONFIG_FILENAME, dataPath } from '../config/constants';
import { AdvancedConfigCatalog } from '../core/advanced-config';
import { Logger } from '../utils/logger';

export function configsCommand(program: Command): void {
  program
    .command('configs')
    .description('List advanced settings that can be passed with --define')
    .option('-t, --tsv <file>', 'Advanced configuration file')
    .option('-j, --json', 'Output result as JSON')
    .action(async (options: { tsv?: string; json?: boolean }) => {
      try {
        Logger.setQuiet(Boolean(options.json));
        const catalog = await AdvancedConfigCatalog.load(options.tsv ?? dataPath(ADVANCED_CONFIG_FILENAME));

        if (options.json) {
          Logger.json(catalog.items);
          return;
        }

        Logger.title('Advanced Settings');

        catalog.items.forEach(item => {
          const limits: string[] = [];
          if (item.defaultValue) {
            limits.push(`default ${item.defaultValue}`);
          }
          if (item.min !== undefined) {
            limits.push(`min ${item.min}`);
          }
          if (item.max !== undefined) {
            limits.push(`max ${item.max}`);
          }
          if (item.enumValues.length > 0) {
            limits.push(`one of ${item.enumValues.join('|')}`);
          }

          console.log(`  ${chalk.bold(item.name)} ${chalk.gray(`[${item.type}]`)}`);
          if (item.description) {
            console.log(`      ${item.description}`);
          }
          if (limits.length > 0) {
            console.log(chalk.gray(`      ${limits.join(', ')}`));
          }
        });

        console.log();
        Logger.info(`${catalog.size} settings`);

      } catch (error) {
        Logger.error(`Failed to list settings: ${error instanceof Error ? error.message : String(error)}`);
        process.exit(1);
      }
    });
}

import { Command } from 'commander';
import chalk from 'chalk';
import { FeatureCatalog, PARTITION_ORDER } from '../core/feature-catalog';
import type { CatalogPartition } from '../types/catalog';
import { Logger } from '../utils/logger';

const SECTION_TITLES: Record<CatalogPartition, string> = {
  features: 'Features',
  stdlibExamples: 'Standard Library Examples (-x)',
  wirelessOptions: 'Pico W Wireless Options'
};

export function featuresCommand(program: Command): void {
  program
    .command('features')
    .alias('list')
    .description('List available features, examples, wireless options and debuggers')
    .option('-j, --json', 'Output result as JSON')
    .action((options: { json?: boolean }) => {
      try {
        // Keep stdout parseable
        Logger.setQuiet(Boolean(options.json));
        const catalog = FeatureCatalog.loadDefault();

        if (options.json) {
          Logger.json({
            features: catalog.list('features'),
            stdlibExamples: catalog.list('stdlibExamples'),
            wirelessOptions: catalog.list('wirelessOptions'),
            debuggers: catalog.debuggers
          });
          return;
        }

        Logger.title('Available Features');

        for (const partition of PARTITION_ORDER) {
          Logger.subTitle(SECTION_TITLES[partition]);
          catalog.list(partition).forEach(entry => {
            const library = entry.libraryName ? chalk.gray(` (${entry.libraryName})`) : '';
            console.log(`  ${chalk.bold(entry.key.padEnd(18))} ${entry.displayName}${library}`);
          });
        }

        Logger.subTitle('Debuggers (-d)');
        catalog.debuggers.forEach((entry, index) => {
          console.log(`  ${chalk.bold(String(index).padEnd(18))} ${entry.displayName}`);
        });

      } catch (error) {
        Logger.error(`Failed to list features: ${error instanceof Error ? error.message : String(error)}`);
        process.exit(1);
      }
    });
}

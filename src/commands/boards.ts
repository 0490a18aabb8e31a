import { Command } from 'commander';
import { SdkEnvironment } from '../core/sdk-environment';
import { Logger } from '../utils/logger';

export function boardsCommand(program: Command): void {
  program
    .command('boards')
    .description('List board types defined by the Pico SDK')
    .option('-j, --json', 'Output result as JSON')
    .action(async (options: { json?: boolean }) => {
      try {
        Logger.setQuiet(Boolean(options.json));
        const sdkPath = await SdkEnvironment.resolveSdkPath();
        const boards = await SdkEnvironment.listBoards(sdkPath);

        if (options.json) {
          Logger.json(boards);
          return;
        }

        Logger.title('Board Types');
        Logger.info(`SDK: ${sdkPath}`);
        Logger.divider();

        if (boards.length === 0) {
          Logger.warning('No board headers found');
          return;
        }

        boards.forEach(board => Logger.item(board));

      } catch (error) {
        Logger.error(`Failed to list boards: ${error instanceof Error ? error.message : String(error)}`);
        process.exit(1);
      }
    });
}

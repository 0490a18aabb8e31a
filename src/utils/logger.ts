import chalk from 'chalk';

export class Logger {
  private static quiet = false;

  /**
   * Silence everything except errors (set by the --json listings and by tests)
   */
  static setQuiet(quiet: boolean): void {
    Logger.quiet = quiet;
  }

  static info(message: string): void {
    if (!Logger.quiet) {
      console.log(chalk.blue('ℹ'), message);
    }
  }

  static success(message: string): void {
    if (!Logger.quiet) {
      console.log(chalk.green('✓'), message);
    }
  }

  static warning(message: string): void {
    if (!Logger.quiet) {
      console.warn(chalk.yellow('⚠'), message);
    }
  }

  static error(message: string): void {
    console.error(chalk.red('✗'), message);
  }

  static debug(message: string): void {
    if (process.env.DEBUG && !Logger.quiet) {
      console.log(chalk.gray('🔍'), message);
    }
  }

  /**
   * Echo an external command before it runs
   */
  static command(command: string, args: readonly string[]): void {
    if (!Logger.quiet) {
      console.log(chalk.cyan('$'), [command, ...args].join(' '));
    }
  }

  static item(text: string): void {
    if (!Logger.quiet) {
      console.log(`  • ${text}`);
    }
  }

  static divider(): void {
    if (!Logger.quiet) {
      console.log(chalk.gray('─'.repeat(80)));
    }
  }

  static title(title: string): void {
    if (!Logger.quiet) {
      console.log('\n' + chalk.bold.cyan(title));
      console.log(chalk.cyan('═'.repeat(title.length)));
    }
  }

  static subTitle(subTitle: string): void {
    if (!Logger.quiet) {
      console.log('\n' + chalk.bold(subTitle));
      console.log(chalk.gray('─'.repeat(subTitle.length)));
    }
  }

  static json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }
}

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import inquirer from 'inquirer';
import { ADVANCED_CONFIG_FILENAME, dataPath } from '../config/constants';
import { AdvancedConfigCatalog } from '../core/advanced-config';
import { buildConfigurationRecord } from '../core/configuration';
import { CollisionError, ConfigurationError, exitCodeFor } from '../core/errors';
import { FeatureCatalog } from '../core/feature-catalog';
import { findUnknownFeatures, resolveEffectiveFeatures } from '../core/feature-resolver';
import { ProjectMaterializer } from '../core/project-materializer';
import { SdkEnvironment } from '../core/sdk-environment';
import type { ConfigurationRecord } from '../types/config';
import { FileSystem } from '../utils/file-system';
import { Logger } from '../utils/logger';
import { Validator } from '../utils/validator';

interface NewCommandOptions {
  feature?: string[];
  examples?: boolean;
  cpp?: boolean;
  cppExceptions?: boolean;
  cppRtti?: boolean;
  uart: boolean;
  usb?: boolean;
  runFromRam?: boolean;
  board: string;
  project?: string[];
  debugger: number;
  cpath?: string;
  gdbPath?: string;
  define?: string[];
  tsv?: string;
  outputDir?: string;
  overwrite?: boolean;
  build?: boolean;
  configure: boolean;
  dryRun?: boolean;
}

function parseIndex(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('Not a debugger index.');
  }
  return Number(value);
}

function parseDefines(pairs: readonly string[]): Record<string, string> {
  const defines: Array<[string, string]> = [];
  for (const pair of pairs) {
    const parsed = Validator.parseDefine(pair);
    if (!parsed) {
      throw new ConfigurationError(`Invalid define "${pair}"; expected NAME=VALUE`);
    }
    if (!Validator.isValidDefineName(parsed.name)) {
      throw new ConfigurationError(`Invalid define name: ${parsed.name}`);
    }
    defines.push([parsed.name, parsed.value]);
  }
  return Object.fromEntries(defines);
}

export function newCommand(program: Command): void {
  program
    .command('new')
    .description('Generate a new Raspberry Pi Pico project')
    .argument('<name>', 'Project name (alphanumeric, underscores, hyphens)')
    .option('-f, --feature <key...>', 'Add a feature (see `features` for the list)')
    .option('-x, --examples', 'Add example code for the standard library features')
    .option('--cpp', 'Generate C++ source instead of C')
    .option('--cpp-exceptions', 'Enable C++ exceptions (C++ only)')
    .option('--cpp-rtti', 'Enable C++ RTTI (C++ only)')
    .option('--no-uart', 'Disable console output over UART')
    .option('--usb', 'Enable console output over USB')
    .option('-r, --run-from-ram', 'Run the program from RAM rather than flash')
    .option('-b, --board <board>', 'Board type', 'pico')
    .option('-p, --project <ide...>', 'Generate IDE project files (vscode)')
    .option('-d, --debugger <index>', 'Debugger to use (see `features`)', parseIndex, 0)
    .option('--cpath <compiler>', 'Path to arm-none-eabi-gcc')
    .option('--gdb-path <gdb>', 'Path to the ARM-capable gdb')
    .option('-D, --define <pair...>', 'Advanced setting as NAME=VALUE (see `configs`)')
    .option('-t, --tsv <file>', 'Advanced configuration file')
    .option('-o, --output-dir <dir>', 'Directory to create the project in (default: cwd)')
    .option('--overwrite', 'Replace an existing project without asking')
    .option('--build', 'Build the project after configuring it')
    .option('--no-configure', 'Do not run cmake after generating')
    .option('--dry-run', 'Show what would be created without writing anything')
    .action(async (name: string, options: NewCommandOptions) => {
      try {
        Logger.title('New Pico Project');

        const catalog = FeatureCatalog.loadDefault();
        const sdkPath = await SdkEnvironment.resolveSdkPath();

        let compilerPath = options.cpath;
        if (!compilerPath) {
          const found = await SdkEnvironment.findCompiler();
          if (!found && !options.dryRun) {
            throw new ConfigurationError('arm-none-eabi-gcc not found on PATH; install the toolchain or pass --cpath');
          }
          compilerPath = found ?? '';
        }

        const advanced = await AdvancedConfigCatalog.load(options.tsv ?? dataPath(ADVANCED_CONFIG_FILENAME));

        const boards = await SdkEnvironment.listBoards(sdkPath);
        if (boards.length > 0 && !boards.includes(options.board)) {
          Logger.warning(`Board ${options.board} not found in the SDK board headers`);
        }

        const unknown = findUnknownFeatures(options.feature ?? [], catalog);
        unknown.forEach(key => Logger.warning(`Unknown feature ignored: ${key}`));

        let config = await buildConfigurationRecord(
          {
            sdkPath,
            projectRoot: options.outputDir,
            projectName: name,
            boardType: options.board,
            selectedFeatures: options.feature,
            wantExamples: options.examples,
            languageMode: options.cpp ? 'cpp' : 'c',
            consoleUART: options.uart,
            consoleUSB: options.usb,
            runFromRAM: options.runFromRam,
            overwriteExisting: options.overwrite,
            advancedDefines: parseDefines(options.define ?? []),
            ideTargets: options.project,
            debuggerChoice: options.debugger,
            cppExceptions: options.cppExceptions,
            cppRTTI: options.cppRtti,
            compilerPath,
            gdbPath: options.gdbPath,
            runConfigure: options.configure,
            runBuild: options.build
          },
          catalog,
          advanced
        );

        if (options.dryRun) {
          dryRunNew(config, catalog);
          return;
        }

        const decision = await ProjectMaterializer.checkForExistingProject(config);
        if (decision.action === 'abort') {
          if (!(await confirmOverwrite(decision.reason))) {
            throw new CollisionError(
              `${decision.reason}; use --overwrite to replace the existing project`,
              ProjectMaterializer.projectPath(config)
            );
          }
          config = Object.freeze({ ...config, overwriteExisting: true });
        }

        Logger.info(`Creating ${chalk.bold(name)} for board ${chalk.bold(config.boardType)}`);
        Logger.divider();

        const result = await ProjectMaterializer.materialize(config, catalog);

        Logger.divider();
        Logger.success(`Project ${chalk.bold(name)} created`);

        Logger.subTitle('Files');
        result.createdFiles.forEach(file => Logger.item(FileSystem.relativePath(result.projectPath, file)));

        console.log();
        Logger.subTitle('Next Steps');
        if (result.build) {
          console.log(`  Flash ${chalk.bold(`build/${name}.uf2`)} to the board`);
        } else if (result.configure) {
          console.log(`  Build: ${chalk.bold(`cd "${result.projectPath}/build" && cmake --build .`)}`);
        } else {
          console.log(`  Configure: ${chalk.bold(`cd "${result.projectPath}" && mkdir -p build && cd build && cmake ..`)}`);
        }

      } catch (error) {
        Logger.error(`Project generation failed: ${error instanceof Error ? error.message : String(error)}`);
        process.exit(exitCodeFor(error));
      }
    });
}

/**
 * Ask before replacing an existing project. Without a terminal there is
 * nobody to ask, so the answer is no.
 */
async function confirmOverwrite(reason: string): Promise<boolean> {
  if (!process.stdin.isTTY) {
    return false;
  }

  const { overwrite } = await inquirer.prompt<{ overwrite: boolean }>([
    {
      type: 'confirm',
      name: 'overwrite',
      message: `${reason}. Overwrite the existing project?`,
      default: false
    }
  ]);

  return overwrite;
}

function dryRunNew(config: ConfigurationRecord, catalog: FeatureCatalog): void {
  Logger.subTitle('Dry Run - Project Generation');

  const features = resolveEffectiveFeatures(config.selectedFeatures, config.wantExamples, catalog);

  console.log(`  Project Name: ${config.projectName}`);
  console.log(`  Directory: ${ProjectMaterializer.projectPath(config)}`);
  console.log(`  SDK: ${config.sdkPath}`);
  console.log(`  Board: ${config.boardType}`);
  console.log(`  Language: ${config.languageMode === 'cpp' ? 'C++' : 'C'}`);
  console.log(`  Features: ${features.length > 0 ? features.join(', ') : 'none'}`);
  console.log(`  Console: UART ${config.consoleUART ? 'on' : 'off'}, USB ${config.consoleUSB ? 'on' : 'off'}`);
  console.log(`  Run from RAM: ${config.runFromRAM ? 'Yes' : 'No'}`);
  if (config.languageMode === 'cpp') {
    console.log(`  Exceptions: ${config.cppExceptions ? 'Yes' : 'No'}, RTTI: ${config.cppRTTI ? 'Yes' : 'No'}`);
  }
  Object.entries(config.advancedDefines).forEach(([define, value]) => {
    console.log(`  Define: ${define}=${value}`);
  });
  if (config.ideTargets.length > 0) {
    const debuggerEntry = catalog.debuggerAt(config.debuggerChoice);
    console.log(`  IDE: ${config.ideTargets.join(', ')} (debugger: ${debuggerEntry ? debuggerEntry.displayName : 'none'})`);
  }
  console.log(`  Configure: ${config.runConfigure ? 'Yes' : 'No'}, Build: ${config.runBuild ? 'Yes' : 'No'}`);

  console.log();
  Logger.subTitle('What would be created:');
  console.log(`  ${ProjectMaterializer.projectPath(config)}/`);
  ProjectMaterializer.plannedFiles(config, catalog).forEach(file => console.log(`  ├── ${file}`));
  console.log('  └── build/');

  console.log();
  Logger.info('This is a dry run - no files will be created');
  console.log('To actually create the project, remove the --dry-run flag');
}

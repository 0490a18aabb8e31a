import path from 'path';
import { glob } from 'glob';
import {
  BOARD_HEADERS_DIR,
  COMPILER_NAME,
  ENV_BOARD_HEADER_DIRS,
  ENV_SDK_PATH,
  SDK_IMPORT_SOURCE
} from '../config/constants';
import { Logger } from '../utils/logger';
import { Platform } from '../utils/platform';
import { Validator } from '../utils/validator';
import { ConfigurationError } from './errors';

export class SdkEnvironment {
  /**
   * Resolve the SDK root from PICO_SDK_PATH
   */
  static async resolveSdkPath(env: NodeJS.ProcessEnv = process.env): Promise<string> {
    const sdkPath = env[ENV_SDK_PATH];

    if (!sdkPath) {
      throw new ConfigurationError(`Unable to locate the Raspberry Pi Pico SDK, ${ENV_SDK_PATH} is not set`);
    }

    if (!(await Validator.isDirectory(sdkPath))) {
      throw new ConfigurationError(
        `Unable to locate the Raspberry Pi Pico SDK, ${ENV_SDK_PATH} does not point to a directory`
      );
    }

    if (!(await Validator.isValidSdkPath(sdkPath))) {
      Logger.warning(`${sdkPath} has no ${SDK_IMPORT_SOURCE}; project generation will fail`);
    }

    return path.resolve(sdkPath);
  }

  /**
   * Board names are the base names of the board headers in the SDK, plus any
   * found in the directories listed in PICO_BOARD_HEADER_DIRS
   */
  static async listBoards(sdkPath: string, env: NodeJS.ProcessEnv = process.env): Promise<string[]> {
    const dirs = [path.join(sdkPath, BOARD_HEADERS_DIR)];

    const extra = env[ENV_BOARD_HEADER_DIRS];
    if (extra) {
      dirs.push(...extra.split(path.delimiter).filter(dir => dir.trim().length > 0));
    }

    const boards = new Set<string>();
    for (const dir of dirs) {
      if (!(await Validator.isDirectory(dir))) {
        Logger.warning(`Board header directory not found: ${dir}`);
        continue;
      }

      const headers = await glob('*.h', { cwd: dir, nodir: true });
      headers.forEach(header => boards.add(path.basename(header, '.h')));
    }

    return [...boards].sort();
  }

  /**
   * Absolute path of the ARM compiler on PATH, or null
   */
  static async findCompiler(): Promise<string | null> {
    return Platform.which(`${COMPILER_NAME}${Platform.exeExtension()}`);
  }
}

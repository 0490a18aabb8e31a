import path from 'path';
import fs from 'fs-extra';

// Files the generated project is made of
export const CMAKELISTS_FILENAME = 'CMakeLists.txt';
export const CMAKE_CACHE_FILENAME = 'CMakeCache.txt';
export const SDK_IMPORT_FILENAME = 'pico_sdk_import.cmake';
export const BUILD_DIRNAME = 'build';

export const VSCODE_FOLDER = '.vscode';
export const VSCODE_LAUNCH_FILENAME = 'launch.json';
export const VSCODE_C_PROPERTIES_FILENAME = 'c_cpp_properties.json';
export const VSCODE_SETTINGS_FILENAME = 'settings.json';
export const VSCODE_EXTENSIONS_FILENAME = 'extensions.json';

// Toolchain
export const COMPILER_NAME = 'arm-none-eabi-gcc';
export const STANDARD_LIBRARIES = 'pico_stdlib';
export const MINIMUM_CMAKE_VERSION = '3.13';
export const MINIMUM_SDK_VERSION = '1.4.0';
export const PROGRAM_VERSION = '0.1';
export const C_STANDARD = '11';
export const CXX_STANDARD = '17';

// SDK layout, relative to PICO_SDK_PATH
export const SDK_IMPORT_SOURCE = path.join('external', SDK_IMPORT_FILENAME);
export const BOARD_HEADERS_DIR = path.join('src', 'boards', 'include', 'boards');

export const DEFAULT_BOARD = 'pico';

// Environment
export const ENV_SDK_PATH = 'PICO_SDK_PATH';
export const ENV_BOARD_HEADER_DIRS = 'PICO_BOARD_HEADER_DIRS';

export const CATALOG_FILENAME = 'catalog.json';
export const ADVANCED_CONFIG_FILENAME = 'pico_configs.tsv';
export const ANCILLARY_DIRNAME = 'ancillary';

let cachedDataDir: string | undefined;

/**
 * Directory holding the static data shipped with the tool. Found by walking up
 * from this module so it works from both `src/` and the compiled `dist/src/`.
 */
export function dataDir(): string {
  if (cachedDataDir) {
    return cachedDataDir;
  }

  let currentDir = __dirname;
  for (let i = 0; i < 5; i++) {
    const candidate = path.join(currentDir, 'data');
    if (fs.existsSync(path.join(candidate, CATALOG_FILENAME))) {
      cachedDataDir = candidate;
      return candidate;
    }
    currentDir = path.dirname(currentDir);
  }

  throw new Error(`Could not locate the data directory above ${__dirname}`);
}

export function dataPath(...segments: string[]): string {
  return path.join(dataDir(), ...segments);
}

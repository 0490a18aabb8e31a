import {
  C_STANDARD,
  CXX_STANDARD,
  MINIMUM_CMAKE_VERSION,
  MINIMUM_SDK_VERSION,
  PROGRAM_VERSION,
  SDK_IMPORT_FILENAME,
  STANDARD_LIBRARIES
} from '../config/constants';
import type { ConfigurationRecord } from '../types/config';
import { Platform } from '../utils/platform';
import type { FeatureCatalog } from './feature-catalog';
import { mainSourceFileName } from './source-generator';

const LIBRARY_INDENT = ' '.repeat(8);

/**
 * Values of boolean advanced settings arrive as "True"/"False"; the
 * preprocessor wants 1/0. Anything else is passed through untouched.
 */
export function toDefineValue(value: string): string {
  if (value === 'True') {
    return '1';
  }
  if (value === 'False') {
    return '0';
  }
  return value;
}

/**
 * Library targets to link for the effective feature list, in list order.
 * Keys without a descriptor or with an empty library name contribute nothing.
 */
export function resolveLibraries(effectiveFeatures: readonly string[], catalog: FeatureCatalog): string[] {
  const libraries: string[] = [];
  for (const key of effectiveFeatures) {
    const libraryName = catalog.lookup(key)?.libraryName;
    if (libraryName) {
      libraries.push(libraryName);
    }
  }
  return libraries;
}

/**
 * Render CMakeLists.txt for the project.
 *
 * The directive order is fixed and the output depends only on the inputs,
 * so rendering the same record twice gives identical text.
 */
export function renderBuildDescriptor(
  config: ConfigurationRecord,
  effectiveFeatures: readonly string[],
  catalog: FeatureCatalog
): string {
  const name = config.projectName;
  const sdkPath = Platform.toCMakePath(config.sdkPath);
  const lines: string[] = [];

  lines.push(
    '# Generated Cmake Pico project file',
    '',
    `cmake_minimum_required(VERSION ${MINIMUM_CMAKE_VERSION})`,
    '',
    `set(CMAKE_C_STANDARD ${C_STANDARD})`,
    `set(CMAKE_CXX_STANDARD ${CXX_STANDARD})`,
    '',
    '# Initialise pico_sdk from installed location',
    '# (note this can come from environment, CMake cache etc)',
    `set(PICO_SDK_PATH "${sdkPath}")`,
    '',
    `set(PICO_BOARD ${config.boardType} CACHE STRING "Board type")`,
    '',
    '# Pull in Raspberry Pi Pico SDK (must be before project)',
    `include(${SDK_IMPORT_FILENAME})`,
    '',
    `if (PICO_SDK_VERSION_STRING VERSION_LESS "${MINIMUM_SDK_VERSION}")`,
    `  message(FATAL_ERROR "Raspberry Pi Pico SDK version ${MINIMUM_SDK_VERSION} (or later) required. Your version is \${PICO_SDK_VERSION_STRING}")`,
    'endif()',
    '',
    `project(${name} C CXX ASM)`
  );

  if (config.languageMode === 'cpp' && config.cppExceptions) {
    lines.push('', 'set(PICO_CXX_ENABLE_EXCEPTIONS 1)');
  }

  if (config.languageMode === 'cpp' && config.cppRTTI) {
    lines.push('', 'set(PICO_CXX_ENABLE_RTTI 1)');
  }

  lines.push(
    '',
    '# Initialise the Raspberry Pi Pico SDK',
    'pico_sdk_init()',
    '',
    '# Add executable. Default name is the project name, version 0.1',
    ''
  );

  const defines = Object.entries(config.advancedDefines);
  if (defines.length > 0) {
    lines.push('# Add any PICO_CONFIG entries specified in the Advanced settings');
    for (const [define, value] of defines) {
      lines.push(`add_compile_definitions(${define}=${toDefineValue(value)})`);
    }
    lines.push('');
  }

  lines.push(
    `add_executable(${name} ${mainSourceFileName(name, config.languageMode)} )`,
    '',
    `pico_set_program_name(${name} "${name}")`,
    `pico_set_program_version(${name} "${PROGRAM_VERSION}")`,
    ''
  );

  if (config.runFromRAM) {
    lines.push(
      '# no_flash means the target is to run from RAM',
      `pico_set_binary_type(${name} no_flash)`,
      ''
    );
  }

  // Console routing is always explicit, never left to the SDK default
  lines.push(
    '# Modify the below lines to enable/disable output over UART/USB',
    `pico_enable_stdio_uart(${name} ${config.consoleUART ? 1 : 0})`,
    `pico_enable_stdio_usb(${name} ${config.consoleUSB ? 1 : 0})`,
    ''
  );

  lines.push(
    '# Add the standard library to the build',
    `target_link_libraries(${name}`,
    `${LIBRARY_INDENT}${STANDARD_LIBRARIES})`,
    ''
  );

  lines.push(
    '# Add the standard include files to the build',
    `target_include_directories(${name} PRIVATE`,
    '  ${CMAKE_CURRENT_LIST_DIR}',
    '  ${CMAKE_CURRENT_LIST_DIR}/.. # for our common lwipopts or any other standard includes, if required',
    ')',
    ''
  );

  if (effectiveFeatures.length > 0) {
    lines.push('# Add any user requested libraries', `target_link_libraries(${name}`);
    for (const library of resolveLibraries(effectiveFeatures, catalog)) {
      lines.push(`${LIBRARY_INDENT}${library}`);
    }
    lines.push(`${LIBRARY_INDENT})`, '');
  }

  lines.push(`pico_add_extra_outputs(${name})`, '');

  return lines.join('\n');
}

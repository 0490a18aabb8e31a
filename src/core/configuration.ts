import path from 'path';
import fs from 'fs-extra';
import { DEFAULT_BOARD } from '../config/constants';
import type { ConfigurationInput, ConfigurationRecord, IDE } from '../types/config';
import { Logger } from '../utils/logger';
import { Platform } from '../utils/platform';
import { Validator } from '../utils/validator';
import type { AdvancedConfigCatalog } from './advanced-config';
import { ConfigurationError } from './errors';
import type { FeatureCatalog } from './feature-catalog';

function dedupe(values: readonly string[]): string[] {
  return [...new Set(values)];
}

function resolveIdeTargets(targets: readonly string[]): IDE[] {
  const resolved: IDE[] = [];
  for (const target of targets) {
    if (!Validator.isValidIDE(target)) {
      throw new ConfigurationError(
        `Unsupported IDE: ${target}. Supported: ${Validator.supportedIDEs().join(', ')}`
      );
    }
    if (!resolved.includes(target)) {
      resolved.push(target);
    }
  }
  return resolved;
}

function resolveDefines(
  defines: Readonly<Record<string, string>>,
  advanced?: AdvancedConfigCatalog
): Record<string, string> {
  const entries: Array<[string, string]> = [];
  for (const [name, value] of Object.entries(defines)) {
    if (!Validator.isValidDefineName(name)) {
      throw new ConfigurationError(`Invalid define name: ${name}`);
    }
    // An empty catalog means nothing to check against
    if (advanced && advanced.size > 0) {
      const check = advanced.validate(name, value);
      if (!check.ok) {
        throw new ConfigurationError(check.error);
      }
      if (check.warning) {
        Logger.warning(check.warning);
      }
    }
    entries.push([name, value]);
  }
  return Object.fromEntries(entries);
}

/**
 * Validate raw front-end input and fill in defaults. The returned record is
 * frozen; every later stage reads from it.
 */
export async function buildConfigurationRecord(
  input: ConfigurationInput,
  catalog: FeatureCatalog,
  advanced?: AdvancedConfigCatalog
): Promise<ConfigurationRecord> {
  const projectName = input.projectName ?? '';
  if (!projectName) {
    throw new ConfigurationError('Project name is required');
  }
  if (!Validator.isValidProjectName(projectName)) {
    throw new ConfigurationError(
      `Invalid project name: ${projectName}. Use letters, digits, underscores and hyphens only`
    );
  }

  if (!input.sdkPath) {
    throw new ConfigurationError('SDK path is required');
  }
  if (!(await Validator.isDirectory(input.sdkPath))) {
    throw new ConfigurationError(`SDK path is not a directory: ${input.sdkPath}`);
  }

  const projectRoot = path.resolve(input.projectRoot ?? process.cwd());
  if (!(await fs.pathExists(projectRoot))) {
    throw new ConfigurationError(`Project root does not exist: ${projectRoot}`);
  }

  const languageMode = input.languageMode ?? 'c';
  if (!Validator.isValidLanguageMode(languageMode)) {
    throw new ConfigurationError(`Invalid language mode: ${languageMode}`);
  }
  const isCpp = languageMode === 'cpp';

  const debuggerChoice = input.debuggerChoice ?? 0;
  if (!Validator.isValidDebuggerIndex(debuggerChoice, catalog.debuggers.length)) {
    throw new ConfigurationError(
      `Invalid debugger choice ${debuggerChoice}; expected 0-${catalog.debuggers.length - 1}`
    );
  }

  const record: ConfigurationRecord = {
    sdkPath: path.resolve(input.sdkPath),
    projectRoot,
    projectName,
    boardType: input.boardType || DEFAULT_BOARD,
    selectedFeatures: Object.freeze(dedupe(input.selectedFeatures ?? [])),
    wantExamples: input.wantExamples ?? false,
    languageMode,
    consoleUART: input.consoleUART ?? true,
    consoleUSB: input.consoleUSB ?? false,
    runFromRAM: input.runFromRAM ?? false,
    overwriteExisting: input.overwriteExisting ?? false,
    advancedDefines: Object.freeze(resolveDefines(input.advancedDefines ?? {}, advanced)),
    ideTargets: Object.freeze(resolveIdeTargets(input.ideTargets ?? [])),
    debuggerChoice,
    cppExceptions: isCpp && (input.cppExceptions ?? false),
    cppRTTI: isCpp && (input.cppRTTI ?? false),
    compilerPath: input.compilerPath ?? '',
    gdbPath: input.gdbPath || Platform.defaultGdbPath(),
    runConfigure: input.runConfigure ?? true,
    runBuild: input.runBuild ?? false
  };

  return Object.freeze(record);
}

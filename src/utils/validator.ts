import path from 'path';
import fs from 'fs-extra';
import { SDK_IMPORT_SOURCE } from '../config/constants';
import type { IDE, LanguageMode } from '../types/config';

const SUPPORTED_IDES: readonly IDE[] = ['vscode'];

export class Validator {
  /**
   * Validate project name (alphanumeric, underscores, hyphens). The name
   * becomes a directory, a file base name and a CMake target.
   */
  static isValidProjectName(name: string): boolean {
    return /^[a-zA-Z0-9_-]+$/.test(name);
  }

  static isValidIDE(ide: string): ide is IDE {
    return SUPPORTED_IDES.some(supported => supported === ide);
  }

  static supportedIDEs(): readonly IDE[] {
    return SUPPORTED_IDES;
  }

  static isValidLanguageMode(mode: string): mode is LanguageMode {
    return mode === 'c' || mode === 'cpp';
  }

  /**
   * Debugger choice must be an integer index into the debugger list
   */
  static isValidDebuggerIndex(index: number, debuggerCount: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < debuggerCount;
  }

  /**
   * Preprocessor define names follow C identifier rules. `__proto__` is
   * refused: it cannot be a key of the define mapping.
   */
  static isValidDefineName(name: string): boolean {
    return /^[A-Za-z_][A-Za-z0-9_]*$/.test(name) && name !== '__proto__';
  }

  static async isDirectory(dir: string): Promise<boolean> {
    try {
      return (await fs.stat(dir)).isDirectory();
    } catch {
      return false;
    }
  }

  /**
   * An SDK checkout is usable when it carries the CMake import helper
   */
  static async isValidSdkPath(sdkPath: string): Promise<boolean> {
    if (!(await Validator.isDirectory(sdkPath))) {
      return false;
    }
    return fs.pathExists(path.join(sdkPath, SDK_IMPORT_SOURCE));
  }

  /**
   * Split a NAME=VALUE pair. Returns null when there is no '=' or the name is empty.
   */
  static parseDefine(pair: string): { name: string; value: string } | null {
    const index = pair.indexOf('=');
    if (index <= 0) {
      return null;
    }
    return {
      name: pair.slice(0, index).trim(),
      value: pair.slice(index + 1).trim()
    };
  }
}

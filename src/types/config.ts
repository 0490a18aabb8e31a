export type LanguageMode = 'c' | 'cpp';
export type IDE = 'vscode';

/**
 * Resolved user intent for one generation run. Built once by
 * `buildConfigurationRecord` and never mutated afterwards.
 */
export interface ConfigurationRecord {
  readonly sdkPath: string;
  readonly projectRoot: string;
  readonly projectName: string;
  readonly boardType: string;
  readonly selectedFeatures: readonly string[];
  readonly wantExamples: boolean;
  readonly languageMode: LanguageMode;
  readonly consoleUART: boolean;
  readonly consoleUSB: boolean;
  readonly runFromRAM: boolean;
  readonly overwriteExisting: boolean;
  readonly advancedDefines: Readonly<Record<string, string>>;
  readonly ideTargets: readonly IDE[];
  readonly debuggerChoice: number;
  readonly cppExceptions: boolean;
  readonly cppRTTI: boolean;
  readonly compilerPath: string;
  readonly gdbPath: string;
  readonly runConfigure: boolean;
  readonly runBuild: boolean;
}

/**
 * Raw front-end input. Everything except the name and the two paths has a default.
 */
export interface ConfigurationInput {
  sdkPath?: string;
  projectRoot?: string;
  projectName?: string;
  boardType?: string;
  selectedFeatures?: string[];
  wantExamples?: boolean;
  languageMode?: LanguageMode;
  consoleUART?: boolean;
  consoleUSB?: boolean;
  runFromRAM?: boolean;
  overwriteExisting?: boolean;
  advancedDefines?: Record<string, string>;
  ideTargets?: string[];
  debuggerChoice?: number;
  cppExceptions?: boolean;
  cppRTTI?: boolean;
  compilerPath?: string;
  gdbPath?: string;
  runConfigure?: boolean;
  runBuild?: boolean;
}

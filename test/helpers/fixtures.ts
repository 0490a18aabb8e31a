import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import type { BuildResult, BuildRunner } from '../../src/types/build';
import type { ConfigurationRecord } from '../../src/types/config';

export const SDK_IMPORT_CONTENT = '# stand-in for the SDK import helper\n';

export async function makeTempDir(prefix = 'pico-project-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

/**
 * Lay out the parts of an SDK checkout the generator reads: the CMake
 * import helper and the board headers directory.
 */
export async function createFakeSdk(root: string, boards: string[] = ['pico', 'pico_w']): Promise<string> {
  const sdkPath = path.join(root, 'pico-sdk');
  await fs.mkdir(path.join(sdkPath, 'external'), { recursive: true });
  await fs.writeFile(path.join(sdkPath, 'external', 'pico_sdk_import.cmake'), SDK_IMPORT_CONTENT);

  const boardsDir = path.join(sdkPath, 'src', 'boards', 'include', 'boards');
  await fs.mkdir(boardsDir, { recursive: true });
  for (const board of boards) {
    await fs.writeFile(path.join(boardsDir, `${board}.h`), `// ${board}\n`);
  }

  return sdkPath;
}

export function makeConfig(overrides: Partial<ConfigurationRecord> = {}): ConfigurationRecord {
  return {
    sdkPath: '/opt/pico-sdk',
    projectRoot: '/tmp/projects',
    projectName: 'blink',
    boardType: 'pico',
    selectedFeatures: [],
    wantExamples: false,
    languageMode: 'c',
    consoleUART: true,
    consoleUSB: false,
    runFromRAM: false,
    overwriteExisting: false,
    advancedDefines: {},
    ideTargets: [],
    debuggerChoice: 0,
    cppExceptions: false,
    cppRTTI: false,
    compilerPath: '/usr/bin/arm-none-eabi-gcc',
    gdbPath: 'gdb-multiarch',
    runConfigure: false,
    runBuild: false,
    ...overrides
  };
}

function result(command: string, exitCode: number): BuildResult {
  return {
    success: exitCode === 0,
    exitCode,
    stdout: '',
    stderr: exitCode < 0 ? `spawn ${command} ENOENT` : '',
    duration: 0
  };
}

/**
 * Records calls instead of running cmake and the build driver
 */
export class FakeBuildRunner implements BuildRunner {
  readonly buildTool = 'ninja';
  readonly calls: Array<{ step: 'configure' | 'build'; buildDir: string }> = [];

  constructor(
    private readonly configureExitCode = 0,
    private readonly buildExitCode = 0
  ) {}

  async configure(buildDir: string): Promise<BuildResult> {
    this.calls.push({ step: 'configure', buildDir });
    return result('cmake', this.configureExitCode);
  }

  async build(buildDir: string): Promise<BuildResult> {
    this.calls.push({ step: 'build', buildDir });
    return result(this.buildTool, this.buildExitCode);
  }
}

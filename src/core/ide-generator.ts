import {
  VSCODE_C_PROPERTIES_FILENAME,
  VSCODE_EXTENSIONS_FILENAME,
  VSCODE_LAUNCH_FILENAME,
  VSCODE_SETTINGS_FILENAME
} from '../config/constants';
import type { ConfigurationRecord, IDE } from '../types/config';
import type { IdeFiles } from '../types/generate';
import { Validator } from '../utils/validator';
import { ConfigurationError } from './errors';
import type { FeatureCatalog } from './feature-catalog';

const SVD_FILE = '${env:PICO_SDK_PATH}/src/rp2040/hardware_regs/rp2040.svd';
const TARGET_CONFIG = 'target/rp2040.cfg';
const LAUNCH_TARGET = '${command:cmake.launchTargetPath}';

function toJson(data: unknown): string {
  return JSON.stringify(data, null, 2) + '\n';
}

function renderLaunch(debuggerConfigFile: string, gdbPath: string): string {
  const restartAtMain = ['break main', 'continue'];

  return toJson({
    version: '0.2.0',
    configurations: [
      {
        name: 'Pico Debug (Cortex-Debug)',
        cwd: '${workspaceRoot}',
        executable: LAUNCH_TARGET,
        request: 'launch',
        type: 'cortex-debug',
        servertype: 'openocd',
        gdbPath,
        device: 'RP2040',
        configFiles: [`interface/${debuggerConfigFile}`, TARGET_CONFIG],
        svdFile: SVD_FILE,
        runToEntryPoint: 'main',
        postRestartCommands: restartAtMain,
        openOCDLaunchCommands: ['adapter speed 5000']
      },
      {
        name: 'Pico Debug (Cortex-Debug with external OpenOCD)',
        cwd: '${workspaceRoot}',
        executable: LAUNCH_TARGET,
        request: 'launch',
        type: 'cortex-debug',
        servertype: 'external',
        gdbTarget: 'localhost:3333',
        gdbPath,
        device: 'RP2040',
        svdFile: SVD_FILE,
        runToEntryPoint: 'main',
        postRestartCommands: restartAtMain
      },
      {
        name: 'Pico Debug (C++ Debugger)',
        type: 'cppdbg',
        request: 'launch',
        cwd: '${workspaceRoot}',
        program: LAUNCH_TARGET,
        MIMode: 'gdb',
        miDebuggerPath: gdbPath,
        miDebuggerServerAddress: 'localhost:3333',
        debugServerPath: 'openocd',
        debugServerArgs: `-f interface/${debuggerConfigFile} -f ${TARGET_CONFIG} -c "adapter speed 5000"`,
        serverStarted: 'Listening on port .* for gdb connections',
        filterStderr: true,
        stopAtEntry: true,
        hardwareBreakpoints: {
          require: true,
          limit: 4
        },
        preLaunchTask: 'Flash',
        svdPath: SVD_FILE
      }
    ]
  });
}

function renderCProperties(compilerPath: string): string {
  return toJson({
    configurations: [
      {
        name: 'Pico',
        includePath: ['${workspaceFolder}/**', '${env:PICO_SDK_PATH}/**'],
        defines: [],
        compilerPath,
        cStandard: 'c17',
        cppStandard: 'c++14',
        intelliSenseMode: 'linux-gcc-arm',
        configurationProvider: 'ms-vscode.cmake-tools'
      }
    ],
    version: 4
  });
}

function renderSettings(): string {
  const hidden = { visibility: 'hidden' };

  return toJson({
    'cmake.statusbar.advanced': {
      debug: hidden,
      launch: hidden,
      build: hidden,
      buildTarget: hidden
    },
    'cmake.buildBeforeRun': true,
    'cmake.configureOnOpen': true,
    'cmake.configureSettings': {
      CMAKE_MODULE_PATH: '${env:PICO_INSTALL_PATH}/pico-sdk-tools'
    },
    'cmake.generator': 'Ninja',
    'C_Cpp.default.configurationProvider': 'ms-vscode.cmake-tools'
  });
}

function renderExtensions(): string {
  return toJson({
    recommendations: [
      'marus25.cortex-debug',
      'ms-vscode.cmake-tools',
      'ms-vscode.cpptools',
      'ms-vscode.cpptools-extension-pack',
      'ms-vscode.vscode-serial-monitor'
    ]
  });
}

function renderVSCode(config: ConfigurationRecord, catalog: FeatureCatalog): IdeFiles {
  const debuggerEntry = catalog.debuggerAt(config.debuggerChoice);
  if (!debuggerEntry || !Validator.isValidDebuggerIndex(config.debuggerChoice, catalog.debuggers.length)) {
    throw new ConfigurationError(
      `Invalid debugger choice ${config.debuggerChoice}; expected 0-${catalog.debuggers.length - 1}`
    );
  }

  return {
    [VSCODE_LAUNCH_FILENAME]: renderLaunch(debuggerEntry.configFile, config.gdbPath),
    [VSCODE_C_PROPERTIES_FILENAME]: renderCProperties(config.compilerPath),
    [VSCODE_SETTINGS_FILENAME]: renderSettings(),
    [VSCODE_EXTENSIONS_FILENAME]: renderExtensions()
  };
}

const renderers: Record<IDE, (config: ConfigurationRecord, catalog: FeatureCatalog) => IdeFiles> = {
  vscode: renderVSCode
};

/**
 * Render editor and debugger integration files, keyed by file name. Returns
 * an empty map when no IDE was requested.
 */
export function renderIdeFiles(config: ConfigurationRecord, catalog: FeatureCatalog): IdeFiles {
  const files: IdeFiles = {};
  for (const ide of config.ideTargets) {
    Object.assign(files, renderers[ide](config, catalog));
  }
  return files;
}

import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../../../src/core/errors';
import { FeatureCatalog } from '../../../src/core/feature-catalog';
import { renderIdeFiles } from '../../../src/core/ide-generator';
import { makeConfig } from '../../helpers/fixtures';

describe('renderIdeFiles', () => {
  const catalog = FeatureCatalog.loadDefault();

  it('renders nothing when no IDE is requested', () => {
    expect(renderIdeFiles(makeConfig(), catalog)).toEqual({});
  });

  it('renders the four VS Code files', () => {
    const files = renderIdeFiles(makeConfig({ ideTargets: ['vscode'] }), catalog);

    expect(Object.keys(files).sort()).toEqual([
      'c_cpp_properties.json',
      'extensions.json',
      'launch.json',
      'settings.json'
    ]);
    for (const content of Object.values(files)) {
      expect(content.endsWith('}\n')).toBe(true);
    }
  });

  it('points the debug configurations at the chosen debugger', () => {
    const files = renderIdeFiles(makeConfig({ ideTargets: ['vscode'], debuggerChoice: 1 }), catalog);
    const launch = JSON.parse(files['launch.json']);

    expect(launch.configurations).toHaveLength(3);
    expect(launch.configurations[0].configFiles).toEqual(['interface/raspberrypi-swd.cfg', 'target/rp2040.cfg']);
    expect(launch.configurations[1].gdbTarget).toBe('localhost:3333');
    expect(launch.configurations[2].debugServerArgs).toBe(
      '-f interface/raspberrypi-swd.cfg -f target/rp2040.cfg -c "adapter speed 5000"'
    );
  });

  it('uses the configured gdb in every debug configuration', () => {
    const files = renderIdeFiles(makeConfig({ ideTargets: ['vscode'], gdbPath: 'arm-none-eabi-gdb' }), catalog);
    const launch = JSON.parse(files['launch.json']);

    expect(launch.configurations[0].gdbPath).toBe('arm-none-eabi-gdb');
    expect(launch.configurations[1].gdbPath).toBe('arm-none-eabi-gdb');
    expect(launch.configurations[2].miDebuggerPath).toBe('arm-none-eabi-gdb');
  });

  it('writes the compiler path into the IntelliSense configuration', () => {
    const files = renderIdeFiles(makeConfig({ ideTargets: ['vscode'] }), catalog);
    const properties = JSON.parse(files['c_cpp_properties.json']);

    expect(properties.configurations[0].compilerPath).toBe('/usr/bin/arm-none-eabi-gcc');
    expect(properties.configurations[0].configurationProvider).toBe('ms-vscode.cmake-tools');
  });

  it('recommends the debugging extensions', () => {
    const files = renderIdeFiles(makeConfig({ ideTargets: ['vscode'] }), catalog);

    expect(JSON.parse(files['extensions.json']).recommendations).toContain('marus25.cortex-debug');
  });

  it('rejects a debugger index outside the list', () => {
    const config = makeConfig({ ideTargets: ['vscode'], debuggerChoice: 2 });

    expect(() => renderIdeFiles(config, catalog)).toThrow(ConfigurationError);
    expect(() => renderIdeFiles(config, catalog)).toThrow('Invalid debugger choice 2; expected 0-1');
  });
});

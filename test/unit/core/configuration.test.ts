import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { ADVANCED_CONFIG_FILENAME, dataPath } from '../../../src/config/constants';
import { AdvancedConfigCatalog } from '../../../src/core/advanced-config';
import { buildConfigurationRecord } from '../../../src/core/configuration';
import { ConfigurationError } from '../../../src/core/errors';
import { FeatureCatalog } from '../../../src/core/feature-catalog';
import type { ConfigurationInput } from '../../../src/types/config';
import { Logger } from '../../../src/utils/logger';
import { Platform } from '../../../src/utils/platform';
import { createFakeSdk, makeTempDir } from '../../helpers/fixtures';

describe('buildConfigurationRecord', () => {
  const catalog = FeatureCatalog.loadDefault();
  let tmpDir: string;
  let sdkPath: string;

  function input(overrides: ConfigurationInput = {}): ConfigurationInput {
    return { sdkPath, projectRoot: tmpDir, projectName: 'blink', ...overrides };
  }

  beforeAll(() => Logger.setQuiet(true));
  afterAll(() => Logger.setQuiet(false));

  beforeEach(async () => {
    tmpDir = await makeTempDir();
    sdkPath = await createFakeSdk(tmpDir);
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('fills in defaults', async () => {
    const record = await buildConfigurationRecord(input(), catalog);

    expect(record).toEqual({
      sdkPath: path.resolve(sdkPath),
      projectRoot: path.resolve(tmpDir),
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
      compilerPath: '',
      gdbPath: Platform.defaultGdbPath(),
      runConfigure: true,
      runBuild: false
    });
  });

  it('returns a frozen record', async () => {
    const record = await buildConfigurationRecord(input({ selectedFeatures: ['spi'] }), catalog);

    expect(Object.isFrozen(record)).toBe(true);
    expect(Object.isFrozen(record.selectedFeatures)).toBe(true);
  });

  it('drops repeated features keeping the first occurrence', async () => {
    const record = await buildConfigurationRecord(input({ selectedFeatures: ['spi', 'i2c', 'spi', 'bogus'] }), catalog);

    expect(record.selectedFeatures).toEqual(['spi', 'i2c', 'bogus']);
  });

  it('turns the C++ options off for C projects', async () => {
    const record = await buildConfigurationRecord(input({ cppExceptions: true, cppRTTI: true }), catalog);

    expect(record.cppExceptions).toBe(false);
    expect(record.cppRTTI).toBe(false);
  });

  it('keeps the C++ options for C++ projects', async () => {
    const record = await buildConfigurationRecord(
      input({ languageMode: 'cpp', cppExceptions: true, cppRTTI: false }),
      catalog
    );

    expect(record.cppExceptions).toBe(true);
    expect(record.cppRTTI).toBe(false);
  });

  it('rejects an invalid project name', async () => {
    await expect(buildConfigurationRecord(input({ projectName: 'my project' }), catalog)).rejects.toThrow(
      'Invalid project name: my project. Use letters, digits, underscores and hyphens only'
    );
  });

  it('rejects a missing project name', async () => {
    await expect(buildConfigurationRecord(input({ projectName: '' }), catalog)).rejects.toThrow(
      'Project name is required'
    );
  });

  it('rejects an SDK path that is not a directory', async () => {
    const missing = path.join(tmpDir, 'missing-sdk');

    await expect(buildConfigurationRecord(input({ sdkPath: missing }), catalog)).rejects.toThrow(
      `SDK path is not a directory: ${missing}`
    );
  });

  it('rejects a missing project root', async () => {
    const missing = path.join(tmpDir, 'missing-root');

    await expect(buildConfigurationRecord(input({ projectRoot: missing }), catalog)).rejects.toThrow(
      `Project root does not exist: ${missing}`
    );
  });

  it('rejects a debugger index outside the list', async () => {
    await expect(buildConfigurationRecord(input({ debuggerChoice: 2 }), catalog)).rejects.toThrow(
      'Invalid debugger choice 2; expected 0-1'
    );
    await expect(buildConfigurationRecord(input({ debuggerChoice: -1 }), catalog)).rejects.toThrow(ConfigurationError);
  });

  it('rejects unsupported IDEs', async () => {
    await expect(buildConfigurationRecord(input({ ideTargets: ['eclipse'] }), catalog)).rejects.toThrow(
      'Unsupported IDE: eclipse. Supported: vscode'
    );
  });

  it('collapses repeated IDE targets', async () => {
    const record = await buildConfigurationRecord(input({ ideTargets: ['vscode', 'vscode'] }), catalog);

    expect(record.ideTargets).toEqual(['vscode']);
  });

  it('rejects define names that are not identifiers', async () => {
    await expect(
      buildConfigurationRecord(input({ advancedDefines: { '1BAD': '1' } }), catalog)
    ).rejects.toThrow('Invalid define name: 1BAD');
  });

  it('checks define values against the advanced settings', async () => {
    const advanced = AdvancedConfigCatalog.parse(
      'name\ttype\tdefault\tmax\tmin\tenumvalues\n' +
      'TEST_UART\tint\t0\t1\t0\t\n'
    );

    await expect(
      buildConfigurationRecord(input({ advancedDefines: { TEST_UART: '2' } }), catalog, advanced)
    ).rejects.toThrow('TEST_UART must be at most 1');

    const record = await buildConfigurationRecord(input({ advancedDefines: { TEST_UART: '1' } }), catalog, advanced);
    expect(record.advancedDefines).toEqual({ TEST_UART: '1' });
  });

  it('passes defines through unchecked with an empty settings catalog', async () => {
    const record = await buildConfigurationRecord(
      input({ advancedDefines: { ANYTHING: 'goes' } }),
      catalog,
      AdvancedConfigCatalog.empty()
    );

    expect(record.advancedDefines).toEqual({ ANYTHING: 'goes' });
  });

  describe('with the shipped advanced settings', () => {
    let shipped: AdvancedConfigCatalog;

    beforeAll(async () => {
      shipped = await AdvancedConfigCatalog.load(dataPath(ADVANCED_CONFIG_FILENAME));
    });

    it('passes through defines the settings table does not list', async () => {
      const record = await buildConfigurationRecord(
        input({ advancedDefines: { PICO_XOSC_STARTUP_DELAY_MULTIPLIER: '64' } }),
        catalog,
        shipped
      );

      expect(record.advancedDefines).toEqual({ PICO_XOSC_STARTUP_DELAY_MULTIPLIER: '64' });
    });

    it('accepts hex values for int settings', async () => {
      const record = await buildConfigurationRecord(
        input({ advancedDefines: { PICO_FLASH_SIZE_BYTES: '0x400000' } }),
        catalog,
        shipped
      );

      expect(record.advancedDefines).toEqual({ PICO_FLASH_SIZE_BYTES: '0x400000' });
    });

    it('accepts identifiers for int settings', async () => {
      const record = await buildConfigurationRecord(
        input({ advancedDefines: { PICO_PANIC_FUNCTION: 'my_panic' } }),
        catalog,
        shipped
      );

      expect(record.advancedDefines).toEqual({ PICO_PANIC_FUNCTION: 'my_panic' });
    });

    it('still checks the limits of numeric values', async () => {
      await expect(
        buildConfigurationRecord(input({ advancedDefines: { PICO_DEFAULT_UART: '0x2' } }), catalog, shipped)
      ).rejects.toThrow('PICO_DEFAULT_UART must be at most 1');
    });

    it('still checks boolean values', async () => {
      await expect(
        buildConfigurationRecord(input({ advancedDefines: { PICO_MALLOC_PANIC: 'yes' } }), catalog, shipped)
      ).rejects.toThrow('PICO_MALLOC_PANIC is a boolean; use True or False');
    });
  });

  it('rejects __proto__ as a define name', async () => {
    const defines = Object.fromEntries([['__proto__', '1']]);

    await expect(buildConfigurationRecord(input({ advancedDefines: defines }), catalog)).rejects.toThrow(
      'Invalid define name: __proto__'
    );
  });
});

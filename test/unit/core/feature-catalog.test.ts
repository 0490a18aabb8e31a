import { describe, it, expect } from 'vitest';
import { FeatureCatalog, type CatalogData } from '../../../src/core/feature-catalog';
import { ConfigurationError } from '../../../src/core/errors';

function minimalData(overrides: Partial<CatalogData> = {}): CatalogData {
  return {
    features: [{ key: 'spi', displayName: 'SPI', headerPath: 'hardware/spi.h', libraryName: 'hardware_spi' }],
    stdlibExamples: [{ key: 'uart', displayName: 'UART', headerPath: 'hardware/uart.h', libraryName: 'hardware_uart' }],
    debuggers: [{ displayName: 'Probe', configFile: 'cmsis-dap.cfg' }],
    ...overrides
  };
}

describe('FeatureCatalog', () => {
  describe('loadDefault', () => {
    const catalog = FeatureCatalog.loadDefault();

    it('lists peripheral features in table order', () => {
      expect(catalog.keys('features')).toEqual(['spi', 'i2c', 'dma', 'pio', 'interp', 'timer', 'watchdog', 'clocks']);
    });

    it('lists stdlib examples in table order', () => {
      expect(catalog.keys('stdlibExamples')).toEqual(['uart', 'gpio', 'div']);
    });

    it('resolves descriptors by key', () => {
      expect(catalog.lookup('watchdog')).toEqual({
        key: 'watchdog',
        displayName: 'HW watchdog',
        headerPath: 'hardware/watchdog.h',
        libraryName: 'hardware_watchdog',
        ancillaryFile: ''
      });
    });

    it('resolves wireless options', () => {
      expect(catalog.lookup('picow_poll')?.ancillaryFile).toBe('lwipopts.h');
      expect(catalog.lookup('picow_led')?.libraryName).toBe('pico_cyw43_arch_none');
    });

    it('returns undefined for unknown keys', () => {
      expect(catalog.lookup('bogus')).toBeUndefined();
      expect(catalog.has('bogus')).toBe(false);
      expect(catalog.fragment('bogus')).toBeUndefined();
    });

    it('indexes debuggers', () => {
      expect(catalog.debuggers).toHaveLength(2);
      expect(catalog.debuggerAt(1)?.configFile).toBe('raspberrypi-swd.cfg');
      expect(catalog.debuggerAt(2)).toBeUndefined();
      expect(catalog.debuggerAt(0.5)).toBeUndefined();
    });

    it('has fragments only for features that generate code', () => {
      expect(catalog.fragment('uart')?.defineLines[2]).toBe('#define UART_ID uart1');
      expect(catalog.fragment('dma')).toBeUndefined();
    });

    it('freezes descriptors', () => {
      expect(Object.isFrozen(catalog.lookup('spi'))).toBe(true);
      expect(Object.isFrozen(catalog.debuggers)).toBe(true);
    });
  });

  it('fills in empty defaults for optional descriptor fields', () => {
    const catalog = new FeatureCatalog(minimalData({
      wirelessOptions: [{ key: 'none', displayName: 'None' }]
    }));
    expect(catalog.lookup('none')).toEqual({
      key: 'none',
      displayName: 'None',
      headerPath: '',
      libraryName: '',
      ancillaryFile: ''
    });
  });

  it('rejects a duplicate key within a partition', () => {
    const data = minimalData({
      features: [
        { key: 'spi', displayName: 'SPI' },
        { key: 'spi', displayName: 'SPI again' }
      ]
    });
    expect(() => new FeatureCatalog(data)).toThrow(ConfigurationError);
    expect(() => new FeatureCatalog(data)).toThrow('Duplicate key "spi" in catalog partition features');
  });

  it('allows the same key in different partitions and prefers peripherals', () => {
    const catalog = new FeatureCatalog(minimalData({
      stdlibExamples: [{ key: 'spi', displayName: 'SPI example', libraryName: 'example_spi' }]
    }));
    expect(catalog.lookup('spi')?.libraryName).toBe('hardware_spi');
    expect(catalog.list('stdlibExamples')[0].libraryName).toBe('example_spi');
  });

  it('rejects duplicate fragments', () => {
    const data = minimalData({
      fragments: [{ key: 'spi' }, { key: 'spi' }]
    });
    expect(() => new FeatureCatalog(data)).toThrow('Duplicate code fragment for feature "spi"');
  });

  it('rejects a catalog without debuggers', () => {
    expect(() => new FeatureCatalog(minimalData({ debuggers: [] }))).toThrow(ConfigurationError);
  });

  it('rejects data of the wrong shape', () => {
    expect(() => new FeatureCatalog({ features: 'spi' })).toThrow(/^Invalid feature catalog at features/);
  });

  it('reports a missing catalog file', () => {
    expect(() => FeatureCatalog.fromFile('/nonexistent/catalog.json')).toThrow(
      /^Failed to load feature catalog from \/nonexistent\/catalog\.json/
    );
  });
});

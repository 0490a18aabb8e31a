import fs from 'fs-extra';
import { z } from 'zod';
import { CATALOG_FILENAME, dataPath } from '../config/constants';
import type { CatalogPartition, CodeFragment, DebuggerDescriptor, FeatureDescriptor } from '../types/catalog';
import { ConfigurationError } from './errors';

const featureSchema = z.object({
  key: z.string().min(1),
  displayName: z.string().min(1),
  headerPath: z.string().default(''),
  libraryName: z.string().default(''),
  ancillaryFile: z.string().default('')
});

const debuggerSchema = z.object({
  displayName: z.string().min(1),
  configFile: z.string().min(1)
});

const fragmentSchema = z.object({
  key: z.string().min(1),
  defineLines: z.array(z.string()).default([]),
  initLines: z.array(z.string()).default([])
});

const catalogSchema = z.object({
  features: z.array(featureSchema),
  stdlibExamples: z.array(featureSchema),
  wirelessOptions: z.array(featureSchema).default([]),
  debuggers: z.array(debuggerSchema).min(1),
  fragments: z.array(fragmentSchema).default([])
});

export type CatalogData = z.input<typeof catalogSchema>;

/**
 * Lookup order when a key exists in more than one partition
 */
export const PARTITION_ORDER: readonly CatalogPartition[] = ['features', 'stdlibExamples', 'wirelessOptions'];

/**
 * Immutable table of everything a generated project can be made of: peripheral
 * features, standard-library examples, wireless options, debuggers and the
 * source fragments that go with them.
 *
 * Built once and handed to the generators; iteration order is the order of
 * the source table.
 */
export class FeatureCatalog {
  private readonly partitions: ReadonlyMap<CatalogPartition, ReadonlyMap<string, FeatureDescriptor>>;
  private readonly fragments: ReadonlyMap<string, CodeFragment>;
  readonly debuggers: readonly DebuggerDescriptor[];

  /**
   * @param data - raw catalog table; validated here, so JSON straight from disk is fine
   */
  constructor(data: unknown) {
    const parsed = catalogSchema.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ConfigurationError(`Invalid feature catalog at ${issue.path.join('.')}: ${issue.message}`);
    }

    const partitions = new Map<CatalogPartition, ReadonlyMap<string, FeatureDescriptor>>();
    for (const partition of PARTITION_ORDER) {
      partitions.set(partition, FeatureCatalog.indexPartition(partition, parsed.data[partition]));
    }
    this.partitions = partitions;

    const fragments = new Map<string, CodeFragment>();
    for (const fragment of parsed.data.fragments) {
      if (fragments.has(fragment.key)) {
        throw new ConfigurationError(`Duplicate code fragment for feature "${fragment.key}"`);
      }
      fragments.set(fragment.key, Object.freeze({
        defineLines: Object.freeze([...fragment.defineLines]),
        initLines: Object.freeze([...fragment.initLines])
      }));
    }
    this.fragments = fragments;

    this.debuggers = Object.freeze(parsed.data.debuggers.map(d => Object.freeze({ ...d })));
  }

  /**
   * Load a catalog from a JSON file
   */
  static fromFile(filePath: string): FeatureCatalog {
    let data: unknown;
    try {
      data = fs.readJsonSync(filePath);
    } catch (error) {
      throw new ConfigurationError(
        `Failed to load feature catalog from ${filePath}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    return new FeatureCatalog(data);
  }

  /**
   * The catalog shipped with the tool
   */
  static loadDefault(): FeatureCatalog {
    return FeatureCatalog.fromFile(dataPath(CATALOG_FILENAME));
  }

  private static indexPartition(
    partition: CatalogPartition,
    entries: ReadonlyArray<FeatureDescriptor>
  ): ReadonlyMap<string, FeatureDescriptor> {
    const index = new Map<string, FeatureDescriptor>();
    for (const entry of entries) {
      if (index.has(entry.key)) {
        throw new ConfigurationError(`Duplicate key "${entry.key}" in catalog partition ${partition}`);
      }
      index.set(entry.key, Object.freeze({ ...entry }));
    }
    return index;
  }

  /**
   * All descriptors of a partition, in table order
   */
  list(partition: CatalogPartition): FeatureDescriptor[] {
    const entries = this.partitions.get(partition);
    return entries ? [...entries.values()] : [];
  }

  keys(partition: CatalogPartition): string[] {
    return this.list(partition).map(entry => entry.key);
  }

  /**
   * Resolve a key across partitions (peripherals, then examples, then
   * wireless options). Unknown keys resolve to undefined.
   */
  lookup(key: string): FeatureDescriptor | undefined {
    for (const partition of PARTITION_ORDER) {
      const entry = this.partitions.get(partition)?.get(key);
      if (entry) {
        return entry;
      }
    }
    return undefined;
  }

  has(key: string): boolean {
    return this.lookup(key) !== undefined;
  }

  fragment(key: string): CodeFragment | undefined {
    return this.fragments.get(key);
  }

  debuggerAt(index: number): DebuggerDescriptor | undefined {
    return Number.isInteger(index) ? this.debuggers[index] : undefined;
  }
}

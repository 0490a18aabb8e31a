import type { FeatureCatalog } from './feature-catalog';

/**
 * Build the effective feature list: every stdlib example key (in catalog
 * order) first when examples are wanted, then the explicit selection.
 * Repeated keys keep their first position. Unknown keys stay in the list;
 * the generators skip them.
 */
export function resolveEffectiveFeatures(
  selectedFeatures: readonly string[],
  wantExamples: boolean,
  catalog: FeatureCatalog
): string[] {
  const ordered = wantExamples
    ? [...catalog.keys('stdlibExamples'), ...selectedFeatures]
    : [...selectedFeatures];

  const seen = new Set<string>();
  const effective: string[] = [];
  for (const key of ordered) {
    if (!seen.has(key)) {
      seen.add(key);
      effective.push(key);
    }
  }
  return effective;
}

/**
 * Keys the catalog does not know about. Used by the CLI to warn; never an error.
 */
export function findUnknownFeatures(features: readonly string[], catalog: FeatureCatalog): string[] {
  return features.filter(key => !catalog.has(key));
}

/**
 * Ancillary files the selected features need copied into the project, without repeats
 */
export function collectAncillaryFiles(features: readonly string[], catalog: FeatureCatalog): string[] {
  const files: string[] = [];
  for (const key of features) {
    const file = catalog.lookup(key)?.ancillaryFile;
    if (file && !files.includes(file)) {
      files.push(file);
    }
  }
  return files;
}

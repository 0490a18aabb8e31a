export type CatalogPartition = 'features' | 'stdlibExamples' | 'wirelessOptions';

export interface FeatureDescriptor {
  readonly key: string;
  readonly displayName: string;
  readonly headerPath: string;
  readonly libraryName: string;
  readonly ancillaryFile: string;
}

export interface DebuggerDescriptor {
  readonly displayName: string;
  readonly configFile: string;
}

export interface CodeFragment {
  readonly defineLines: readonly string[];
  readonly initLines: readonly string[];
}

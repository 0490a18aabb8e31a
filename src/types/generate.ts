import type { BuildResult } from './build';

export type MaterializeStage =
  | 'PathValidated'
  | 'DirectoryCreated'
  | 'OverwriteChecked'
  | 'AncillaryCopied'
  | 'SourceGenerated'
  | 'BuildDescriptorGenerated'
  | 'FeatureFilesCopied'
  | 'BuildDirReady'
  | 'IdeGenerated'
  | 'ConfigureInvoked'
  | 'BuildInvoked'
  | 'Done';

export type OverwriteDecision =
  | { action: 'proceed' }
  | { action: 'abort'; reason: string };

export type IdeFiles = Record<string, string>;

export interface MaterializeResult {
  projectPath: string;
  createdFiles: string[];
  stages: MaterializeStage[];
  configure?: BuildResult;
  build?: BuildResult;
}

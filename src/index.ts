// API exports for programmatic usage

// Core functionality
import { FeatureCatalog } from './core/feature-catalog';
import { resolveEffectiveFeatures, findUnknownFeatures, collectAncillaryFiles } from './core/feature-resolver';
import { renderMainSource, mainSourceFileName } from './core/source-generator';
import { renderBuildDescriptor, resolveLibraries, toDefineValue } from './core/build-descriptor-generator';
import { renderIdeFiles } from './core/ide-generator';
import { buildConfigurationRecord } from './core/configuration';
import { ProjectMaterializer } from './core/project-materializer';
import { BuildExecutor, selectBuildPlan } from './core/build-executor';
import { SdkEnvironment } from './core/sdk-environment';
import { AdvancedConfigCatalog } from './core/advanced-config';

// Utilities
import { Logger } from './utils/logger';
import { Validator } from './utils/validator';
import { FileSystem } from './utils/file-system';
import { Platform } from './utils/platform';

// Re-exports
export {
  FeatureCatalog,
  resolveEffectiveFeatures,
  findUnknownFeatures,
  collectAncillaryFiles,
  renderMainSource,
  mainSourceFileName,
  renderBuildDescriptor,
  resolveLibraries,
  toDefineValue,
  renderIdeFiles,
  buildConfigurationRecord,
  ProjectMaterializer,
  BuildExecutor,
  selectBuildPlan,
  SdkEnvironment,
  AdvancedConfigCatalog
};
export { Logger, Validator, FileSystem, Platform };
export * from './core/errors';
export type { AdvancedConfigItem, ConfigItemType } from './core/advanced-config';
export type { CatalogData } from './core/feature-catalog';
export type { MaterializeOptions } from './core/project-materializer';

// Types
export * from './types/catalog';
export * from './types/config';
export * from './types/build';
export * from './types/generate';

// Command functions (for programmatic usage)
import { newCommand } from './commands/new';
import { featuresCommand } from './commands/features';
import { boardsCommand } from './commands/boards';
import { configsCommand } from './commands/configs';

export { newCommand, featuresCommand, boardsCommand, configsCommand };

/**
 * Main API for programmatic usage
 */
export class PicoProjectAPI {
  static catalog = {
    load: FeatureCatalog.loadDefault.bind(FeatureCatalog),
    fromFile: FeatureCatalog.fromFile.bind(FeatureCatalog)
  };

  static config = {
    build: buildConfigurationRecord,
    loadAdvanced: AdvancedConfigCatalog.load.bind(AdvancedConfigCatalog)
  };

  static generate = {
    source: renderMainSource,
    buildDescriptor: renderBuildDescriptor,
    ideFiles: renderIdeFiles,
    materialize: ProjectMaterializer.materialize.bind(ProjectMaterializer),
    checkForExistingProject: ProjectMaterializer.checkForExistingProject.bind(ProjectMaterializer)
  };

  static sdk = {
    resolve: SdkEnvironment.resolveSdkPath.bind(SdkEnvironment),
    boards: SdkEnvironment.listBoards.bind(SdkEnvironment),
    findCompiler: SdkEnvironment.findCompiler.bind(SdkEnvironment)
  };

  static utils = {
    logger: Logger,
    validator: Validator,
    fileSystem: FileSystem,
    platform: Platform
  };
}

// Default export
export default PicoProjectAPI;

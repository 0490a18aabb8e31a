import path from 'path';
import fs from 'fs-extra';
import {
  ANCILLARY_DIRNAME,
  BUILD_DIRNAME,
  CMAKE_CACHE_FILENAME,
  CMAKELISTS_FILENAME,
  SDK_IMPORT_FILENAME,
  SDK_IMPORT_SOURCE,
  VSCODE_FOLDER,
  dataPath
} from '../config/constants';
import type { BuildRunner } from '../types/build';
import type { ConfigurationRecord } from '../types/config';
import type { MaterializeResult, MaterializeStage, OverwriteDecision } from '../types/generate';
import { FileSystem } from '../utils/file-system';
import { Logger } from '../utils/logger';
import { renderBuildDescriptor } from './build-descriptor-generator';
import { BuildExecutor } from './build-executor';
import { CollisionError, ConfigurationError, ExternalToolError } from './errors';
import type { FeatureCatalog } from './feature-catalog';
import { collectAncillaryFiles, resolveEffectiveFeatures } from './feature-resolver';
import { renderIdeFiles } from './ide-generator';
import { mainSourceFileName, renderMainSource } from './source-generator';

export interface MaterializeOptions {
  /** Runs cmake and the build driver; detected on the host when omitted */
  runner?: BuildRunner;
  /** Directory holding per-feature ancillary files */
  ancillaryDir?: string;
}

export class ProjectMaterializer {
  static projectPath(config: ConfigurationRecord): string {
    return path.join(config.projectRoot, config.projectName);
  }

  /**
   * Files a run would write, relative to the project directory, in write order
   */
  static plannedFiles(config: ConfigurationRecord, catalog: FeatureCatalog): string[] {
    const features = resolveEffectiveFeatures(config.selectedFeatures, config.wantExamples, catalog);
    const files = [
      SDK_IMPORT_FILENAME,
      mainSourceFileName(config.projectName, config.languageMode),
      CMAKELISTS_FILENAME,
      ...collectAncillaryFiles(features, catalog)
    ];

    if (config.ideTargets.length > 0) {
      files.push(...Object.keys(renderIdeFiles(config, catalog)).map(file => `${VSCODE_FOLDER}/${file}`));
    }

    return files;
  }

  /**
   * Decide whether generation may write into the project directory. A
   * CMakeLists.txt marks an existing project.
   */
  static async checkForExistingProject(config: ConfigurationRecord): Promise<OverwriteDecision> {
    const cmakeLists = path.join(ProjectMaterializer.projectPath(config), CMAKELISTS_FILENAME);

    if (config.overwriteExisting || !(await fs.pathExists(cmakeLists))) {
      return { action: 'proceed' };
    }

    return {
      action: 'abort',
      reason: `${cmakeLists} already exists`
    };
  }

  /**
   * Write the project to disk and optionally configure and build it.
   * Steps run one after another; a failure stops the run and leaves what
   * was already written in place.
   */
  static async materialize(
    config: ConfigurationRecord,
    catalog: FeatureCatalog,
    options: MaterializeOptions = {}
  ): Promise<MaterializeResult> {
    const projectPath = ProjectMaterializer.projectPath(config);
    const createdFiles: string[] = [];
    const stages: MaterializeStage[] = [];
    const result: MaterializeResult = { projectPath, createdFiles, stages };

    const enter = (stage: MaterializeStage): void => {
      stages.push(stage);
      Logger.debug(`Stage: ${stage}`);
    };

    const write = async (filePath: string, content: string): Promise<void> => {
      await FileSystem.writeText(filePath, content);
      createdFiles.push(filePath);
    };

    const copy = async (src: string, dest: string): Promise<void> => {
      await FileSystem.copyFile(src, dest);
      createdFiles.push(dest);
    };

    if (!(await fs.pathExists(config.projectRoot))) {
      throw new ConfigurationError(`Project root does not exist: ${config.projectRoot}`);
    }
    enter('PathValidated');

    await FileSystem.ensureDirectory(projectPath);
    enter('DirectoryCreated');

    const decision = await ProjectMaterializer.checkForExistingProject(config);
    if (decision.action === 'abort') {
      throw new CollisionError(
        `${decision.reason}; use --overwrite to replace the existing project`,
        projectPath
      );
    }
    enter('OverwriteChecked');

    await copy(path.join(config.sdkPath, SDK_IMPORT_SOURCE), path.join(projectPath, SDK_IMPORT_FILENAME));
    enter('AncillaryCopied');

    const features = resolveEffectiveFeatures(config.selectedFeatures, config.wantExamples, catalog);

    await write(
      path.join(projectPath, mainSourceFileName(config.projectName, config.languageMode)),
      renderMainSource(features, config.languageMode, catalog)
    );
    enter('SourceGenerated');

    await write(path.join(projectPath, CMAKELISTS_FILENAME), renderBuildDescriptor(config, features, catalog));
    enter('BuildDescriptorGenerated');

    const ancillaryDir = options.ancillaryDir ?? dataPath(ANCILLARY_DIRNAME);
    for (const file of collectAncillaryFiles(features, catalog)) {
      await copy(path.join(ancillaryDir, file), path.join(projectPath, file));
    }
    enter('FeatureFilesCopied');

    const buildDir = path.join(projectPath, BUILD_DIRNAME);
    await FileSystem.ensureDirectory(buildDir);
    if (await FileSystem.removeFileIfExists(path.join(buildDir, CMAKE_CACHE_FILENAME))) {
      Logger.debug(`Removed stale ${CMAKE_CACHE_FILENAME}`);
    }
    enter('BuildDirReady');

    if (config.ideTargets.length > 0) {
      const ideDir = path.join(projectPath, VSCODE_FOLDER);
      await FileSystem.ensureDirectory(ideDir);
      for (const [fileName, content] of Object.entries(renderIdeFiles(config, catalog))) {
        await write(path.join(ideDir, fileName), content);
      }
      enter('IdeGenerated');
    }

    if (config.runConfigure || config.runBuild) {
      const runner = options.runner ?? (await BuildExecutor.forHost());

      if (config.runConfigure) {
        const configure = await runner.configure(buildDir);
        result.configure = configure;
        if (!configure.success) {
          throw new ExternalToolError('cmake', configure.exitCode, configure.stderr);
        }
        enter('ConfigureInvoked');
      }

      if (config.runBuild) {
        const build = await runner.build(buildDir);
        result.build = build;
        if (!build.success) {
          throw new ExternalToolError(runner.buildTool, build.exitCode, build.stderr);
        }
        enter('BuildInvoked');
      }
    }

    enter('Done');
    return result;
  }
}

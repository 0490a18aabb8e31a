export type BuildTool = 'ninja' | 'make' | 'nmake' | 'mingw32-make';

export interface CommandLine {
  command: string;
  args: string[];
}

export interface BuildPlan {
  tool: BuildTool;
  generator?: string;
  configure: CommandLine;
  build: CommandLine;
}

export interface BuildResult {
  success: boolean;
  exitCode: number;
  stdout: string;
  stderr: string;
  duration: number;
  error?: string;
}

/**
 * Runs the external configure and build steps inside a project's build directory.
 */
export interface BuildRunner {
  /** Name of the build driver, used when reporting a failed build */
  readonly buildTool: string;
  configure(buildDir: string): Promise<BuildResult>;
  build(buildDir: string): Promise<BuildResult>;
}

import execa from 'execa';
import type { BuildPlan, BuildResult, BuildRunner, BuildTool, CommandLine } from '../types/build';
import { Logger } from '../utils/logger';
import { Platform } from '../utils/platform';

const PROBED_TOOLS: readonly BuildTool[] = ['ninja', 'mingw32-make'];

/**
 * Pick the CMake generator and build driver for a host.
 *
 * Windows prefers MinGW make when present (MSYS/MinGW installs), then Ninja
 * (the official Windows installer ships it), then NMake. Other hosts use Ninja
 * when installed and fall back to make with one job per CPU.
 */
export function selectBuildPlan(
  platform: NodeJS.Platform,
  availableTools: ReadonlySet<string>,
  cpuCount: number
): BuildPlan {
  let tool: BuildTool;
  let generator: string | undefined;
  let build: CommandLine;

  if (Platform.isWindows(platform)) {
    if (availableTools.has('mingw32-make')) {
      tool = 'mingw32-make';
      generator = 'MinGW Makefiles';
      build = { command: 'mingw32-make', args: [] };
    } else if (availableTools.has('ninja')) {
      tool = 'ninja';
      generator = 'Ninja';
      build = { command: 'ninja', args: [] };
    } else {
      tool = 'nmake';
      generator = 'NMake Makefiles';
      build = { command: 'nmake', args: [] };
    }
  } else if (availableTools.has('ninja')) {
    tool = 'ninja';
    generator = 'Ninja';
    build = { command: 'ninja', args: [] };
  } else {
    tool = 'make';
    build = { command: 'make', args: [`-j${Math.max(cpuCount, 1)}`] };
  }

  const configureArgs = ['-DCMAKE_BUILD_TYPE=Debug'];
  if (generator) {
    configureArgs.push('-G', generator);
  }
  configureArgs.push('..');

  return {
    tool,
    generator,
    configure: { command: 'cmake', args: configureArgs },
    build
  };
}

export class BuildExecutor implements BuildRunner {
  constructor(private readonly plan: BuildPlan) {}

  /**
   * Probe the host for the optional build tools and return an executor for the best plan
   */
  static async forHost(): Promise<BuildExecutor> {
    const available = await BuildExecutor.detectAvailableTools();
    const plan = selectBuildPlan(process.platform, available, Platform.cpuCount());
    Logger.debug(`Build plan: ${plan.tool}${plan.generator ? ` (${plan.generator})` : ''}`);
    return new BuildExecutor(plan);
  }

  static async detectAvailableTools(): Promise<Set<string>> {
    const available = new Set<string>();
    for (const tool of PROBED_TOOLS) {
      if (await Platform.which(tool)) {
        available.add(tool);
      }
    }
    return available;
  }

  get buildTool(): string {
    return this.plan.build.command;
  }

  /**
   * Run CMake in the build directory
   */
  async configure(buildDir: string): Promise<BuildResult> {
    return this.execute(this.plan.configure, buildDir);
  }

  /**
   * Run the build driver in the build directory
   */
  async build(buildDir: string): Promise<BuildResult> {
    return this.execute(this.plan.build, buildDir);
  }

  private async execute(commandLine: CommandLine, cwd: string): Promise<BuildResult> {
    const startTime = Date.now();
    Logger.command(commandLine.command, commandLine.args);

    try {
      const childProcess = execa(commandLine.command, commandLine.args, {
        cwd,
        stdio: 'pipe',
        reject: false
      });

      // Stream output
      if (childProcess.stdout) {
        childProcess.stdout.on('data', (data: Buffer) => {
          process.stdout.write(data.toString());
        });
      }

      if (childProcess.stderr) {
        childProcess.stderr.on('data', (data: Buffer) => {
          process.stderr.write(data.toString());
        });
      }

      const result = await childProcess;
      const buildResult: BuildResult = {
        success: result.exitCode === 0,
        exitCode: typeof result.exitCode === 'number' ? result.exitCode : -1,
        stdout: result.stdout ?? '',
        stderr: result.stderr ?? '',
        duration: Date.now() - startTime
      };

      // A command that could not be spawned has no exit code; execa says why
      if (typeof result.exitCode !== 'number') {
        const reason = 'shortMessage' in result && typeof result.shortMessage === 'string'
          ? result.shortMessage
          : `${commandLine.command} could not be started`;
        buildResult.stderr = buildResult.stderr ? `${buildResult.stderr}\n${reason}` : reason;
        buildResult.error = `Failed to run ${commandLine.command}: ${reason}`;
      } else if (!buildResult.success) {
        buildResult.error = `${commandLine.command} failed with exit code ${buildResult.exitCode}`;
      }

      return buildResult;

    } catch (error) {
      return {
        success: false,
        exitCode: -1,
        stdout: '',
        stderr: error instanceof Error ? error.message : String(error),
        duration: Date.now() - startTime,
        error: `Failed to run ${commandLine.command}`
      };
    }
  }
}

import os from 'os';
import execa from 'execa';

export class Platform {
  /**
   * Check if running on Windows
   */
  static isWindows(platform: NodeJS.Platform = process.platform): boolean {
    return platform === 'win32';
  }

  /**
   * Get platform-specific executable extension
   */
  static exeExtension(platform: NodeJS.Platform = process.platform): string {
    return Platform.isWindows(platform) ? '.exe' : '';
  }

  /**
   * GDB that understands ARM targets: the toolchain's own on Windows,
   * the distribution's multiarch build elsewhere
   */
  static defaultGdbPath(platform: NodeJS.Platform = process.platform): string {
    return Platform.isWindows(platform) ? 'arm-none-eabi-gdb' : 'gdb-multiarch';
  }

  static cpuCount(): number {
    return Math.max(os.cpus().length, 1);
  }

  /**
   * CMake accepts forward slashes on every host, so paths written into
   * CMakeLists.txt always use them
   */
  static toCMakePath(p: string): string {
    return p.replace(/\\/g, '/');
  }

  /**
   * Locate an executable on PATH. Returns the first match or null.
   */
  static async which(command: string): Promise<string | null> {
    const finder = Platform.isWindows() ? 'where' : 'which';
    const result = await execa(finder, [command], { reject: false });
    if (result.exitCode !== 0) {
      return null;
    }
    const first = result.stdout.split(/\r?\n/).find(line => line.trim().length > 0);
    return first ? first.trim() : null;
  }
}

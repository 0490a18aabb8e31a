export type ErrorKind = 'configuration' | 'collision' | 'io' | 'external-tool';

export class ProjectGenerationError extends Error {
  constructor(
    message: string,
    public readonly kind: ErrorKind,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ProjectGenerationError';
  }
}

export class ConfigurationError extends ProjectGenerationError {
  constructor(message: string) {
    super(message, 'configuration');
    this.name = 'ConfigurationError';
  }
}

export class CollisionError extends ProjectGenerationError {
  constructor(message: string, public readonly projectPath: string) {
    super(message, 'collision');
    this.name = 'CollisionError';
  }
}

export class FileSystemError extends ProjectGenerationError {
  constructor(message: string, public readonly filePath: string, cause?: unknown) {
    const detail = cause instanceof Error ? `: ${cause.message}` : '';
    super(`${message}${detail}`, 'io', { cause });
    this.name = 'FileSystemError';
  }
}

/**
 * A negative exit code means the tool never ran; `reason` then says why.
 */
export class ExternalToolError extends ProjectGenerationError {
  constructor(
    public readonly tool: string,
    public readonly exitCode: number,
    reason?: string,
  ) {
    super(
      exitCode < 0 && reason ? `${tool} could not be run: ${reason}` : `${tool} failed with exit code ${exitCode}`,
      'external-tool',
    );
    this.name = 'ExternalToolError';
  }
}

export function isProjectGenerationError(error: unknown): error is ProjectGenerationError {
  return error instanceof ProjectGenerationError;
}

/**
 * Process exit status for a failed run.
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof ExternalToolError && error.exitCode > 0) {
    return error.exitCode;
  }
  return 1;
}

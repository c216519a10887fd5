/**
 * Error Types
 *
 * Every failure the lifecycle engine raises on purpose is a UnitsError with a
 * stable `code`, so the CLI can report it without inspecting messages.
 */

export type UnitsErrorCode =
  | 'CONFIG'
  | 'APP_NOT_FOUND'
  | 'MANIFEST'
  | 'EMPTY_MANIFEST'
  | 'COLLISION'
  | 'COPY'
  | 'SERVICE_COMMAND'
  | 'PRIVILEGE';

export class UnitsError extends Error {
  public readonly code: UnitsErrorCode;

  constructor(code: UnitsErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'UnitsError';
    this.code = code;
  }
}

/**
 * Missing or malformed configuration (an app's config.toml or the environment)
 */
export class ConfigError extends UnitsError {
  public readonly path: string | null;

  constructor(
    message: string,
    path: string | null = null,
    options?: { cause?: unknown },
    code: Extract<UnitsErrorCode, 'CONFIG' | 'APP_NOT_FOUND'> = 'CONFIG'
  ) {
    super(code, message, options);
    this.name = 'ConfigError';
    this.path = path;
  }
}

/**
 * The named application has no directory under the fleet root
 */
export class AppNotFoundError extends ConfigError {
  public readonly appName: string;

  constructor(appName: string, path: string) {
    super(`App '${appName}' not found at ${path}`, path, undefined, 'APP_NOT_FOUND');
    this.name = 'AppNotFoundError';
    this.appName = appName;
  }
}

export class ManifestError extends UnitsError {
  public readonly sourceDir: string;

  constructor(sourceDir: string, options?: { cause?: unknown }) {
    const reason = describeError(options?.cause);
    super(
      'MANIFEST',
      `Failed to read app files from ${sourceDir}${reason ? `: ${reason}` : ''}`,
      options
    );
    this.name = 'ManifestError';
    this.sourceDir = sourceDir;
  }
}

export class EmptyManifestError extends UnitsError {
  public readonly appName: string;

  constructor(appName: string) {
    super('EMPTY_MANIFEST', `No files found for app ${appName}`);
    this.name = 'EmptyManifestError';
    this.appName = appName;
  }
}

export class CollisionError extends UnitsError {
  public readonly targetPath: string;

  constructor(targetPath: string) {
    super('COLLISION', `File ${targetPath} already exists. Use --force to overwrite.`);
    this.name = 'CollisionError';
    this.targetPath = targetPath;
  }
}

export class CopyError extends UnitsError {
  public readonly sourcePath: string;
  public readonly targetPath: string;

  constructor(sourcePath: string, targetPath: string, options?: { cause?: unknown }) {
    const reason = describeError(options?.cause);
    super(
      'COPY',
      `Failed to copy ${sourcePath} to ${targetPath}${reason ? `: ${reason}` : ''}`,
      options
    );
    this.name = 'CopyError';
    this.sourcePath = sourcePath;
    this.targetPath = targetPath;
  }
}

/**
 * A mutating service manager command (start, stop, daemon-reload, log follow)
 * exited non-zero or could not be spawned
 */
export class ServiceCommandError extends UnitsError {
  public readonly command: string;
  public readonly exitCode: number | null;

  constructor(
    command: string,
    exitCode: number | null,
    message?: string,
    options?: { cause?: unknown }
  ) {
    super(
      'SERVICE_COMMAND',
      message ??
        (exitCode === null
          ? `Command '${command}' could not be run`
          : `Command '${command}' exited with code ${exitCode}`),
      options
    );
    this.name = 'ServiceCommandError';
    this.command = command;
    this.exitCode = exitCode;
  }
}

export class PrivilegeError extends UnitsError {
  constructor(message = 'This command must be run as root (for systemd operations)') {
    super('PRIVILEGE', message);
    this.name = 'PrivilegeError';
  }
}

export function isUnitsError(error: unknown): error is UnitsError {
  return error instanceof UnitsError;
}

/**
 * Best-effort message for anything thrown
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (error === undefined || error === null) return '';
  return String(error);
}

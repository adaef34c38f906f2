export enum InstallerErrorCode {
  COMMAND_FAILED = 'COMMAND_FAILED',
  COMMAND_SPAWN_FAILED = 'COMMAND_SPAWN_FAILED',
  FETCH_FAILED = 'FETCH_FAILED',
  FILESYSTEM_FAILED = 'FILESYSTEM_FAILED',
  CONFIG_INVALID = 'CONFIG_INVALID',
  PREFLIGHT_FAILED = 'PREFLIGHT_FAILED',
  BUILD_FAILED = 'BUILD_FAILED',
}

export class InstallerError extends Error {
  readonly code: InstallerErrorCode
  readonly context?: Record<string, unknown>

  constructor(code: InstallerErrorCode, message: string, context?: Record<string, unknown>) {
    super(message)
    this.name = 'InstallerError'
    this.code = code
    this.context = context
  }
}

export function isInstallerError(error: unknown, code?: InstallerErrorCode): error is InstallerError {
  return error instanceof InstallerError && (code === undefined || error.code === code)
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

import type { InstallerSettings } from '../settings.js'
import type { Configuration } from '../wizard/types.js'

export interface InstallerOptions {
  dryRun: boolean
  reboot: boolean
}

export interface RunOptions {
  stdin?: string
  env?: Record<string, string>
  cwd?: string
}

/** Spawns one external program; rejects when it cannot start or exits non-zero. */
export type CommandRunner = (
  program: string,
  args: readonly string[],
  options?: RunOptions
) => Promise<void>

export interface CommandExecutor {
  run(program: string, args?: readonly string[], options?: RunOptions): Promise<void>
  /** Runs a program inside the mounted target root, arguments passed as-is. */
  runInTarget(program: string, args?: readonly string[], options?: RunOptions): Promise<void>
  /** Runs a shell command line inside the target root through /bin/bash -c. */
  runInTargetShell(command: string): Promise<void>
}

export interface InstallerContext {
  cwd: string
  logFile: string
  settings: InstallerSettings
  options: InstallerOptions
  logger: Logger
  exec: CommandExecutor
}

export type InstallConfig = Readonly<Configuration>

export interface Logger {
  log: (msg: string) => void
  info: (msg: string) => void
  ok: (msg: string) => void
  warn: (msg: string) => void
  err: (msg: string) => void
  step: (msg: string) => void
  // log file only
  debug: (msg: string) => void
}

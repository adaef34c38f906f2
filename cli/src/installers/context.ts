import { createExecutor, createRunner } from './exec.js'
import { createLogger } from './logger.js'
import type { InstallerSettings } from '../settings.js'
import type { InstallerContext, InstallerOptions, Logger } from './types.js'

export function createContext(
  settings: InstallerSettings,
  options: InstallerOptions,
  logFile: string,
  logger: Logger = createLogger(logFile)
): InstallerContext {
  return {
    cwd: process.cwd(),
    logFile,
    settings,
    options,
    logger,
    exec: createExecutor(settings.mountRoot, createRunner({ dryRun: options.dryRun, logger }))
  }
}

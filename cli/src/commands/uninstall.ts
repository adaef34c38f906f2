import { defineCommand } from 'citty'
import { createContext } from '../installers/context.js'
import { resolveLogFile } from '../installers/logger.js'
import { selfUninstall } from '../installers/selfUninstall.js'
import { loadSettings } from '../settings.js'

export const uninstallCommand = defineCommand({
  meta: { name: 'uninstall', description: 'Remove the installer and its assets from this system' },
  args: {
    'dry-run': { type: 'boolean', description: 'Print actions without making changes' },
    config: { type: 'string', description: 'Settings file' }
  },
  async run({ args }) {
    const settings = await loadSettings(args.config ? String(args.config) : undefined)
    const ctx = createContext(
      settings,
      { dryRun: Boolean(args['dry-run']), reboot: false },
      resolveLogFile(settings.logFile)
    )
    await selfUninstall(ctx)
  }
})

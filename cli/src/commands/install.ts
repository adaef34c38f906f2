import { defineCommand } from 'citty'
import * as path from 'path'
import * as p from '@clack/prompts'
import { runInstaller } from '../installers/main.js'
import { createContext } from '../installers/context.js'
import { describeError } from '../installers/errors.js'
import { resolveLogFile } from '../installers/logger.js'
import { assertPrerequisites } from '../installers/preflight.js'
import { DEFAULT_SETTINGS_PATH, loadSettings } from '../settings.js'
import { summaryLines } from '../wizard/render.js'
import { runWizard } from '../wizard/terminal.js'

export const installCommand = defineCommand({
  meta: {
    name: 'install',
    description: 'Collect choices in the terminal wizard, then provision the target disk'
  },
  args: {
    'dry-run': { type: 'boolean', description: 'Print actions without making changes' },
    config: { type: 'string', description: `Settings file (default ${DEFAULT_SETTINGS_PATH})` },
    reboot: { type: 'boolean', default: true, description: 'Reboot when done (--no-reboot to skip)' },
    'log-file': { type: 'string', description: 'Write the install log to PATH' }
  },
  async run({ args }) {
    const settings = await loadSettings(args.config ? String(args.config) : undefined)
    const dryRun = Boolean(args['dry-run'])

    // The wizard owns the terminal until it returns; nothing destructive happens before that.
    const result = await runWizard({ imageDir: path.join(settings.assetDir, 'images') })
    if (result.kind === 'aborted') {
      p.cancel('Install aborted')
      return
    }

    const logFile = resolveLogFile(args['log-file'] ? String(args['log-file']) : settings.logFile)
    const ctx = createContext(settings, { dryRun, reboot: args.reboot !== false }, logFile)

    p.intro(dryRun ? 'HackerOS · Install (dry run)' : 'HackerOS · Install')
    p.note(summaryLines(result.config).join('\n'), 'Configuration')
    try {
      await assertPrerequisites(result.config, ctx)
      await runInstaller(result.config, ctx)
      p.outro(dryRun ? 'Dry run finished' : 'Install finished')
    } catch (error) {
      ctx.logger.debug(`install failed: ${error instanceof Error && error.stack ? error.stack : String(error)}`)
      p.cancel(`Installation failed: ${describeError(error)}`)
      p.log.info(`Full log: ${logFile}`)
      throw error
    }
  }
})

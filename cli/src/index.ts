import { defineCommand } from 'citty'
import { readFileSync } from 'fs'
import { fileURLToPath } from 'url'
import { dirname, join } from 'path'
import { installCommand } from './commands/install.js'
import { doctorCommand } from './commands/doctor.js'
import { uninstallCommand } from './commands/uninstall.js'
import { buildIsoCommand } from './commands/buildIso.js'

const __dirname = dirname(fileURLToPath(import.meta.url))
const packageJson: { version: string } = JSON.parse(
  readFileSync(join(__dirname, '../../package.json'), 'utf-8')
)

export const root = defineCommand({
  meta: {
    name: 'hackeros-installer',
    version: packageJson.version,
    description: 'Install HackerOS onto a disk from a terminal wizard'
  },
  subCommands: {
    install: installCommand,
    doctor: doctorCommand,
    uninstall: uninstallCommand,
    'build-iso': buildIsoCommand
  }
})

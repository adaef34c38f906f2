import { defineCommand } from 'citty'
import { ALL_TOOLS, isRoot, missingTools } from '../installers/preflight.js'

export const doctorCommand = defineCommand({
  meta: { name: 'doctor', description: 'Check that this host has what an install needs' },
  async run() {
    const missing = await missingTools(ALL_TOOLS)
    const present = ALL_TOOLS.filter((t) => !missing.includes(t))
    const root = isRoot()

    const lines: string[] = []
    lines.push('')
    lines.push('hackeros-installer: environment check')
    lines.push('─────────────────────────────────────')
    lines.push(`Running as root: ${root ? 'yes' : 'no'}`)
    lines.push(`Tools found: ${present.join(', ') || 'none'}`)
    lines.push(`Tools missing: ${missing.join(', ') || 'none'}`)
    lines.push('')
    process.stdout.write(lines.join('\n') + '\n')
    if (missing.length > 0 || !root) process.exitCode = 1
  }
})

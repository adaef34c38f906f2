import { defineCommand } from 'citty'
import * as p from '@clack/prompts'
import fs from 'fs-extra'
import { resolve } from 'path'
import { $ } from 'zx'
import { InstallerError, InstallerErrorCode, describeError } from '../installers/errors.js'

export const ISO_CONFIG_FILE = 'config-hackeros.hacker'
export const ISO_CONFIG_DIR = 'config'

const DISTRIBUTIONS = new Map<string, string>([
  ['lts', 'trixie'],
  ['normal', 'forky']
])

export function distributionFor(version: string): string {
  const dist = DISTRIBUTIONS.get(version.toLowerCase())
  if (!dist) {
    throw new InstallerError(
      InstallerErrorCode.CONFIG_INVALID,
      `Unknown version: ${version}. Supported: 'lts' or 'normal'.`
    )
  }
  return dist
}

/** Reads the image version from the first entry of the JSON array in the build config. */
export async function readIsoVersion(dir: string): Promise<string> {
  const file = resolve(dir, ISO_CONFIG_FILE)
  if (!(await fs.pathExists(file))) {
    throw new InstallerError(InstallerErrorCode.CONFIG_INVALID, `Config file '${ISO_CONFIG_FILE}' not found in ${dir}`)
  }
  if (!(await fs.pathExists(resolve(dir, ISO_CONFIG_DIR)))) {
    throw new InstallerError(InstallerErrorCode.CONFIG_INVALID, `Config directory '${ISO_CONFIG_DIR}' not found in ${dir}`)
  }

  let parsed: unknown
  try {
    parsed = JSON.parse((await fs.readFile(file, 'utf8')).trim())
  } catch (error) {
    throw new InstallerError(InstallerErrorCode.CONFIG_INVALID, `Could not parse ${ISO_CONFIG_FILE}: ${describeError(error)}`)
  }
  if (!Array.isArray(parsed) || typeof parsed[0] !== 'string') {
    throw new InstallerError(
      InstallerErrorCode.CONFIG_INVALID,
      `Invalid ${ISO_CONFIG_FILE}: expected an array starting with a string, e.g. ["lts"]`
    )
  }
  return parsed[0]
}

export async function runLiveBuild(dist: string, dir: string): Promise<void> {
  const sh = $({ cwd: dir })
  const steps: string[][] = [['clean'], ['config', '--distribution', dist], ['build']]
  for (const args of steps) {
    try {
      await sh`lb ${args}`
    } catch (error) {
      throw new InstallerError(InstallerErrorCode.BUILD_FAILED, `lb ${args.join(' ')} failed: ${describeError(error)}`, {
        step: args[0]
      })
    }
  }
}

export const buildIsoCommand = defineCommand({
  meta: { name: 'build-iso', description: 'Build a live image with live-build from config-hackeros.hacker' },
  args: {
    dir: { type: 'string', description: 'Build directory (default: current directory)' }
  },
  async run({ args }) {
    const dir = resolve(args.dir ? String(args.dir) : process.cwd())
    const version = await readIsoVersion(dir)
    const dist = distributionFor(version)

    p.intro(`HackerOS · Build image (${dist})`)
    const s = p.spinner()
    s.start('Running lb clean, lb config and lb build')
    try {
      await runLiveBuild(dist, dir)
      s.stop('Image built')
      p.outro(`Image available in ${dir}`)
    } catch (error) {
      s.stop('Build failed')
      p.cancel(describeError(error))
      throw error
    }
  }
})

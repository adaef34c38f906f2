import fs from 'fs-extra'
import * as TOML from 'toml'
import { z } from 'zod'
import { InstallerError, InstallerErrorCode, describeError } from './installers/errors.js'

export const DEFAULT_SETTINGS_PATH = '/etc/hackeros-installer/installer.toml'

const settingsSchema = z
  .object({
    mount_root: z.string().startsWith('/', 'must be an absolute path').default('/mnt'),
    mirror: z.string().url().default('http://deb.debian.org/debian'),
    sources_list: z.string().default('/etc/apt/sources.list'),
    asset_dir: z.string().default('/usr/share/HackerOS-Installer'),
    log_file: z.string().default('/var/log/hackeros-installer.log'),
    partition: z
      .object({
        boot_size: z
          .string()
          .regex(/^\d+(KiB|MiB|GiB|K|M|G)$/, 'expected a size such as 512MiB')
          .default('512MiB')
      })
      .strict()
      .default({}),
    self_uninstall: z
      .object({
        paths: z
          .array(z.string())
          .default(['/usr/bin/HackerOS-Installer', '/etc/profile.d/HackerOS-Installer.sh'])
      })
      .strict()
      .default({}),
    hooks: z
      .object({ post_install: z.array(z.string()).default([]) })
      .strict()
      .default({})
  })
  .strict()
  .transform((s) => ({
    mountRoot: s.mount_root.replace(/(.)\/+$/, '$1'),
    mirror: s.mirror,
    sourcesList: s.sources_list,
    assetDir: s.asset_dir,
    logFile: s.log_file,
    partition: { bootSize: s.partition.boot_size },
    selfUninstall: { paths: s.self_uninstall.paths },
    hooks: { postInstall: s.hooks.post_install }
  }))

export type InstallerSettings = z.output<typeof settingsSchema>

export function parseSettings(raw: unknown, source = 'settings'): InstallerSettings {
  const result = settingsSchema.safeParse(raw)
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
    throw new InstallerError(
      InstallerErrorCode.CONFIG_INVALID,
      `Invalid ${source}: ${issues.join('; ')}`,
      { issues }
    )
  }
  return result.data
}

export function defaultSettings(): InstallerSettings {
  return parseSettings({})
}

/**
 * Reads installer settings from `path`, or from the system-wide file when it
 * exists. Without either, built-in defaults apply.
 */
export async function loadSettings(path?: string): Promise<InstallerSettings> {
  const file = path ?? DEFAULT_SETTINGS_PATH
  if (!(await fs.pathExists(file))) {
    if (path) {
      throw new InstallerError(InstallerErrorCode.CONFIG_INVALID, `Settings file not found: ${path}`)
    }
    return defaultSettings()
  }

  const text = await fs.readFile(file, 'utf8')
  let raw: unknown
  try {
    raw = TOML.parse(text)
  } catch (error) {
    throw new InstallerError(
      InstallerErrorCode.CONFIG_INVALID,
      `Could not parse ${file}: ${describeError(error)}`
    )
  }
  return parseSettings(raw, file)
}

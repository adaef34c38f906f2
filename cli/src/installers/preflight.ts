import { InstallerError, InstallerErrorCode } from './errors.js'
import { needCmd } from './utils.js'
import type { FilesystemKind } from '../wizard/types.js'
import type { InstallConfig, InstallerContext } from './types.js'

const BASE_TOOLS = ['apt-get', 'mount', 'umount', 'debootstrap', 'chroot', 'mkfs.fat']

const FILESYSTEM_TOOLS: Record<FilesystemKind, string[]> = {
  btrfs: ['mkfs.btrfs'],
  ext4: ['mkfs.ext4'],
  zfs: ['zpool', 'zfs']
}

/** Every host tool any configuration might need, for `doctor`. */
export const ALL_TOOLS = [
  ...BASE_TOOLS,
  'sfdisk',
  'cfdisk',
  ...Object.values(FILESYSTEM_TOOLS).flat(),
  'git',
  'reboot'
]

export function requiredTools(config: InstallConfig, options: { reboot: boolean }): string[] {
  const tools = [...BASE_TOOLS, config.manualPartition ? 'cfdisk' : 'sfdisk', ...FILESYSTEM_TOOLS[config.filesystem]]
  if (config.edition === 'hydra') tools.push('git')
  if (options.reboot) tools.push('reboot')
  return tools
}

export async function missingTools(tools: readonly string[]): Promise<string[]> {
  const missing: string[] = []
  for (const tool of tools) {
    if (!(await needCmd(tool))) missing.push(tool)
  }
  return missing
}

export function isRoot(): boolean {
  return process.getuid?.() === 0
}

/** Fails before anything destructive runs when the host lacks a needed tool. */
export async function assertPrerequisites(config: InstallConfig, ctx: InstallerContext): Promise<void> {
  if (ctx.options.dryRun) return
  if (!isRoot()) {
    throw new InstallerError(InstallerErrorCode.PREFLIGHT_FAILED, 'The installer must run as root')
  }
  const missing = await missingTools(requiredTools(config, ctx.options))
  if (missing.length > 0) {
    throw new InstallerError(
      InstallerErrorCode.PREFLIGHT_FAILED,
      `Missing required tools: ${missing.join(', ')}`,
      { missing }
    )
  }
}

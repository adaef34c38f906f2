import * as path from 'path'
import { aptInstallInTarget, aptUpdateInTarget } from './apt.js'
import { fstabContent } from './createFilesystems.js'
import { movePath, removePath, writeTextFile } from './utils.js'
import type { PartitionLayout } from './partitionDisk.js'
import type { InstallConfig, InstallerContext } from './types.js'

export const BASE_PACKAGES = ['linux-image-amd64', 'grub-efi-amd64', 'sudo']

export function sudoersEntry(username: string): string {
  return `${username} ALL=(ALL:ALL) ALL\n`
}

export async function installBasePackages(ctx: InstallerContext): Promise<void> {
  await aptUpdateInTarget(ctx)
  await aptInstallInTarget(ctx, BASE_PACKAGES)
}

/**
 * Creates the account with sudo membership. Name and password are passed as
 * arguments and on stdin, never through a shell.
 */
export async function createUser(config: InstallConfig, ctx: InstallerContext): Promise<void> {
  const { username, password } = config
  await ctx.exec.runInTarget('useradd', ['-m', '-G', 'sudo', '-s', '/bin/bash', username])
  await ctx.exec.runInTarget('chpasswd', [], { stdin: `${username}:${password}\n` })

  // sudo skips names containing a dot, so the staged file is inert until moved.
  const staged = `/etc/sudoers.d/.${username}.new`
  const inTarget = (file: string) => path.join(ctx.settings.mountRoot, file)
  await writeTextFile(ctx, inTarget(staged), sudoersEntry(username), 0o440)
  try {
    await ctx.exec.runInTarget('visudo', ['-cf', staged])
  } catch (error) {
    await removePath(ctx, inTarget(staged))
    throw error
  }
  await movePath(ctx, inTarget(staged), inTarget(`/etc/sudoers.d/${username}`))
  ctx.logger.ok(`User ${username} created`)
}

export async function writeSystemIdentity(
  config: InstallConfig,
  layout: PartitionLayout,
  ctx: InstallerContext
): Promise<void> {
  const etc = path.join(ctx.settings.mountRoot, 'etc')
  await writeTextFile(ctx, path.join(etc, 'hostname'), `${config.hostname}\n`)
  await writeTextFile(ctx, path.join(etc, 'fstab'), fstabContent(config, layout))
}

import * as path from 'path'
import { FILESYSTEMS } from './createFilesystems.js'
import type { MountStack } from './mounts.js'
import type { PartitionLayout } from './partitionDisk.js'
import type { InstallConfig, InstallerContext } from './types.js'

export const BIND_DIRS = ['/dev', '/proc', '/sys', '/run'] as const

export async function mountTarget(
  mounts: MountStack,
  config: InstallConfig,
  layout: PartitionLayout,
  ctx: InstallerContext
): Promise<void> {
  const { mountRoot } = ctx.settings
  const fsSpec = FILESYSTEMS[config.filesystem]
  await mounts.mount(fsSpec.mountSource(layout.root), mountRoot, { type: fsSpec.mountType })
  await mounts.mount(layout.boot, path.join(mountRoot, 'boot'))
}

export async function bindHostFilesystems(mounts: MountStack, ctx: InstallerContext): Promise<void> {
  for (const dir of BIND_DIRS) {
    await mounts.mount(dir, path.join(ctx.settings.mountRoot, dir), { bind: true })
  }
}

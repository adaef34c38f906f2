import type { FilesystemKind } from '../wizard/types.js'
import type { MountStack } from './mounts.js'
import type { PartitionLayout } from './partitionDisk.js'
import type { InstallConfig, InstallerContext } from './types.js'

export const ZFS_POOL = 'rpool'
export const ZFS_ROOT_DATASET = `${ZFS_POOL}/ROOT`

interface FilesystemSpec {
  format: (root: string) => Array<[string, string[]]>
  /** Pool imported by the first format command; exported again on release. */
  pool?: string
  mountSource: (root: string) => string
  mountType?: string
  fstab: (root: string) => string
}

export const FILESYSTEMS: Record<FilesystemKind, FilesystemSpec> = {
  btrfs: {
    format: (root) => [['mkfs.btrfs', ['-f', root]]],
    mountSource: (root) => root,
    fstab: (root) => `${root} / btrfs defaults 0 0`
  },
  ext4: {
    format: (root) => [['mkfs.ext4', ['-F', root]]],
    mountSource: (root) => root,
    fstab: (root) => `${root} / ext4 errors=remount-ro 0 1`
  },
  zfs: {
    format: (root) => [
      ['zpool', ['create', '-f', '-O', 'mountpoint=none', ZFS_POOL, root]],
      ['zfs', ['create', '-o', 'mountpoint=legacy', ZFS_ROOT_DATASET]]
    ],
    pool: ZFS_POOL,
    mountSource: () => ZFS_ROOT_DATASET,
    mountType: 'zfs',
    fstab: () => `${ZFS_ROOT_DATASET} / zfs defaults 0 0`
  }
}

export function fstabContent(config: InstallConfig, layout: PartitionLayout): string {
  return [
    '# <file system> <mount point> <type> <options> <dump> <pass>',
    FILESYSTEMS[config.filesystem].fstab(layout.root),
    `${layout.boot} /boot vfat umask=0077 0 2`,
    ''
  ].join('\n')
}

export async function createFilesystems(
  mounts: MountStack,
  config: InstallConfig,
  layout: PartitionLayout,
  ctx: InstallerContext
): Promise<void> {
  await ctx.exec.run('mkfs.fat', ['-F', '32', layout.boot])
  const { format, pool } = FILESYSTEMS[config.filesystem]
  for (const [index, [program, args]] of format(layout.root).entries()) {
    await ctx.exec.run(program, args)
    if (index === 0 && pool) mounts.hold(`pool ${pool}`, () => ctx.exec.run('zpool', ['export', pool]))
  }
}

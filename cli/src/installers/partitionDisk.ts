import type { InstallConfig, InstallerContext } from './types.js'

export interface PartitionLayout {
  boot: string
  root: string
}

/** `/dev/sda` + 2 → `/dev/sda2`; `/dev/nvme0n1` + 2 → `/dev/nvme0n1p2`. */
export function partitionPath(disk: string, index: number): string {
  return /\d$/.test(disk) ? `${disk}p${index}` : `${disk}${index}`
}

export function partitionLayout(disk: string): PartitionLayout {
  return { boot: partitionPath(disk, 1), root: partitionPath(disk, 2) }
}

// GPT: EFI system partition first, root on the remainder.
export function sfdiskScript(bootSize: string): string {
  return ['label: gpt', `,${bootSize},U`, ',,L', ''].join('\n')
}

export async function partitionDisk(config: InstallConfig, ctx: InstallerContext): Promise<void> {
  if (config.manualPartition) {
    ctx.logger.info(`Opening cfdisk on ${config.disk}; create the boot partition first, then root`)
    await ctx.exec.run('cfdisk', [config.disk])
    return
  }
  const { bootSize } = ctx.settings.partition
  ctx.logger.info(`Writing GPT to ${config.disk}: ${bootSize} boot + remaining root`)
  await ctx.exec.run('sfdisk', ['--wipe', 'always', config.disk], { stdin: sfdiskScript(bootSize) })
}

import { bootstrapBase } from './bootstrapBase.js'
import { configureRepository } from './configureRepository.js'
import { createFilesystems } from './createFilesystems.js'
import { installBootloader, runPostInstallHooks } from './installBootloader.js'
import { installEdition } from './installEdition.js'
import { bindHostFilesystems, mountTarget } from './mountTarget.js'
import { withMounts } from './mounts.js'
import { partitionDisk, partitionLayout } from './partitionDisk.js'
import { selfUninstall } from './selfUninstall.js'
import { createUser, installBasePackages, writeSystemIdentity } from './setupSystem.js'
import type { InstallConfig, InstallerContext } from './types.js'

async function phase(ctx: InstallerContext, title: string, action: () => Promise<void>): Promise<void> {
  ctx.logger.step(title)
  await action()
}

/**
 * Provisions `config.disk` end to end. Phases run strictly in order and the
 * first failure stops the run; mounts taken along the way are released
 * before the error propagates. Self-uninstall and reboot only happen after
 * everything else succeeded.
 */
export async function runInstaller(config: InstallConfig, ctx: InstallerContext): Promise<void> {
  const layout = partitionLayout(config.disk)

  await phase(ctx, 'Configuring package repository', () => configureRepository(config, ctx))
  await phase(ctx, `Partitioning ${config.disk}`, () => partitionDisk(config, ctx))

  // A zfs pool is held from its creation on, so it is exported after the
  // final unmount on success and on failure alike.
  await withMounts(ctx, async (mounts) => {
    await phase(ctx, `Creating ${config.filesystem} filesystem`, () =>
      createFilesystems(mounts, config, layout, ctx)
    )
    await phase(ctx, `Mounting target at ${ctx.settings.mountRoot}`, () =>
      mountTarget(mounts, config, layout, ctx)
    )
    await phase(ctx, 'Bootstrapping base system', () => bootstrapBase(config, ctx))
    await phase(ctx, 'Binding host filesystems', () => bindHostFilesystems(mounts, ctx))
    await phase(ctx, 'Installing base packages and user', async () => {
      await installBasePackages(ctx)
      await createUser(config, ctx)
    })
    await phase(ctx, 'Writing hostname and fstab', () => writeSystemIdentity(config, layout, ctx))
    await phase(ctx, 'Installing edition', () => installEdition(config, ctx))
    await phase(ctx, 'Installing bootloader', async () => {
      await installBootloader(config, ctx)
      await runPostInstallHooks(ctx)
    })
    ctx.logger.step('Unmounting target')
  })

  await phase(ctx, 'Removing installer files', () => selfUninstall(ctx))

  if (!ctx.options.reboot) {
    ctx.logger.ok('Installation complete; reboot skipped')
    return
  }
  ctx.logger.ok('Installation complete; rebooting')
  await ctx.exec.run('reboot')
}

import type { InstallConfig, InstallerContext } from './types.js'

export const BOOTLOADER_ID = 'HackerOS'

export async function installBootloader(config: InstallConfig, ctx: InstallerContext): Promise<void> {
  await ctx.exec.runInTarget('grub-install', [
    '--target=x86_64-efi',
    '--efi-directory=/boot',
    `--bootloader-id=${BOOTLOADER_ID}`,
    '--removable',
    config.disk
  ])
  await ctx.exec.runInTarget('update-grub')
}

/** Operator-provided shell snippets from the settings file, run in the installed system. */
export async function runPostInstallHooks(ctx: InstallerContext): Promise<void> {
  for (const hook of ctx.settings.hooks.postInstall) {
    ctx.logger.info(`Post-install hook: ${hook}`)
    await ctx.exec.runInTargetShell(hook)
  }
}

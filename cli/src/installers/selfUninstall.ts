import { removePath } from './utils.js'
import type { InstallerContext } from './types.js'

export function selfUninstallPaths(ctx: Pick<InstallerContext, 'settings'>): string[] {
  return [ctx.settings.assetDir, ...ctx.settings.selfUninstall.paths]
}

/** Removes the installer's own files from the live system. */
export async function selfUninstall(ctx: InstallerContext): Promise<void> {
  for (const target of selfUninstallPaths(ctx)) {
    await removePath(ctx, target)
  }
  ctx.logger.ok('Installer files removed from the live system')
}

import { codenameFor } from './configureRepository.js'
import type { InstallConfig, InstallerContext } from './types.js'

export async function bootstrapBase(config: InstallConfig, ctx: InstallerContext): Promise<void> {
  const { mountRoot, mirror } = ctx.settings
  await ctx.exec.run('debootstrap', [codenameFor(config.branch), mountRoot, mirror])
}

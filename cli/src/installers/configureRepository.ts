import { BRANCH_CODENAMES } from '../wizard/types.js'
import type { Branch } from '../wizard/types.js'
import { writeTextFile } from './utils.js'
import type { InstallConfig, InstallerContext } from './types.js'

export function codenameFor(branch: Branch): string {
  return BRANCH_CODENAMES[branch]
}

export function sourcesLine(branch: Branch, mirror: string): string {
  return `deb ${mirror} ${codenameFor(branch)} main`
}

/** Points the live system at the chosen branch (overwriting the source list) and refreshes the index. */
export async function configureRepository(config: InstallConfig, ctx: InstallerContext): Promise<void> {
  const { sourcesList, mirror } = ctx.settings
  await writeTextFile(ctx, sourcesList, `${sourcesLine(config.branch, mirror)}\n`)
  ctx.logger.info(`Package source set to ${codenameFor(config.branch)} in ${sourcesList}`)
  await ctx.exec.run('apt-get', ['update'])
}

import type { InstallerContext } from './types.js'

const APT_ENV = { DEBIAN_FRONTEND: 'noninteractive' }

export async function aptUpdateInTarget(ctx: InstallerContext): Promise<void> {
  await ctx.exec.runInTarget('apt-get', ['update'], { env: APT_ENV })
}

export async function aptInstallInTarget(ctx: InstallerContext, packages: readonly string[]): Promise<void> {
  await ctx.exec.runInTarget('apt-get', ['install', '-y', ...packages], { env: APT_ENV })
}

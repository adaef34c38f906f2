import fs from 'fs-extra'
import * as os from 'os'
import * as path from 'path'
import type { Edition } from '../wizard/types.js'
import { aptInstallInTarget } from './apt.js'
import { fetchArtifact } from './fetchArtifact.js'
import { copyTree, ensureDirectory } from './utils.js'
import type { InstallConfig, InstallerContext } from './types.js'

const BLUE_RELEASE = 'https://github.com/HackerOS-Linux-System/Blue-Environment/releases/download/v0.1'
const BLUE_DESKTOP_ENTRY =
  'https://raw.githubusercontent.com/HackerOS-Linux-System/Blue-Environment/main/Blue-Environment.desktop'
const BLUE_COMPONENTS = ['wm', 'shell', 'launcher', 'Desktop', 'decorations', 'core']

const HAMMER_RELEASE = 'https://github.com/HackerOS-Linux-System/hammer/releases/download/v0.5'
const HAMMER_COMPONENTS = ['hammer-updater', 'hammer-tui', 'hammer-core', 'hammer-builder']

export const HYDRA_REPO = 'https://github.com/HackerOS-Linux-System/hydra-look-and-feel.git'

export const EDITION_PACKAGES = {
  official: ['kde-plasma-desktop', 'sddm'],
  gnome: ['gnome', 'gdm3'],
  xfce: ['xfce4', 'lightdm'],
  wayfire: ['wayfire', 'sddm'],
  cybersecurity: ['nmap', 'wireshark', 'tcpdump', 'aircrack-ng', 'john', 'sqlmap']
} satisfies Partial<Record<Edition, string[]>>

type EditionAction = (config: InstallConfig, ctx: InstallerContext) => Promise<void>

function inTarget(ctx: InstallerContext, ...segments: string[]): string {
  return path.join(ctx.settings.mountRoot, ...segments)
}

function download(ctx: InstallerContext, url: string, destination: string): Promise<void> {
  return fetchArtifact(url, destination, { dryRun: ctx.options.dryRun, logger: ctx.logger })
}

const installPackages =
  (packages: readonly string[]): EditionAction =>
  (_config, ctx) =>
    aptInstallInTarget(ctx, packages)

async function installBlue(config: InstallConfig, ctx: InstallerContext): Promise<void> {
  const userDir = `/home/${config.username}/.hackeros`
  const componentDir = inTarget(ctx, userDir, 'Blue-Environment')
  await ensureDirectory(ctx, componentDir)
  for (const name of BLUE_COMPONENTS) {
    await download(ctx, `${BLUE_RELEASE}/${name}`, path.join(componentDir, name))
  }
  await download(ctx, `${BLUE_RELEASE}/Blue-Environment`, inTarget(ctx, 'usr/bin/Blue-Environment'))
  await download(
    ctx,
    BLUE_DESKTOP_ENTRY,
    inTarget(ctx, 'usr/share/wayland-sessions/Blue-Environment.desktop')
  )
  await ctx.exec.runInTarget('chown', ['-R', `${config.username}:${config.username}`, userDir])
  await aptInstallInTarget(ctx, ['sddm'])
}

async function overlayHydra(ctx: InstallerContext, workDir: string): Promise<void> {
  const checkout = path.join(workDir, 'hydra-look-and-feel')
  await ctx.exec.run('git', ['clone', '--depth', '1', HYDRA_REPO, checkout])
  await copyTree(ctx, path.join(checkout, 'files'), ctx.settings.mountRoot)
}

async function installHydra(_config: InstallConfig, ctx: InstallerContext): Promise<void> {
  // Dry runs log against a placeholder path and leave the host untouched.
  if (ctx.options.dryRun) return overlayHydra(ctx, path.join(os.tmpdir(), 'hydra-XXXXXX'))

  const workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'hydra-'))
  try {
    await overlayHydra(ctx, workDir)
  } finally {
    await fs.remove(workDir)
  }
}

async function installAtomic(_config: InstallConfig, ctx: InstallerContext): Promise<void> {
  await download(ctx, `${HAMMER_RELEASE}/hammer`, inTarget(ctx, 'usr/bin/hammer'))
  const libDir = inTarget(ctx, 'usr/lib/HackerOS/hammer')
  await ensureDirectory(ctx, libDir)
  for (const name of HAMMER_COMPONENTS) {
    await download(ctx, `${HAMMER_RELEASE}/${name}`, path.join(libDir, name))
  }
  await aptInstallInTarget(ctx, ['kde-plasma-desktop', 'sddm'])
  await ctx.exec.runInTarget('hammer', ['setup'])
}

const EDITION_ACTIONS: Record<Edition, EditionAction> = {
  official: installPackages(EDITION_PACKAGES.official),
  gnome: installPackages(EDITION_PACKAGES.gnome),
  xfce: installPackages(EDITION_PACKAGES.xfce),
  wayfire: installPackages(EDITION_PACKAGES.wayfire),
  cybersecurity: installPackages(EDITION_PACKAGES.cybersecurity),
  blue: installBlue,
  hydra: installHydra,
  atomic: installAtomic
}

/** Copies the shared overlay into the target root, then runs the edition's own step. */
export async function installEdition(config: InstallConfig, ctx: InstallerContext): Promise<void> {
  await copyTree(ctx, path.join(ctx.settings.assetDir, 'official'), ctx.settings.mountRoot)
  ctx.logger.info(`Installing ${config.edition} edition`)
  await EDITION_ACTIONS[config.edition](config, ctx)
}

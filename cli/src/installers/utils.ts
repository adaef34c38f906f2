import { which } from 'zx'
import { spawn } from 'node:child_process'
import fs from 'fs-extra'
import * as path from 'path'
import { InstallerError, InstallerErrorCode, describeError } from './errors.js'
import type { InstallerContext, Logger, RunOptions } from './types.js'

// Dynamic cmd + args go through spawn; zx `$` stays for templated calls.

export async function needCmd(cmd: string): Promise<boolean> {
  try {
    await which(cmd)
    return true
  } catch {
    return false
  }
}

const SAFE_WORD = /^[A-Za-z0-9_@%+=:,./-]+$/

/** POSIX single-quote escaping for a value embedded in a shell command line. */
export function shellQuote(value: string): string {
  if (value !== '' && SAFE_WORD.test(value)) return value
  return `'${value.replace(/'/g, `'\\''`)}'`
}

export function formatCommand(cmd: string, args: readonly string[]): string {
  return [cmd, ...args].map(shellQuote).join(' ')
}

export async function runCommand(
  cmd: string,
  args: readonly string[],
  options: RunOptions & { dryRun: boolean; logger?: Logger } = { dryRun: false }
): Promise<void> {
  const cmdStr = formatCommand(cmd, args)
  if (options.dryRun) {
    options.logger?.log(`[dry-run] ${cmdStr}${options.stdin !== undefined ? ' <<stdin' : ''}`)
    return
  }
  options.logger?.debug(`exec: ${cmdStr}`)
  const proc = spawn(cmd, [...args], {
    stdio: [options.stdin !== undefined ? 'pipe' : 'inherit', 'inherit', 'inherit'],
    cwd: options.cwd || process.cwd(),
    env: options.env ? { ...process.env, ...options.env } : process.env,
    shell: false
  })
  if (options.stdin !== undefined) proc.stdin?.end(options.stdin)
  await new Promise<void>((resolve, reject) => {
    proc.on('error', (error) => {
      reject(
        new InstallerError(InstallerErrorCode.COMMAND_SPAWN_FAILED, `Could not start ${cmd}: ${error.message}`, {
          command: cmdStr
        })
      )
    })
    proc.on('exit', (code, signal) => {
      if (code === 0) return resolve()
      reject(
        new InstallerError(
          InstallerErrorCode.COMMAND_FAILED,
          `Command failed (${code ?? signal}): ${cmdStr}`,
          { command: cmdStr, exitCode: code, signal }
        )
      )
    })
  })
}

async function guardFs<T>(description: string, action: () => Promise<T>): Promise<T> {
  try {
    return await action()
  } catch (error) {
    throw new InstallerError(InstallerErrorCode.FILESYSTEM_FAILED, `${description}: ${describeError(error)}`)
  }
}

export async function ensureDirectory(ctx: InstallerContext, dir: string): Promise<void> {
  if (ctx.options.dryRun) {
    ctx.logger.log(`[dry-run] mkdir -p ${dir}`)
    return
  }
  await guardFs(`Could not create ${dir}`, () => fs.ensureDir(dir))
}

export async function writeTextFile(
  ctx: InstallerContext,
  file: string,
  content: string,
  mode?: number
): Promise<void> {
  if (ctx.options.dryRun) {
    ctx.logger.log(`[dry-run] write ${file}`)
    return
  }
  await guardFs(`Could not write ${file}`, async () => {
    await fs.ensureDir(path.dirname(file))
    await fs.writeFile(file, content, mode === undefined ? 'utf8' : { encoding: 'utf8', mode })
    if (mode !== undefined) await fs.chmod(file, mode)
  })
}

/** Recursively copies the contents of `src` into `dest`, overwriting files. */
export async function copyTree(ctx: InstallerContext, src: string, dest: string): Promise<void> {
  if (ctx.options.dryRun) {
    ctx.logger.log(`[dry-run] cp -r ${src} ${dest}`)
    return
  }
  await guardFs(`Could not copy ${src} to ${dest}`, async () => {
    await fs.ensureDir(dest)
    await fs.copy(src, dest, { overwrite: true, errorOnExist: false })
  })
}

export async function movePath(ctx: InstallerContext, src: string, dest: string): Promise<void> {
  if (ctx.options.dryRun) {
    ctx.logger.log(`[dry-run] mv ${src} ${dest}`)
    return
  }
  await guardFs(`Could not move ${src} to ${dest}`, () => fs.move(src, dest, { overwrite: true }))
}

export async function removePath(ctx: InstallerContext, target: string): Promise<void> {
  if (ctx.options.dryRun) {
    ctx.logger.log(`[dry-run] rm -rf ${target}`)
    return
  }
  await guardFs(`Could not remove ${target}`, () => fs.remove(target))
}

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import fs from 'fs-extra'
import * as os from 'os'
import * as path from 'path'
import { runCommand } from 'citty'

// Mock zx before importing modules under test
vi.mock('zx', () => ({
  $: vi.fn(),
  which: vi.fn(async (cmd: string) => {
    if (cmd === 'zpool' || cmd === 'zfs') throw new Error(`not found: ${cmd}`)
    return `/usr/sbin/${cmd}`
  })
}))

vi.mock('../src/installers/preflight.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../src/installers/preflight.js')>()),
  isRoot: vi.fn(() => true)
}))

vi.mock('@clack/prompts', () => ({
  log: {
    message: vi.fn(),
    info: vi.fn(),
    success: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    step: vi.fn()
  }
}))

import * as p from '@clack/prompts'
import { doctorCommand } from '../src/commands/doctor.js'
import { uninstallCommand } from '../src/commands/uninstall.js'
import { isRoot } from '../src/installers/preflight.js'

let dir: string
let stdoutSpy: { mockRestore(): void } | undefined

beforeEach(async () => {
  vi.clearAllMocks()
  process.exitCode = undefined
  dir = await fs.mkdtemp(path.join(os.tmpdir(), 'hackeros-doctor-'))
})

afterEach(async () => {
  stdoutSpy?.mockRestore()
  stdoutSpy = undefined
  process.exitCode = undefined
  await fs.remove(dir)
})

function captureStdout(): () => string[] {
  const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true)
  stdoutSpy = write
  return () => write.mock.calls.map(([chunk]) => String(chunk)).join('').split('\n')
}

describe('doctor', () => {
  it('lists found and missing tools and fails when any is missing', async () => {
    const output = captureStdout()
    await runCommand(doctorCommand, { rawArgs: [] })

    const lines = output()
    expect(lines).toContain('Running as root: yes')
    expect(lines).toContain(
      'Tools found: apt-get, mount, umount, debootstrap, chroot, mkfs.fat, sfdisk, cfdisk, mkfs.btrfs, mkfs.ext4, git, reboot'
    )
    expect(lines).toContain('Tools missing: zpool, zfs')
    expect(process.exitCode).toBe(1)
  })

  it('fails when not running as root', async () => {
    vi.mocked(isRoot).mockReturnValueOnce(false)
    const output = captureStdout()
    await runCommand(doctorCommand, { rawArgs: [] })
    expect(output()).toContain('Running as root: no')
    expect(process.exitCode).toBe(1)
  })
})

describe('uninstall', () => {
  async function writeSettings(): Promise<string> {
    const file = path.join(dir, 'installer.toml')
    await fs.writeFile(
      file,
      [
        `asset_dir = "${dir}/assets"`,
        `log_file = "${dir}/install.log"`,
        '',
        '[self_uninstall]',
        `paths = ["${dir}/bin/HackerOS-Installer"]`,
        ''
      ].join('\n')
    )
    await fs.outputFile(path.join(dir, 'assets/images/gnome.png'), 'png')
    await fs.outputFile(path.join(dir, 'bin/HackerOS-Installer'), '#!/bin/sh\n')
    return file
  }

  it('removes the assets and the listed installer files', async () => {
    const config = await writeSettings()
    await runCommand(uninstallCommand, { rawArgs: ['--config', config] })

    expect(await fs.pathExists(path.join(dir, 'assets'))).toBe(false)
    expect(await fs.pathExists(path.join(dir, 'bin/HackerOS-Installer'))).toBe(false)
    expect(p.log.success).toHaveBeenCalledWith('Installer files removed from the live system')
  })

  it('only reports what it would remove in dry-run mode', async () => {
    const config = await writeSettings()
    await runCommand(uninstallCommand, { rawArgs: ['--config', config, '--dry-run'] })

    expect(await fs.pathExists(path.join(dir, 'assets'))).toBe(true)
    expect(p.log.message).toHaveBeenNthCalledWith(1, `[dry-run] rm -rf ${dir}/assets`)
    expect(p.log.message).toHaveBeenNthCalledWith(2, `[dry-run] rm -rf ${dir}/bin/HackerOS-Installer`)
  })
})

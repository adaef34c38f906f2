import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import fs from 'fs-extra'
import * as os from 'os'
import * as path from 'path'
import { runCommand } from 'citty'

interface LiveBuildCalls {
  commands: string[]
  cwd: string[]
  failOn?: string
}

const lb = vi.hoisted((): LiveBuildCalls => ({ commands: [], cwd: [] }))

vi.mock('zx', () => ({
  $: (options: { cwd: string }) => {
    lb.cwd.push(options.cwd)
    return async (pieces: TemplateStringsArray, ...values: unknown[]) => {
      const command = pieces.reduce(
        (acc, piece, i) => acc + piece + (i < values.length ? [values[i]].flat().join(' ') : ''),
        ''
      )
      lb.commands.push(command)
      if (command === lb.failOn) throw new Error('exit code: 1')
    }
  }
}))

vi.mock('@clack/prompts', () => ({
  intro: vi.fn(),
  outro: vi.fn(),
  cancel: vi.fn(),
  spinner: vi.fn(() => ({ start: vi.fn(), stop: vi.fn() }))
}))

import * as p from '@clack/prompts'
import { buildIsoCommand, distributionFor, readIsoVersion } from '../src/commands/buildIso.js'
import { InstallerErrorCode } from '../src/installers/errors.js'

let dir: string

beforeEach(async () => {
  vi.clearAllMocks()
  lb.commands = []
  lb.cwd = []
  lb.failOn = undefined
  dir = await fs.mkdtemp(path.join(os.tmpdir(), 'hackeros-iso-'))
})

afterEach(async () => {
  await fs.remove(dir)
})

async function writeBuildConfig(content: string): Promise<void> {
  await fs.writeFile(path.join(dir, 'config-hackeros.hacker'), content)
  await fs.ensureDir(path.join(dir, 'config'))
}

describe('distributionFor', () => {
  it('maps release channels to Debian codenames', () => {
    expect(distributionFor('lts')).toBe('trixie')
    expect(distributionFor('NORMAL')).toBe('forky')
  })

  it('rejects anything else', () => {
    expect(() => distributionFor('edge')).toThrow("Unknown version: edge. Supported: 'lts' or 'normal'.")
  })

  it.each(['constructor', '__proto__', 'toString'])('rejects the object member name %s', (name) => {
    expect(() => distributionFor(name)).toThrow(`Unknown version: ${name}. Supported: 'lts' or 'normal'.`)
  })
})

describe('readIsoVersion', () => {
  it('reads the first array entry', async () => {
    await writeBuildConfig('["lts", "ignored"]\n')
    expect(await readIsoVersion(dir)).toBe('lts')
  })

  it('requires the config directory', async () => {
    await fs.writeFile(path.join(dir, 'config-hackeros.hacker'), '["lts"]')
    await expect(readIsoVersion(dir)).rejects.toThrow(`Config directory 'config' not found in ${dir}`)
  })

  it('rejects a file that is not a string array', async () => {
    await writeBuildConfig('{"version": "lts"}')
    await expect(readIsoVersion(dir)).rejects.toMatchObject({ code: InstallerErrorCode.CONFIG_INVALID })
  })
})

describe('build-iso command', () => {
  it('runs lb clean, config and build in the build directory', async () => {
    await writeBuildConfig('["normal"]')
    await runCommand(buildIsoCommand, { rawArgs: ['--dir', dir] })

    expect(lb.cwd).toEqual([dir])
    expect(lb.commands).toEqual(['lb clean', 'lb config --distribution forky', 'lb build'])
    expect(p.outro).toHaveBeenCalledWith(`Image available in ${dir}`)
  })

  it('stops at the failing step', async () => {
    await writeBuildConfig('["lts"]')
    lb.failOn = 'lb config --distribution trixie'

    await expect(runCommand(buildIsoCommand, { rawArgs: ['--dir', dir] })).rejects.toMatchObject({
      code: InstallerErrorCode.BUILD_FAILED,
      message: 'lb config --distribution trixie failed: exit code: 1'
    })
    expect(lb.commands).toEqual(['lb clean', 'lb config --distribution trixie'])
    expect(p.cancel).toHaveBeenCalledWith('lb config --distribution trixie failed: exit code: 1')
  })
})

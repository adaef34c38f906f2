import { vi } from 'vitest'
import { InstallerError, InstallerErrorCode } from '../src/installers/errors.js'
import { createExecutor } from '../src/installers/exec.js'
import { parseSettings } from '../src/settings.js'
import type { CommandRunner, InstallerContext, InstallerOptions, Logger, RunOptions } from '../src/installers/types.js'
import type { Configuration } from '../src/wizard/types.js'

export interface RecordedCall {
  program: string
  args: string[]
  options?: RunOptions
}

/** In-process stand-in for spawning: records every command and fails on demand. */
export function createRecorder(hooks: {
  failOn?: (line: string) => boolean
  onCall?: (call: RecordedCall) => Promise<void> | void
} = {}) {
  const calls: RecordedCall[] = []
  const runner: CommandRunner = async (program, args, options) => {
    const call: RecordedCall = { program, args: [...args], options }
    calls.push(call)
    const line = [program, ...args].join(' ')
    if (hooks.failOn?.(line)) {
      throw new InstallerError(InstallerErrorCode.COMMAND_FAILED, `Command failed (1): ${line}`)
    }
    await hooks.onCall?.(call)
  }
  const lines = () => calls.map((c) => [c.program, ...c.args].join(' '))
  return { calls, runner, lines }
}

export function silentLogger(): Logger {
  return {
    log: vi.fn(),
    info: vi.fn(),
    ok: vi.fn(),
    warn: vi.fn(),
    err: vi.fn(),
    step: vi.fn(),
    debug: vi.fn()
  }
}

export function createCtx(
  dir: string,
  runner: CommandRunner,
  overrides: Partial<InstallerOptions> = {}
): InstallerContext {
  const settings = parseSettings({
    mount_root: `${dir}/mnt`,
    sources_list: `${dir}/sources.list`,
    asset_dir: `${dir}/assets`,
    log_file: `${dir}/install.log`,
    self_uninstall: { paths: [`${dir}/bin/HackerOS-Installer`] }
  })
  return {
    cwd: dir,
    logFile: settings.logFile,
    settings,
    options: { dryRun: false, reboot: true, ...overrides },
    logger: silentLogger(),
    exec: createExecutor(settings.mountRoot, runner)
  }
}

export function sampleConfig(overrides: Partial<Configuration> = {}): Readonly<Configuration> {
  return {
    username: 'alice',
    password: 'x',
    hostname: 'hackeros',
    edition: 'gnome',
    branch: 'testing',
    filesystem: 'ext4',
    manualPartition: false,
    disk: '/dev/sda',
    ...overrides
  }
}

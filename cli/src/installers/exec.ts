import { runCommand } from './utils.js'
import type { CommandExecutor, CommandRunner, Logger } from './types.js'

export function createRunner(options: { dryRun: boolean; logger: Logger }): CommandRunner {
  return (program, args, runOptions) => runCommand(program, args, { ...runOptions, ...options })
}

/**
 * Every system-mutating command goes through here. Target-root variants wrap
 * the call in `chroot <mountRoot>`; only `runInTargetShell` involves a shell.
 */
export function createExecutor(mountRoot: string, runner: CommandRunner): CommandExecutor {
  return {
    run: (program, args = [], options) => runner(program, args, options),
    runInTarget: (program, args = [], options) => runner('chroot', [mountRoot, program, ...args], options),
    runInTargetShell: (command) => runner('chroot', [mountRoot, '/bin/bash', '-c', command])
  }
}

import { ensureDirectory } from './utils.js'
import { describeError } from './errors.js'
import type { InstallerContext } from './types.js'

export interface MountOptions {
  type?: string
  bind?: boolean
}

interface Held {
  label: string
  release: () => Promise<void>
}

/**
 * Mounts (and other host-side holds such as an imported pool) acquired during
 * an install. Everything held is released in reverse order, whether the work
 * in between succeeded or not.
 */
export class MountStack {
  private readonly held: Held[] = []

  constructor(private readonly ctx: InstallerContext) {}

  /** Labels of what is currently held, oldest first. Mounts are labelled by target. */
  get active(): readonly string[] {
    return this.held.map((h) => h.label)
  }

  async mount(source: string, target: string, options: MountOptions = {}): Promise<void> {
    await ensureDirectory(this.ctx, target)
    const args = options.bind ? ['--bind'] : options.type ? ['-t', options.type] : []
    await this.ctx.exec.run('mount', [...args, source, target])
    this.hold(target, () => this.ctx.exec.run('umount', [target]))
  }

  hold(label: string, release: () => Promise<void>): void {
    this.held.push({ label, release })
  }

  /** Releases everything, newest first. Returns the failures instead of stopping at one. */
  async release(): Promise<unknown[]> {
    const failures: unknown[] = []
    for (let entry = this.held.pop(); entry; entry = this.held.pop()) {
      try {
        await entry.release()
      } catch (error) {
        failures.push(error)
      }
    }
    return failures
  }
}

export async function withMounts<T>(
  ctx: InstallerContext,
  body: (mounts: MountStack) => Promise<T>
): Promise<T> {
  const mounts = new MountStack(ctx)
  let result: T
  try {
    result = await body(mounts)
  } catch (error) {
    if (mounts.active.length > 0) {
      ctx.logger.warn(`Install failed; releasing ${[...mounts.active].reverse().join(', ')}`)
      for (const failure of await mounts.release()) {
        ctx.logger.err(`Cleanup: ${describeError(failure)}`)
      }
    }
    throw error
  }
  const failures = await mounts.release()
  if (failures.length > 0) throw failures[0]
  return result
}

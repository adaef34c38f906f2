import { describe, it, expect } from 'vitest'
import { PassThrough } from 'node:stream'
import { keyToEvent, runWizard } from '../src/wizard/terminal.js'

function fakeTerminal(keys: string) {
  const input = new PassThrough()
  const writes: string[] = []
  if (keys) input.write(keys)
  return {
    writes,
    io: { input, output: { columns: 80, write: (chunk: string) => writes.push(chunk) } }
  }
}

const DOWN = '\x1b[B'

describe('keyToEvent', () => {
  const username = { stage: 'username', input: '' } as const
  const edition = { stage: 'edition', cursor: undefined, collected: { username: 'a', password: 'b', hostname: 'c' } } as const

  it('treats q, j and k as characters while typing', () => {
    expect(keyToEvent('q', { name: 'q' }, username)).toEqual({ type: 'char', char: 'q' })
    expect(keyToEvent('j', { name: 'j' }, username)).toEqual({ type: 'char', char: 'j' })
  })

  it('treats q, j and k as shortcuts on list stages', () => {
    expect(keyToEvent('q', { name: 'q' }, edition)).toEqual({ type: 'quit' })
    expect(keyToEvent('j', { name: 'j' }, edition)).toEqual({ type: 'down' })
    expect(keyToEvent('k', { name: 'k' }, edition)).toEqual({ type: 'up' })
    expect(keyToEvent('x', { name: 'x' }, edition)).toBeUndefined()
  })

  it('always quits on Ctrl+C and Escape', () => {
    expect(keyToEvent('\x03', { name: 'c', ctrl: true }, username)).toEqual({ type: 'quit' })
    expect(keyToEvent('\x1b', { name: 'escape' }, username)).toEqual({ type: 'quit' })
  })

  it('maps editing and navigation keys', () => {
    expect(keyToEvent('\r', { name: 'return' }, username)).toEqual({ type: 'enter' })
    expect(keyToEvent('\x7f', { name: 'backspace' }, username)).toEqual({ type: 'backspace' })
    expect(keyToEvent(undefined, { name: 'down' }, edition)).toEqual({ type: 'down' })
  })
})

describe('runWizard', () => {
  it('walks every stage and returns the confirmed configuration', async () => {
    const { io, writes } = fakeTerminal(
      ['\r', 'alice\r', 'x\r', '\r', `${DOWN}\r`, `${DOWN}\r`, `${DOWN}\r`, 'k\r', '/dev/sda\r', '\r'].join('')
    )
    const result = await runWizard({ imageDir: '/assets/images' }, io)

    expect(result).toEqual({
      kind: 'confirmed',
      config: {
        username: 'alice',
        password: 'x',
        hostname: 'hackeros',
        edition: 'gnome',
        branch: 'testing',
        filesystem: 'ext4',
        manualPartition: false,
        disk: '/dev/sda'
      }
    })
    expect(writes[0]).toBe('\x1b[?1049h\x1b[?25l')
    expect(writes.at(-1)).toBe('\x1b[?25h\x1b[?1049l')
    expect(writes.filter((w) => w.includes('Previewing image: /assets/images/gnome.png'))).toHaveLength(1)
  })

  it('aborts on q at the welcome screen and restores the terminal', async () => {
    const { io, writes } = fakeTerminal('q')
    await expect(runWizard({ imageDir: '/assets/images' }, io)).resolves.toEqual({ kind: 'aborted' })
    expect(writes.at(-1)).toBe('\x1b[?25h\x1b[?1049l')
  })

  it('aborts and restores the terminal when input ends before confirmation', async () => {
    const { io, writes } = fakeTerminal('\ralice\r')
    io.input.end()
    await expect(runWizard({ imageDir: '/assets/images' }, io)).resolves.toEqual({ kind: 'aborted' })
    expect(writes.at(-1)).toBe('\x1b[?25h\x1b[?1049l')
  })

  it('aborts when input is already empty', async () => {
    const { io, writes } = fakeTerminal('')
    io.input.end()
    await expect(runWizard({ imageDir: '/assets/images' }, io)).resolves.toEqual({ kind: 'aborted' })
    expect(writes.join('')).toContain('\x1b[?1049l')
  })

  it('aborts on Ctrl+C in the middle of a text field', async () => {
    const { io } = fakeTerminal('\rali\x03')
    await expect(runWizard({ imageDir: '/assets/images' }, io)).resolves.toEqual({ kind: 'aborted' })
  })
})

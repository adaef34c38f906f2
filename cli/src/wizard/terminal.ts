import { on } from 'node:events'
import { emitKeypressEvents } from 'node:readline'
import type { Key } from 'node:readline'
import { clearPreview, initialState, isFinished, transition } from './machine.js'
import { paintFrame, renderFrame } from './render.js'
import type { RenderContext } from './render.js'
import type { WizardEvent, WizardResult, WizardState } from './types.js'

const CSI = '\x1b['
const ALT_ON = `${CSI}?1049h`
const ALT_OFF = `${CSI}?1049l`
const HIDE_CURSOR = `${CSI}?25l`
const SHOW_CURSOR = `${CSI}?25h`

export interface TerminalIO {
  input: NodeJS.ReadableStream & { isTTY?: boolean; setRawMode?: (mode: boolean) => unknown }
  output: { write(chunk: string): unknown; columns?: number }
}

/**
 * Maps one keypress to a wizard event. `q`, `j` and `k` are shortcuts only
 * where nothing is being typed; inside a text field they are characters.
 */
export function keyToEvent(
  str: string | undefined,
  key: Key | undefined,
  state: WizardState
): WizardEvent | undefined {
  const name = key?.name
  if (key?.ctrl && name === 'c') return { type: 'quit' }
  if (name === 'escape') return { type: 'quit' }
  if (name === 'return' || name === 'enter') return { type: 'enter' }
  if (name === 'backspace') return { type: 'backspace' }
  if (name === 'up') return { type: 'up' }
  if (name === 'down') return { type: 'down' }

  if (!('input' in state)) {
    if (str === 'q') return { type: 'quit' }
    if (str === 'k') return { type: 'up' }
    if (str === 'j') return { type: 'down' }
    return undefined
  }
  if (key?.ctrl || key?.meta) return undefined
  if (str !== undefined && [...str].length === 1) return { type: 'char', char: str }
  return undefined
}

/**
 * Runs the wizard on the given terminal until the user confirms the summary
 * or quits. Input that ends before confirmation counts as a quit. The
 * terminal is always handed back in its normal mode.
 */
export async function runWizard(
  render: RenderContext,
  io: TerminalIO = { input: process.stdin, output: process.stdout }
): Promise<WizardResult> {
  const { input, output } = io
  emitKeypressEvents(input)
  const inputEnded = new AbortController()
  const stop = () => inputEnded.abort()
  input.once('end', stop)
  input.once('close', stop)
  const keys = on(input, 'keypress', { signal: inputEnded.signal })
  const raw = Boolean(input.isTTY && input.setRawMode)

  let state = initialState()
  const paint = () => {
    output.write(paintFrame(renderFrame(state, render), output.columns ?? 80))
    state = clearPreview(state)
  }

  output.write(ALT_ON + HIDE_CURSOR)
  if (raw) input.setRawMode?.(true)
  input.resume()
  try {
    paint()
    try {
      for await (const args of keys) {
        const event = keyToEvent(args[0], args[1], state)
        if (!event) continue
        state = transition(state, event)
        if (isFinished(state)) break
        paint()
      }
    } catch (error) {
      // The keypress iterator rejects with an AbortError once input has ended.
      if (!inputEnded.signal.aborted) throw error
    }
  } finally {
    input.off('end', stop)
    input.off('close', stop)
    if (raw) input.setRawMode?.(false)
    input.pause()
    output.write(SHOW_CURSOR + ALT_OFF)
  }

  if (state.stage === 'install') return { kind: 'confirmed', config: state.config }
  return { kind: 'aborted' }
}

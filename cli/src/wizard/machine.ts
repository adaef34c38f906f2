import {
  BRANCH_CHOICES,
  DEFAULT_HOSTNAME,
  EDITION_CHOICES,
  FILESYSTEM_CHOICES,
  PARTITION_MODE_CHOICES,
  STAGE_ORDER
} from './types.js'
import type { Choice, ListStage, WizardEvent, WizardState } from './types.js'

export const LIST_OPTIONS = {
  edition: EDITION_CHOICES,
  branch: BRANCH_CHOICES,
  filesystem: FILESYSTEM_CHOICES,
  partitionMode: PARTITION_MODE_CHOICES
} as const satisfies Record<ListStage['stage'], readonly Choice<string>[]>

const CONTROL_CHARS = /[\u0000-\u001f\u007f]/

export function initialState(): WizardState {
  return { stage: 'welcome' }
}

/** Position of the stage in the wizard sequence; -1 once aborted. */
export function stepIndex(state: WizardState): number {
  return STAGE_ORDER.indexOf(state.stage)
}

export function isFinished(state: WizardState): boolean {
  return state.stage === 'install' || state.stage === 'aborted'
}

export function transition(state: WizardState, event: WizardEvent): WizardState {
  if (isFinished(state)) return state
  switch (event.type) {
    case 'quit':
      return { stage: 'aborted' }
    case 'enter':
      return confirm(state)
    case 'up':
      return moveCursor(state, -1)
    case 'down':
      return moveCursor(state, 1)
    case 'char':
      if (event.char.length === 0 || CONTROL_CHARS.test(event.char)) return state
      return editInput(state, (input) => input + event.char)
    case 'backspace':
      return editInput(state, (input) => input.slice(0, -1))
  }
}

/** Drops the edition preview hint once it has been drawn. */
export function clearPreview(state: WizardState): WizardState {
  if (state.stage !== 'branch' || state.preview === undefined) return state
  return { stage: 'branch', cursor: state.cursor, collected: state.collected }
}

function pick<T>(choices: readonly Choice<T>[], cursor: number): T | undefined {
  const choice: Choice<T> | undefined = choices[cursor]
  return choice?.value
}

function confirm(state: WizardState): WizardState {
  switch (state.stage) {
    case 'welcome':
      return { stage: 'username', input: '' }
    case 'username':
      if (state.input === '') return state
      return { stage: 'password', input: '', collected: { username: state.input } }
    case 'password':
      if (state.input === '') return state
      return {
        stage: 'hostname',
        input: '',
        collected: { ...state.collected, password: state.input }
      }
    case 'hostname': {
      const hostname = state.input === '' ? DEFAULT_HOSTNAME : state.input
      return { stage: 'edition', cursor: undefined, collected: { ...state.collected, hostname } }
    }
    case 'edition': {
      if (state.cursor === undefined) return state
      const edition = pick(EDITION_CHOICES, state.cursor)
      if (!edition) return state
      return {
        stage: 'branch',
        cursor: undefined,
        preview: edition,
        collected: { ...state.collected, edition }
      }
    }
    case 'branch': {
      if (state.cursor === undefined) return state
      const branch = pick(BRANCH_CHOICES, state.cursor)
      if (!branch) return state
      return { stage: 'filesystem', cursor: undefined, collected: { ...state.collected, branch } }
    }
    case 'filesystem': {
      if (state.cursor === undefined) return state
      const filesystem = pick(FILESYSTEM_CHOICES, state.cursor)
      if (!filesystem) return state
      return {
        stage: 'partitionMode',
        cursor: undefined,
        collected: { ...state.collected, filesystem }
      }
    }
    case 'partitionMode': {
      if (state.cursor === undefined) return state
      const mode = pick(PARTITION_MODE_CHOICES, state.cursor)
      if (!mode) return state
      return {
        stage: 'disk',
        input: '',
        collected: { ...state.collected, manualPartition: mode === 'manual' }
      }
    }
    case 'disk': {
      const disk = state.input.trim()
      if (disk === '') return state
      return { stage: 'summary', config: { ...state.collected, disk } }
    }
    case 'summary':
      return { stage: 'install', config: Object.freeze({ ...state.config }) }
    case 'install':
    case 'aborted':
      return state
  }
}

function moveCursor(state: WizardState, delta: number): WizardState {
  if (!('cursor' in state)) return state
  const count = LIST_OPTIONS[state.stage].length
  // An unset cursor sits on the implicit highlight at index 0.
  const cursor = Math.min(Math.max((state.cursor ?? 0) + delta, 0), count - 1)
  return { ...state, cursor }
}

function editInput(state: WizardState, edit: (input: string) => string): WizardState {
  switch (state.stage) {
    case 'username':
      return { stage: 'username', input: edit(state.input) }
    case 'hostname':
      return { stage: 'hostname', input: edit(state.input), collected: state.collected }
    case 'password':
    case 'disk':
      return { ...state, input: edit(state.input) }
    default:
      return state
  }
}

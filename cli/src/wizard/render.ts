import { LIST_OPTIONS, stepIndex } from './machine.js'
import {
  BRANCH_CHOICES,
  DEFAULT_HOSTNAME,
  EDITION_CHOICES,
  FILESYSTEM_CHOICES,
  STAGE_ORDER
} from './types.js'
import type { Choice, Configuration, Edition, ListStage, WizardState } from './types.js'

export interface FrameOption {
  label: string
  highlighted: boolean
}

/** Everything needed to draw one screen; produced without touching the terminal. */
export interface Frame {
  step: number
  totalSteps: number
  title: string
  lines: string[]
  options?: FrameOption[]
  preview?: string
  hint: string
}

export interface RenderContext {
  imageDir: string
}

const PREVIEW_IMAGES: Record<Edition, string> = {
  official: 'plasma.png',
  gnome: 'gnome.png',
  xfce: 'xfce.png',
  blue: 'blue.png',
  hydra: 'hydra.png',
  cybersecurity: 'cybersecurity.png',
  wayfire: 'wayfire.png',
  atomic: 'atomic.png'
}

const TEXT_HINT = 'Type to edit · Backspace delete · Enter confirm · Esc quit'
const LIST_HINT = '↑/↓ choose · Enter confirm · q quit'
const LIST_TITLES: Record<ListStage['stage'], string> = {
  edition: 'Select Edition',
  branch: 'Select Debian Branch',
  filesystem: 'Select Filesystem',
  partitionMode: 'Partitioning Mode'
}

// Welcome through Summary; the install hand-off is not a screen of its own.
const TOTAL_STEPS = STAGE_ORDER.length - 1

export function previewPath(edition: Edition, ctx: RenderContext): string {
  return `${ctx.imageDir.replace(/\/+$/, '')}/${PREVIEW_IMAGES[edition]}`
}

function labelOf<T>(choices: readonly Choice<T>[], value: T): string {
  return choices.find((c) => c.value === value)?.label ?? String(value)
}

export function summaryLines(config: Readonly<Configuration>): string[] {
  return [
    `Username: ${config.username}`,
    `Hostname: ${config.hostname}`,
    `Edition: ${labelOf(EDITION_CHOICES, config.edition)}`,
    `Branch: ${labelOf(BRANCH_CHOICES, config.branch)}`,
    `Filesystem: ${labelOf(FILESYSTEM_CHOICES, config.filesystem)}`,
    `Partitioning: ${config.manualPartition ? 'Manual' : 'Automatic'}`,
    `Disk: ${config.disk}`
  ]
}

export function renderFrame(state: WizardState, ctx: RenderContext): Frame {
  const base = { step: Math.max(stepIndex(state), 0) + 1, totalSteps: TOTAL_STEPS }
  switch (state.stage) {
    case 'welcome':
      return {
        ...base,
        title: 'Welcome',
        lines: ['Welcome to HackerOS Installer!', 'Press Enter to start.'],
        hint: 'Enter start · q quit'
      }
    case 'username':
      return {
        ...base,
        title: 'User Creation',
        lines: [`Enter username: ${state.input}`],
        hint: TEXT_HINT
      }
    case 'password':
      return {
        ...base,
        title: 'Password',
        lines: [`Enter password: ${'*'.repeat(state.input.length)}`],
        hint: TEXT_HINT
      }
    case 'hostname':
      return {
        ...base,
        title: 'Hostname',
        lines: [`Enter hostname (default: ${DEFAULT_HOSTNAME}): ${state.input}`],
        hint: TEXT_HINT
      }
    case 'edition':
    case 'branch':
    case 'filesystem':
    case 'partitionMode': {
      // An unset cursor shows index 0 highlighted; state is left as is.
      const highlighted = state.cursor ?? 0
      const choices: readonly Choice<string>[] = LIST_OPTIONS[state.stage]
      return {
        ...base,
        title: LIST_TITLES[state.stage],
        lines: [],
        options: choices.map((c, i) => ({ label: c.label, highlighted: i === highlighted })),
        preview:
          state.stage === 'branch' && state.preview
            ? `Previewing image: ${previewPath(state.preview, ctx)}`
            : undefined,
        hint: LIST_HINT
      }
    }
    case 'disk':
      return {
        ...base,
        title: 'Disk Selection',
        lines: [`Enter disk (e.g., /dev/sda): ${state.input}`],
        hint: TEXT_HINT
      }
    case 'summary':
      return {
        ...base,
        title: 'Summary',
        lines: [
          ...summaryLines(state.config),
          '',
          `All data on ${state.config.disk} will be erased.`,
          'Press Enter to install.'
        ],
        hint: 'Enter install · q quit'
      }
    case 'install':
      return { ...base, step: TOTAL_STEPS, title: 'Installing', lines: ['Starting installation…'], hint: '' }
    case 'aborted':
      return { ...base, title: 'Aborted', lines: ['Installation cancelled.'], hint: '' }
  }
}

// ─── ANSI painting ───────────────────────────────────────────────────────────

const CSI = '\x1b['

const T = {
  clear: `${CSI}2J${CSI}H`,
  reset: `${CSI}0m`,
  bold: `${CSI}1m`,
  dim: `${CSI}2m`,
  italic: `${CSI}3m`,
  green: `${CSI}32m`,
  yellow: `${CSI}33m`,
  blue: `${CSI}34m`,
  magenta: `${CSI}35m`,
  cyan: `${CSI}36m`
}

const TITLE_COLORS: Record<string, string> = {
  Welcome: T.green,
  Summary: T.magenta
}

function box(title: string, body: string[], width: number, color: string): string[] {
  const inner = Math.max(width - 4, 10)
  const head = `─ ${title} `
  const top = `╭${head}${'─'.repeat(Math.max(inner + 2 - head.length, 0))}╮`
  const rows = body.map((line) => {
    const text = line.length > inner ? `${line.slice(0, inner - 1)}…` : line
    return `│ ${text}${' '.repeat(inner - text.length)} │`
  })
  const bottom = `╰${'─'.repeat(inner + 2)}╯`
  return [top, ...rows, bottom].map((row) => `${color}${row}${T.reset}`)
}

function center(text: string, width: number): string {
  return ' '.repeat(Math.max(Math.floor((width - text.length) / 2), 0)) + text
}

/** Turns a frame into a full-screen redraw. Rows end in CRLF for raw mode. */
export function paintFrame(frame: Frame, columns: number): string {
  const width = Math.max(Math.min(columns, 100), 40)
  const color = TITLE_COLORS[frame.title] ?? T.yellow
  const body = frame.options
    ? frame.options.map((o) => (o.highlighted ? `>> ${o.label}` : `   ${o.label}`))
    : frame.lines
  const out: string[] = [
    `${T.bold}${T.cyan}${center('HackerOS Installer', width)}${T.reset}`,
    `${T.dim}${center(`Step ${frame.step}/${frame.totalSteps}`, width)}${T.reset}`,
    '',
    ...box(frame.title, body, width, color)
  ]
  if (frame.options) {
    // Re-tint the highlighted row inside the box.
    const offset = 4
    frame.options.forEach((o, i) => {
      if (o.highlighted) {
        const row = out[offset + i]
        if (row) out[offset + i] = row.replace(`>> ${o.label}`, `${T.green}${T.italic}>> ${o.label}${T.reset}${color}`)
      }
    })
  }
  if (frame.preview) out.push(...box('Edition Preview', [frame.preview], width, T.blue))
  if (frame.hint) out.push('', `${T.dim}${frame.hint}${T.reset}`)
  return T.clear + out.join('\r\n')
}

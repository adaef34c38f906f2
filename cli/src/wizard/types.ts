export type Edition =
  | 'official'
  | 'gnome'
  | 'xfce'
  | 'blue'
  | 'hydra'
  | 'cybersecurity'
  | 'wayfire'
  | 'atomic'
export type Branch = 'stable' | 'testing' | 'unstable'
export type FilesystemKind = 'btrfs' | 'ext4' | 'zfs'
export type PartitionMode = 'automatic' | 'manual'

export interface Configuration {
  username: string
  password: string
  hostname: string
  edition: Edition
  branch: Branch
  filesystem: FilesystemKind
  manualPartition: boolean
  disk: string
}

export const DEFAULT_HOSTNAME = 'hackeros'

export interface Choice<T> {
  value: T
  label: string
}

// Option order is the positional table the list stages confirm against.
export const EDITION_CHOICES: readonly Choice<Edition>[] = [
  { value: 'official', label: 'Official (KDE Plasma + SDDM)' },
  { value: 'gnome', label: 'Gnome (GNOME + GDM3)' },
  { value: 'xfce', label: 'XFCE (XFCE + LightDM)' },
  { value: 'blue', label: 'Blue (Custom Environment)' },
  { value: 'hydra', label: 'Hydra (Custom Look)' },
  { value: 'cybersecurity', label: 'Cybersecurity (With Tools)' },
  { value: 'wayfire', label: 'Wayfire (Wayfire + SDDM)' },
  { value: 'atomic', label: 'Atomic (With Hammer)' }
]

export const BRANCH_CHOICES: readonly Choice<Branch>[] = [
  { value: 'stable', label: 'Stable (trixie)' },
  { value: 'testing', label: 'Testing (forky)' },
  { value: 'unstable', label: 'Unstable (sid)' }
]

export const FILESYSTEM_CHOICES: readonly Choice<FilesystemKind>[] = [
  { value: 'btrfs', label: 'Btrfs' },
  { value: 'ext4', label: 'Ext4' },
  { value: 'zfs', label: 'Zfs' }
]

export const PARTITION_MODE_CHOICES: readonly Choice<PartitionMode>[] = [
  { value: 'automatic', label: 'Automatic Partitioning' },
  { value: 'manual', label: 'Manual Partitioning' }
]

export const BRANCH_CODENAMES: Record<Branch, string> = {
  stable: 'trixie',
  testing: 'forky',
  unstable: 'sid'
}

export type Cursor = number | undefined

type Collected<K extends keyof Configuration> = Readonly<Pick<Configuration, K>>

/**
 * One variant per wizard stage. Each carries only what earlier stages
 * collected, so a stage can never be reached with a missing answer.
 */
export type WizardState =
  | { stage: 'welcome' }
  | { stage: 'username'; input: string }
  | { stage: 'password'; input: string; collected: Collected<'username'> }
  | {
      stage: 'hostname'
      input: string
      collected: Collected<'username' | 'password'>
    }
  | {
      stage: 'edition'
      cursor: Cursor
      collected: Collected<'username' | 'password' | 'hostname'>
    }
  | {
      stage: 'branch'
      cursor: Cursor
      /** One-shot render hint set when the edition was just confirmed. */
      preview?: Edition
      collected: Collected<'username' | 'password' | 'hostname' | 'edition'>
    }
  | {
      stage: 'filesystem'
      cursor: Cursor
      collected: Collected<'username' | 'password' | 'hostname' | 'edition' | 'branch'>
    }
  | {
      stage: 'partitionMode'
      cursor: Cursor
      collected: Collected<'username' | 'password' | 'hostname' | 'edition' | 'branch' | 'filesystem'>
    }
  | {
      stage: 'disk'
      input: string
      collected: Collected<Exclude<keyof Configuration, 'disk'>>
    }
  | { stage: 'summary'; config: Readonly<Configuration> }
  | { stage: 'install'; config: Readonly<Configuration> }
  | { stage: 'aborted' }

export type StageId = WizardState['stage']
export type TextStage = Extract<WizardState, { input: string }>
export type ListStage = Extract<WizardState, { cursor: Cursor }>

export const STAGE_ORDER: readonly StageId[] = [
  'welcome',
  'username',
  'password',
  'hostname',
  'edition',
  'branch',
  'filesystem',
  'partitionMode',
  'disk',
  'summary',
  'install'
]

export type WizardEvent =
  | { type: 'char'; char: string }
  | { type: 'backspace' }
  | { type: 'up' }
  | { type: 'down' }
  | { type: 'enter' }
  | { type: 'quit' }

export type WizardResult =
  | { kind: 'confirmed'; config: Readonly<Configuration> }
  | { kind: 'aborted' }

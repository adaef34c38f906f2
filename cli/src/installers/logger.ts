import * as p from '@clack/prompts'
import fs from 'fs-extra'
import * as os from 'os'
import * as path from 'path'
import type { Logger } from './types.js'

type Level = 'LOG' | 'INFO' | 'OK' | 'WARN' | 'ERROR' | 'STEP' | 'DEBUG'

export const FALLBACK_LOG_FILE = path.join(os.tmpdir(), 'hackeros-installer.log')

/** Returns `preferred` when it can be written to, otherwise a file in the temp dir. */
export function resolveLogFile(preferred: string): string {
  try {
    fs.ensureFileSync(preferred)
    fs.accessSync(preferred, fs.constants.W_OK)
    return preferred
  } catch {
    fs.ensureFileSync(FALLBACK_LOG_FILE)
    return FALLBACK_LOG_FILE
  }
}

export function createLogger(logFile: string, options: { console?: boolean } = {}): Logger {
  const toConsole = options.console ?? true
  const append = (level: Level, msg: string) => {
    fs.appendFileSync(logFile, `${new Date().toISOString()} [${level}] ${msg}\n`)
  }
  const emit = (level: Level, print: (msg: string) => void) => (msg: string) => {
    append(level, msg)
    if (toConsole) print(msg)
  }
  return {
    log: emit('LOG', (m) => p.log.message(m)),
    info: emit('INFO', (m) => p.log.info(m)),
    ok: emit('OK', (m) => p.log.success(m)),
    warn: emit('WARN', (m) => p.log.warn(m)),
    err: emit('ERROR', (m) => p.log.error(m)),
    step: emit('STEP', (m) => p.log.step(m)),
    debug: (msg) => append('DEBUG', msg)
  }
}

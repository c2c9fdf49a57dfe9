import chalk from 'chalk'
import { appendFileSync, existsSync, rmSync } from 'fs'
import { join } from 'path'
import { ensureConfigSubdir } from '@core/config/paths'

export type LogLevel = 'debug' | 'info' | 'api' | 'warn' | 'error'

export type LogEntry = {
  ts: string
  level: LogLevel
  tag: string
  data: Record<string, unknown>
}

const LOG_FILE_NAME = 'haven.log'

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  api: 20,
  warn: 30,
  error: 40,
}

const CONSOLE_COLORS: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  api: chalk.magenta,
  warn: chalk.yellow,
  error: chalk.red,
}

let fileThreshold: LogLevel | undefined

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_RANK
}

function readThresholdFromEnv(): LogLevel {
  const raw = process.env.HAVEN_LOG_LEVEL?.trim().toLowerCase()
  if (raw && isLogLevel(raw)) return raw
  return 'debug'
}

function isConsoleEchoEnabled(): boolean {
  const raw = process.env.HAVEN_DEBUG?.trim().toLowerCase()
  if (!raw) return false
  return !(raw === '0' || raw === 'false' || raw === 'off' || raw === 'no')
}

export function setLogLevel(level: LogLevel): void {
  fileThreshold = level
}

export function getLogFilePath(): string {
  return join(ensureConfigSubdir('logs'), LOG_FILE_NAME)
}

export function resetLogFiles(): boolean {
  const filePath = getLogFilePath()
  if (!existsSync(filePath)) return false
  rmSync(filePath, { force: true })
  return true
}

function serializeData(data: Record<string, unknown>): string {
  try {
    return JSON.stringify(data)
  } catch {
    return '{"unserializable":true}'
  }
}

function serializeEntry(entry: LogEntry): string {
  try {
    return JSON.stringify(entry)
  } catch {
    return JSON.stringify({ ...entry, data: { unserializable: true } })
  }
}

function write(level: LogLevel, tag: string, data: Record<string, unknown> = {}) {
  const threshold = fileThreshold ?? readThresholdFromEnv()
  const entry: LogEntry = {
    ts: new Date().toISOString(),
    level,
    tag,
    data,
  }

  if (LEVEL_RANK[level] >= LEVEL_RANK[threshold]) {
    try {
      appendFileSync(getLogFilePath(), `${serializeEntry(entry)}\n`, 'utf8')
    } catch {
      // logging must never break a turn
    }
  }

  if (isConsoleEchoEnabled() && LEVEL_RANK[level] >= LEVEL_RANK.info) {
    const label = CONSOLE_COLORS[level](level.toUpperCase())
    process.stderr.write(`${label}: ${tag} ${serializeData(data)}\n`)
  }
}

export const debug = {
  debug: (tag: string, data?: Record<string, unknown>) =>
    write('debug', tag, data),
  info: (tag: string, data?: Record<string, unknown>) => write('info', tag, data),
  api: (tag: string, data?: Record<string, unknown>) => write('api', tag, data),
  warn: (tag: string, data?: Record<string, unknown>) => write('warn', tag, data),
  error: (tag: string, data?: Record<string, unknown>) =>
    write('error', tag, data),
}

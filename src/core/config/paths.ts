import { existsSync, mkdirSync } from 'fs'
import { homedir } from 'os'
import { join } from 'path'
import { CONFIG_BASE_DIR, CONFIG_FILE } from '@constants/product'

export function getConfigDir(): string {
  return process.env.HAVEN_CONFIG_DIR ?? join(homedir(), CONFIG_BASE_DIR)
}

export function getConfigFilePath(): string {
  return join(getConfigDir(), CONFIG_FILE)
}

export function ensureConfigSubdir(name: string): string {
  const dir = join(getConfigDir(), name)
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true })
  }
  return dir
}

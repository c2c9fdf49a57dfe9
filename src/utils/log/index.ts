import { debug as debugLogger } from './debugLogger'

export function logError(error: unknown): void {
  debugLogger.error('ERROR', {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  })
}

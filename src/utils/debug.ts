import { appendFileSync, mkdirSync } from 'fs'
import { join } from 'path'
import { homedir } from 'os'

// Debug logging - only enabled when FLOWSTAT_DEBUG environment variable is set
export const isDebugEnabled = (): boolean =>
  process.env.FLOWSTAT_DEBUG === 'true' || process.env.FLOWSTAT_DEBUG === '1'

export const debugLog = (message: Record<string, unknown>): void => {
  if (!isDebugEnabled()) return

  const flowstatDir = join(homedir(), '.flowstat')
  const logPath = join(flowstatDir, 'debug.log')

  mkdirSync(flowstatDir, { recursive: true })

  appendFileSync(logPath, `${new Date().toISOString()} - ${JSON.stringify(message)}\n`)
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error)

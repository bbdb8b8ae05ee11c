import { promises as fs } from 'fs'
import path from 'path'
import os from 'os'
import { z } from 'zod'
import { Snapshot, StoredSnapshotSchema } from '../contracts'
import { SnapshotStore } from './SnapshotStore'
import { fromStoredSnapshot, toStoredSnapshot } from './serialization'
import { debugLog, errorMessage } from '../utils/debug'

export const DEFAULT_CACHE_DIR = path.join(os.tmpdir(), 'flowstat-cache')

// Whitelist pattern for counter type names used in file names
const VALID_TYPE_PATTERN = /^[a-zA-Z0-9][a-zA-Z0-9-_]*$/

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT'

export const currentUserId = (): string => {
  const uid = process.getuid?.()
  return uid === undefined ? os.userInfo().username : String(uid)
}

/**
 * Location of the snapshot for a counter type and user:
 * `<cacheDir>/<userId>/<counterType>-stats.json`
 */
export function snapshotPath(cacheDir: string, counterType: string, userId: string): string {
  const safeType = VALID_TYPE_PATTERN.test(counterType)
    ? counterType
    : counterType.replace(/[^a-zA-Z0-9-_]/g, '_').replace(/^[^a-zA-Z0-9]/, 't')
  const safeUser = userId.replace(/[^a-zA-Z0-9-_]/g, '_')
  return path.join(cacheDir, safeUser, `${safeType}-stats.json`)
}

export class FileSnapshotStore implements SnapshotStore {
  constructor(readonly filePath: string) {}

  async load(): Promise<Snapshot | null> {
    let raw: string
    try {
      raw = await fs.readFile(this.filePath, 'utf8')
    } catch (error) {
      if (!isMissingFile(error)) {
        this.warn('read', error)
      }
      return null
    }

    try {
      const parsed: unknown = JSON.parse(raw)
      const snapshot = fromStoredSnapshot(StoredSnapshotSchema.parse(parsed))
      debugLog({ event: 'snapshot_loaded', file: this.filePath, snapshotId: snapshot.id })
      return snapshot
    } catch (error) {
      if (error instanceof z.ZodError) {
        console.warn(`Warning: ignoring malformed counter snapshot ${this.filePath}`)
        debugLog({ event: 'snapshot_invalid', file: this.filePath, issues: error.issues })
      } else {
        this.warn('read', error)
      }
      return null
    }
  }

  async save(snapshot: Snapshot): Promise<boolean> {
    try {
      await fs.rm(this.filePath, { force: true })
      await fs.mkdir(path.dirname(this.filePath), { recursive: true })
      await fs.writeFile(
        this.filePath,
        JSON.stringify(toStoredSnapshot(snapshot), null, 2),
        'utf8'
      )
      debugLog({ event: 'snapshot_saved', file: this.filePath, snapshotId: snapshot.id })
      return true
    } catch (error) {
      this.warn('write', error)
      return false
    }
  }

  async delete(): Promise<void> {
    try {
      await fs.unlink(this.filePath)
      debugLog({ event: 'snapshot_deleted', file: this.filePath })
    } catch (error) {
      if (!isMissingFile(error)) {
        this.warn('delete', error)
      }
    }
  }

  private warn(action: 'read' | 'write' | 'delete', error: unknown): void {
    console.warn(`Warning: unable to ${action} counter snapshot ${this.filePath}: ${errorMessage(error)}`)
    debugLog({ event: 'snapshot_error', action, file: this.filePath, error: errorMessage(error) })
  }
}

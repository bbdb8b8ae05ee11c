import { Snapshot, StoredSnapshotSchema } from '../contracts'
import { SnapshotStore } from './SnapshotStore'
import { fromStoredSnapshot, toStoredSnapshot } from './serialization'

export class MemorySnapshotStore implements SnapshotStore {
  private stored: string | null = null
  saveCount = 0

  // Round-trips through the persisted form so tests see what a file would hold
  async load(): Promise<Snapshot | null> {
    if (this.stored === null) {
      return null
    }
    const parsed: unknown = JSON.parse(this.stored)
    return fromStoredSnapshot(StoredSnapshotSchema.parse(parsed))
  }

  async save(snapshot: Snapshot): Promise<boolean> {
    this.stored = JSON.stringify(toStoredSnapshot(snapshot))
    this.saveCount++
    return true
  }

  async delete(): Promise<void> {
    this.stored = null
  }
}

import { Snapshot } from '../contracts'

/**
 * Persists the single baseline snapshot for one counter type and user.
 * Failures are reported, never thrown: the baseline is a local cache.
 */
export interface SnapshotStore {
  load(): Promise<Snapshot | null>
  save(snapshot: Snapshot): Promise<boolean>
  delete(): Promise<void>
}

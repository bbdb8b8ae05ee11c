import { v4 as uuidv4 } from 'uuid'
import { CounterTypeDefinition, ReadingSet, Snapshot } from '../contracts'
import { CounterStoreConnector } from '../store/CounterStore'
import { SnapshotStore } from '../storage/SnapshotStore'
import { Collector } from './Collector'
import { diffReadings } from './diffEngine'
import { debugLog } from '../utils/debug'

export interface ShowResult {
  readings: ReadingSet
  /** True when the baseline was rebased and rewritten */
  rebased: boolean
}

export interface ClearResult {
  snapshot: Snapshot
  saved: boolean
}

/**
 * Reads one counter type and shows it relative to the user's last clear.
 * Counters in the store are never modified; only the local baseline is.
 */
export class FlowCounterStats {
  private collector: Collector

  constructor(
    private connector: CounterStoreConnector,
    private snapshotStore: SnapshotStore,
    private counterType: CounterTypeDefinition
  ) {
    this.collector = new Collector(connector, counterType)
  }

  async hasMultipleNamespaces(): Promise<boolean> {
    const namespaces = await this.connector.listNamespaces()
    return namespaces.length > 1
  }

  async show(namespace?: string): Promise<ShowResult> {
    const current = await this.collector.collect(namespace)
    const previous = await this.snapshotStore.load()

    const { display, baseline, dirty } = diffReadings(previous?.readings ?? null, current)

    debugLog({
      event: 'counters_diffed',
      counterType: this.counterType.name,
      baselineId: previous?.id ?? null,
      dirty,
    })

    if (dirty && baseline) {
      await this.snapshotStore.save(this.createSnapshot(baseline))
    }

    return { readings: display, rebased: dirty }
  }

  /**
   * Make the current absolute values the new baseline. Clearing one
   * namespace keeps the baselines of the others.
   */
  async clear(namespace?: string): Promise<ClearResult> {
    const current = await this.collector.collect(namespace)

    let readings = current
    if (namespace !== undefined) {
      const previous = await this.snapshotStore.load()
      readings = { ...previous?.readings, ...current }
    }

    const snapshot = this.createSnapshot(readings)
    const saved = await this.snapshotStore.save(snapshot)

    debugLog({
      event: 'counters_cleared',
      counterType: this.counterType.name,
      snapshotId: snapshot.id,
      namespaces: Object.keys(current),
      saved,
    })

    return { snapshot, saved }
  }

  async deleteSnapshot(): Promise<void> {
    await this.snapshotStore.delete()
  }

  private createSnapshot(readings: ReadingSet): Snapshot {
    return {
      id: uuidv4(),
      counterType: this.counterType.name,
      savedAt: new Date().toISOString(),
      readings,
    }
  }
}

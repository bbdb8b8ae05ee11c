import { NamespaceReadings, ReadingSet, Snapshot, StoredReading, StoredSnapshot } from '../contracts'
import { counterToString, parseCounter, parseRate, rateToString } from '../counters/values'

export function toStoredSnapshot(snapshot: Snapshot): StoredSnapshot {
  const namespaces: StoredSnapshot['namespaces'] = {}
  for (const [namespace, readings] of Object.entries(snapshot.readings)) {
    const stored: Record<string, StoredReading> = {}
    for (const [name, reading] of Object.entries(readings)) {
      stored[name] = {
        packets: counterToString(reading.packets),
        bytes: counterToString(reading.bytes),
        rate: rateToString(reading.rate),
        counterOid: reading.counterOid,
      }
    }
    namespaces[namespace] = stored
  }

  return {
    id: snapshot.id,
    counterType: snapshot.counterType,
    savedAt: snapshot.savedAt,
    namespaces,
  }
}

export function fromStoredSnapshot(stored: StoredSnapshot): Snapshot {
  const readings: ReadingSet = {}
  for (const [namespace, storedReadings] of Object.entries(stored.namespaces)) {
    const namespaceReadings: NamespaceReadings = {}
    for (const [name, reading] of Object.entries(storedReadings)) {
      namespaceReadings[name] = {
        packets: parseCounter(reading.packets),
        bytes: parseCounter(reading.bytes),
        rate: parseRate(reading.rate),
        counterOid: reading.counterOid,
      }
    }
    readings[namespace] = namespaceReadings
  }

  return {
    id: stored.id,
    counterType: stored.counterType,
    savedAt: stored.savedAt,
    readings,
  }
}

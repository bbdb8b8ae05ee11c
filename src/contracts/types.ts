export interface Count {
  kind: 'count'
  value: bigint
}

export interface Unavailable {
  kind: 'unavailable'
}

export interface Rate {
  kind: 'rate'
  display: string
}

export type CounterValue = Count | Unavailable
export type RateValue = Rate | Unavailable

export interface Reading {
  packets: CounterValue
  bytes: CounterValue
  rate: RateValue
  counterOid: string
}

// Only these fields take part in diffing; rate is always read fresh
export const DIFFED_FIELDS = ['packets', 'bytes'] as const

export type NamespaceReadings = Record<string, Reading>
export type ReadingSet = Record<string, NamespaceReadings>

export interface Snapshot {
  id: string
  counterType: string
  savedAt: string
  readings: ReadingSet
}

export interface CounterTypeDefinition {
  name: string
  nameMapKey: string
  nameHeader: string
  label: string
}

export interface FlowstatConfig {
  store: {
    dumpPath: string
  }
  cache: {
    dir: string
  }
  counterTypes: Record<string, Omit<CounterTypeDefinition, 'name'>>
}

import { CounterValue, DIFFED_FIELDS, Reading, ReadingSet } from '../contracts'
import { count } from './values'

export interface DiffResult {
  /** Readings to show: deltas for entities with a baseline, absolute values otherwise */
  display: ReadingSet
  /** Baseline to persist, null when there was none */
  baseline: ReadingSet | null
  /** True when the baseline changed and must be rewritten */
  dirty: boolean
}

interface EntityDiff {
  display: Reading
  baseline: Reading
  rebased: boolean
}

const own = <T>(record: Record<string, T>, key: string): T | undefined =>
  Object.hasOwn(record, key) ? record[key] : undefined

const cloneReadingSet = (set: ReadingSet): ReadingSet => {
  const clone: ReadingSet = {}
  for (const [namespace, readings] of Object.entries(set)) {
    clone[namespace] = { ...readings }
  }
  return clone
}

const subtract = (current: CounterValue, baseline: CounterValue): CounterValue => {
  if (current.kind !== 'count' || baseline.kind !== 'count') {
    return current
  }
  const delta = current.value - baseline.value
  return count(delta < 0n ? 0n : delta)
}

const applyDiff = (current: Reading, baseline: Reading): Reading => {
  const display: Reading = { ...current }
  for (const field of DIFFED_FIELDS) {
    display[field] = subtract(current[field], baseline[field])
  }
  return display
}

const zeroBaseline = (baseline: Reading, counterOid: string): Reading => {
  const zeroed: Reading = { ...baseline, counterOid }
  for (const field of DIFFED_FIELDS) {
    zeroed[field] = count(0n)
  }
  return zeroed
}

// Every diffed field is checked before anything is rebased
const hasRegressed = (baseline: Reading, current: Reading): boolean =>
  DIFFED_FIELDS.some((field) => {
    const before = baseline[field]
    const after = current[field]
    return before.kind === 'count' && after.kind === 'count' && after.value < before.value
  })

const diffEntity = (baseline: Reading, current: Reading): EntityDiff => {
  // A new counter OID means the entity was recreated and its counters restarted
  // from zero; this takes precedence over the regression check.
  if (current.counterOid !== baseline.counterOid) {
    const zeroed = zeroBaseline(baseline, current.counterOid)
    return { display: applyDiff(current, zeroed), baseline: zeroed, rebased: true }
  }

  if (hasRegressed(baseline, current)) {
    const zeroed = zeroBaseline(baseline, baseline.counterOid)
    return { display: applyDiff(current, zeroed), baseline: zeroed, rebased: true }
  }

  return { display: applyDiff(current, baseline), baseline, rebased: false }
}

/**
 * Diff current readings against the previous baseline.
 *
 * Only entities present in both, within the same namespace, are diffed.
 * Entities that are new pass through with absolute values; entities that
 * disappeared stay in the baseline untouched. Neither argument is modified.
 */
export function diffReadings(previous: ReadingSet | null, current: ReadingSet): DiffResult {
  const display = cloneReadingSet(current)

  if (!previous || Object.keys(previous).length === 0) {
    return { display, baseline: previous && cloneReadingSet(previous), dirty: false }
  }

  const baseline = cloneReadingSet(previous)
  let dirty = false

  for (const [namespace, readings] of Object.entries(display)) {
    const baselineReadings = own(baseline, namespace)
    if (!baselineReadings) continue

    for (const [name, reading] of Object.entries(readings)) {
      const baselineReading = own(baselineReadings, name)
      if (!baselineReading) continue

      const result = diffEntity(baselineReading, reading)
      readings[name] = result.display
      baselineReadings[name] = result.baseline
      dirty = dirty || result.rebased
    }
  }

  return { display, baseline, dirty }
}

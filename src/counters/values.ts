import { Count, CounterValue, RateValue, Unavailable } from '../contracts'

export const NOT_AVAILABLE = 'N/A'

export const unavailable = (): Unavailable => ({ kind: 'unavailable' })

export const count = (value: bigint): Count => ({ kind: 'count', value })

const UNSIGNED_DECIMAL = /^\d+$/

/**
 * Parse a raw store value; anything that is not an unsigned decimal
 * integer is reported as unavailable
 */
export const parseCounter = (raw: string | null): CounterValue => {
  if (raw === null) {
    return unavailable()
  }
  const trimmed = raw.trim()
  return UNSIGNED_DECIMAL.test(trimmed) ? count(BigInt(trimmed)) : unavailable()
}

export const parseRate = (raw: string | null): RateValue =>
  raw === null ? unavailable() : { kind: 'rate', display: raw }

export const counterToString = (value: CounterValue): string | null =>
  value.kind === 'count' ? value.value.toString() : null

export const rateToString = (value: RateValue): string | null =>
  value.kind === 'rate' ? value.display : null

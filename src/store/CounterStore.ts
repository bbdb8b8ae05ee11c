/**
 * Read-only view of one namespace of the counters database
 */
export interface CounterStoreClient {
  readonly namespace: string

  /**
   * All fields stored under a key; empty when the key does not exist
   */
  getAll(key: string): Promise<Record<string, string>>

  /**
   * One field of a key, or null when either is missing
   */
  get(key: string, field: string): Promise<string | null>
}

export interface CounterStoreConnector {
  /**
   * Every namespace the platform exposes, in discovery order
   */
  listNamespaces(): Promise<string[]>

  connect(namespace: string): Promise<CounterStoreClient>
}

export class CounterStoreError extends Error {
  constructor(message: string, readonly source?: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'CounterStoreError'
  }
}

// Database keys, in the layout the switch's counters DB uses
export const COUNTERS_KEY_PREFIX = 'COUNTERS'
export const RATES_KEY_PREFIX = 'RATES'
export const PACKETS_FIELD = 'SAI_COUNTER_STAT_PACKETS'
export const BYTES_FIELD = 'SAI_COUNTER_STAT_BYTES'
export const RATE_FIELD = 'RX_PPS'

export const countersKey = (counterOid: string): string => `${COUNTERS_KEY_PREFIX}:${counterOid}`
export const ratesKey = (counterOid: string): string => `${RATES_KEY_PREFIX}:${counterOid}`

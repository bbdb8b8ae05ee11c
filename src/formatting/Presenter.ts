import { CounterTypeDefinition, CounterValue, RateValue, ReadingSet } from '../contracts'

/**
 * Renders diffed readings for the terminal or for machines
 */
export interface Presenter {
  render(readings: ReadingSet, options: PresentOptions): string
}

export interface PresentOptions {
  counterType: CounterTypeDefinition

  /**
   * Only show this namespace; all namespaces when omitted
   */
  namespace?: string

  /**
   * Add the namespace column; set when the platform has more than one namespace
   */
  showNamespace: boolean
}

export type OutputFormat = 'table' | 'json'

export type Cell =
  | { kind: 'text'; text: string }
  | { kind: 'counter'; value: CounterValue }
  | { kind: 'rate'; value: RateValue }

export const NAMESPACE_HEADER = 'ASIC ID'
export const PACKETS_HEADER = 'Packets'
export const BYTES_HEADER = 'Bytes'
export const RATE_HEADER = 'PPS'

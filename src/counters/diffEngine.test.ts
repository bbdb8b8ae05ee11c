import { describe, it, expect } from 'vitest'
import { diffReadings } from './diffEngine'
import { count, unavailable } from './values'
import { Reading, ReadingSet } from '../contracts'

const reading = (
  packets: bigint | null,
  bytes: bigint | null,
  counterOid: string,
  rate = '0.00'
): Reading => ({
  packets: packets === null ? unavailable() : count(packets),
  bytes: bytes === null ? unavailable() : count(bytes),
  rate: { kind: 'rate', display: rate },
  counterOid,
})

describe('diffReadings', () => {
  describe('without a baseline', () => {
    it('should pass absolute values through when there is no snapshot', () => {
      const current: ReadingSet = { '': { bgp: reading(150n, 620n, 'x') } }

      const result = diffReadings(null, current)

      expect(result.dirty).toBe(false)
      expect(result.baseline).toBeNull()
      expect(result.display).toEqual(current)
    })

    it('should treat an empty snapshot like a missing one', () => {
      const current: ReadingSet = { '': { bgp: reading(150n, 620n, 'x') } }

      const result = diffReadings({}, current)

      expect(result.dirty).toBe(false)
      expect(result.baseline).toEqual({})
      expect(result.display).toEqual(current)
    })
  })

  describe('normal case', () => {
    it('should subtract the baseline from current values', () => {
      const previous: ReadingSet = { '': { bgp: reading(100n, 500n, 'x') } }
      const current: ReadingSet = { '': { bgp: reading(150n, 620n, 'x', '3.50') } }

      const result = diffReadings(previous, current)

      expect(result.dirty).toBe(false)
      expect(result.display[''].bgp).toEqual(reading(50n, 120n, 'x', '3.50'))
      expect(result.baseline).toEqual(previous)
    })

    it('should never modify its arguments', () => {
      const previous: ReadingSet = { '': { bgp: reading(100n, 500n, 'x') } }
      const current: ReadingSet = { '': { bgp: reading(150n, 620n, 'y') } }

      diffReadings(previous, current)

      expect(previous[''].bgp).toEqual(reading(100n, 500n, 'x'))
      expect(current[''].bgp).toEqual(reading(150n, 620n, 'y'))
    })

    it('should keep the current rate and never compare it', () => {
      const previous: ReadingSet = { '': { bgp: reading(10n, 10n, 'x', '99.00') } }
      const current: ReadingSet = { '': { bgp: reading(10n, 10n, 'x', '1.00') } }

      const result = diffReadings(previous, current)

      expect(result.dirty).toBe(false)
      expect(result.display[''].bgp.rate).toEqual({ kind: 'rate', display: '1.00' })
    })
  })

  describe('identity change', () => {
    it('should diff against a zero baseline and record the new identity', () => {
      const previous: ReadingSet = { '': { bgp: reading(100n, 500n, 'x') } }
      const current: ReadingSet = { '': { bgp: reading(10n, 20n, 'y') } }

      const result = diffReadings(previous, current)

      expect(result.dirty).toBe(true)
      expect(result.display[''].bgp).toEqual(reading(10n, 20n, 'y'))
      expect(result.baseline?.[''].bgp.counterOid).toBe('y')
      expect(result.baseline?.[''].bgp.packets).toEqual(count(0n))
      expect(result.baseline?.[''].bgp.bytes).toEqual(count(0n))
    })

    it('should take precedence over a regression', () => {
      const previous: ReadingSet = { '': { bgp: reading(100n, 500n, 'x') } }
      const current: ReadingSet = { '': { bgp: reading(5n, 7n, 'y') } }

      const result = diffReadings(previous, current)

      expect(result.dirty).toBe(true)
      expect(result.display[''].bgp).toEqual(reading(5n, 7n, 'y'))
      expect(result.baseline?.[''].bgp).toEqual(reading(0n, 0n, 'y'))
    })
  })

  describe('regression', () => {
    it('should rebase every diffed field when one of them went backward', () => {
      const previous: ReadingSet = { '': { bgp: reading(200n, 300n, 'x') } }
      const current: ReadingSet = { '': { bgp: reading(50n, 310n, 'x') } }

      const result = diffReadings(previous, current)

      expect(result.dirty).toBe(true)
      expect(result.display[''].bgp.packets).toEqual(count(50n))
      expect(result.display[''].bgp.bytes).toEqual(count(310n))
      expect(result.baseline?.[''].bgp).toEqual(reading(0n, 0n, 'x'))
    })

    it('should never produce negative deltas', () => {
      const pairs: Array<[bigint, bigint, bigint, bigint]> = [
        [0n, 0n, 0n, 0n],
        [5n, 5n, 4n, 6n],
        [5n, 5n, 6n, 4n],
        [18446744073709551615n, 1n, 0n, 2n],
        [1n, 2n, 18446744073709551615n, 2n],
      ]

      for (const [oldPackets, oldBytes, newPackets, newBytes] of pairs) {
        const result = diffReadings(
          { '': { e: reading(oldPackets, oldBytes, 'x') } },
          { '': { e: reading(newPackets, newBytes, 'x') } }
        )
        const { packets, bytes } = result.display[''].e
        for (const value of [packets, bytes]) {
          expect(value.kind).toBe('count')
          if (value.kind === 'count') {
            expect(value.value >= 0n).toBe(true)
          }
        }
      }
    })
  })

  describe('unavailable fields', () => {
    it('should leave an unavailable field out of arithmetic', () => {
      const previous: ReadingSet = { '': { bgp: reading(100n, 500n, 'x') } }
      const current: ReadingSet = { '': { bgp: reading(150n, null, 'x') } }

      const result = diffReadings(previous, current)

      expect(result.dirty).toBe(false)
      expect(result.display[''].bgp.packets).toEqual(count(50n))
      expect(result.display[''].bgp.bytes).toEqual(unavailable())
    })

    it('should not report a regression against an unavailable baseline field', () => {
      const previous: ReadingSet = { '': { bgp: reading(null, 500n, 'x') } }
      const current: ReadingSet = { '': { bgp: reading(3n, 600n, 'x') } }

      const result = diffReadings(previous, current)

      expect(result.dirty).toBe(false)
      expect(result.display[''].bgp.packets).toEqual(count(3n))
      expect(result.display[''].bgp.bytes).toEqual(count(100n))
    })
  })

  describe('membership', () => {
    it('should pass a new entity through with absolute values', () => {
      const previous: ReadingSet = { '': { bgp: reading(100n, 500n, 'x') } }
      const current: ReadingSet = {
        '': { bgp: reading(100n, 500n, 'x'), lldp: reading(7n, 900n, 'z') },
      }

      const result = diffReadings(previous, current)

      expect(result.dirty).toBe(false)
      expect(result.display[''].lldp).toEqual(reading(7n, 900n, 'z'))
      expect(result.baseline?.[''].lldp).toBeUndefined()
    })

    it('should drop entities that disappeared from the display but keep them in the baseline', () => {
      const previous: ReadingSet = {
        '': { bgp: reading(100n, 500n, 'x'), arp: reading(1n, 2n, 'w') },
      }
      const current: ReadingSet = { '': { bgp: reading(100n, 500n, 'x') } }

      const result = diffReadings(previous, current)

      expect(Object.keys(result.display[''])).toEqual(['bgp'])
      expect(result.baseline?.[''].arp).toEqual(reading(1n, 2n, 'w'))
    })

    it('should not look up inherited properties as entities', () => {
      const previous: ReadingSet = { '': { bgp: reading(1n, 1n, 'x') } }
      const current: ReadingSet = { '': { constructor: reading(4n, 4n, 'c') } }

      const result = diffReadings(previous, current)

      expect(result.display[''].constructor).toEqual(reading(4n, 4n, 'c'))
      expect(result.dirty).toBe(false)
    })
  })

  describe('namespaces', () => {
    it('should diff each namespace against its own baseline only', () => {
      const previous: ReadingSet = {
        asic0: { bgp: reading(100n, 100n, 'a') },
        asic1: { bgp: reading(900n, 900n, 'b') },
      }
      const current: ReadingSet = {
        asic0: { bgp: reading(50n, 150n, 'a') },
        asic1: { bgp: reading(950n, 910n, 'b') },
      }

      const result = diffReadings(previous, current)

      expect(result.dirty).toBe(true)
      expect(result.display.asic0.bgp).toEqual(reading(50n, 150n, 'a'))
      expect(result.display.asic1.bgp).toEqual(reading(50n, 10n, 'b'))
      expect(result.baseline?.asic0.bgp).toEqual(reading(0n, 0n, 'a'))
      expect(result.baseline?.asic1.bgp).toEqual(reading(900n, 900n, 'b'))
    })

    it('should pass through a namespace with no baseline', () => {
      const previous: ReadingSet = { asic0: { bgp: reading(1n, 1n, 'a') } }
      const current: ReadingSet = {
        asic0: { bgp: reading(2n, 2n, 'a') },
        asic1: { bgp: reading(9n, 9n, 'b') },
      }

      const result = diffReadings(previous, current)

      expect(result.display.asic1.bgp).toEqual(reading(9n, 9n, 'b'))
      expect(result.baseline?.asic1).toBeUndefined()
    })
  })
})

import { describe, it, expect } from 'vitest'
import { TablePresenter } from './TablePresenter'
import { PresentOptions } from '../Presenter'
import { count, unavailable } from '../../counters/values'
import { CounterTypeDefinition, Reading, ReadingSet } from '../../contracts'

const trap: CounterTypeDefinition = {
  name: 'trap',
  nameMapKey: 'COUNTERS_TRAP_NAME_MAP',
  nameHeader: 'Trap Name',
  label: 'Trap',
}

const reading = (packets: bigint | null, bytes: bigint | null, rate: string | null): Reading => ({
  packets: packets === null ? unavailable() : count(packets),
  bytes: bytes === null ? unavailable() : count(bytes),
  rate: rate === null ? unavailable() : { kind: 'rate', display: rate },
  counterOid: 'oid:0x1',
})

describe('TablePresenter', () => {
  const presenter = new TablePresenter()

  it('should render a sorted, aligned table with thousands separators', () => {
    const readings: ReadingSet = {
      '': {
        lldp: reading(1234567n, 98765432n, '12.5'),
        bgp: reading(0n, 0n, null),
        arp_req: reading(null, 42n, '0'),
      },
    }
    const options: PresentOptions = { counterType: trap, showNamespace: false }

    expect(presenter.render(readings, options).split('\n')).toEqual([
      'Trap Name    Packets       Bytes   PPS',
      '---------  ---------  ----------  ----',
      'arp_req          N/A          42     0',
      'bgp                0           0   N/A',
      'lldp       1,234,567  98,765,432  12.5',
    ])
  })

  it('should add the namespace column and order namespaces naturally', () => {
    const readings: ReadingSet = {
      asic10: { bgp: reading(9n, 18n, '3.0') },
      asic0: { bgp: reading(5n, 10n, '1.0') },
      asic2: { bgp: reading(7n, 14n, '2.0') },
    }

    const output = presenter.render(readings, { counterType: trap, showNamespace: true })

    expect(output.split('\n')).toEqual([
      'ASIC ID  Trap Name  Packets  Bytes  PPS',
      '-------  ---------  -------  -----  ---',
      'asic0    bgp              5     10  1.0',
      'asic2    bgp              7     14  2.0',
      'asic10   bgp              9     18  3.0',
    ])
  })

  it('should render only the requested namespace', () => {
    const readings: ReadingSet = {
      asic0: { bgp: reading(5n, 10n, '1.0') },
      asic1: { lldp: reading(6n, 12n, '1.0') },
    }

    const output = presenter.render(readings, { counterType: trap, namespace: 'asic1', showNamespace: true })
    const lines = output.split('\n')

    expect(lines).toHaveLength(3)
    expect(lines[2]).toBe('asic1    lldp             6     12  1.0')
  })

  it('should render headers only when there are no entities', () => {
    const output = presenter.render({ '': {} }, { counterType: trap, showNamespace: false })

    expect(output).toBe('Trap Name  Packets  Bytes  PPS\n---------  -------  -----  ---')
  })
})

import { CounterTypeDefinition, NamespaceReadings, ReadingSet } from '../contracts'
import {
  BYTES_FIELD,
  CounterStoreClient,
  CounterStoreConnector,
  PACKETS_FIELD,
  RATE_FIELD,
  countersKey,
  ratesKey,
} from '../store/CounterStore'
import { forEachNamespace } from '../namespace/forEachNamespace'
import { parseCounter, parseRate } from './values'
import { debugLog } from '../utils/debug'

export class Collector {
  constructor(
    private connector: CounterStoreConnector,
    private counterType: CounterTypeDefinition
  ) {}

  /**
   * Read current counters for every entity of the counter type, per namespace.
   * Store errors are not caught here.
   */
  async collect(namespace?: string): Promise<ReadingSet> {
    return forEachNamespace(this.connector, namespace, (client) => this.collectNamespace(client))
  }

  private async collectNamespace(client: CounterStoreClient): Promise<NamespaceReadings> {
    const nameMap = await client.getAll(this.counterType.nameMapKey)
    const readings: NamespaceReadings = {}

    for (const [name, counterOid] of Object.entries(nameMap)) {
      const packets = await client.get(countersKey(counterOid), PACKETS_FIELD)
      const bytes = await client.get(countersKey(counterOid), BYTES_FIELD)
      const rate = await client.get(ratesKey(counterOid), RATE_FIELD)

      readings[name] = {
        packets: parseCounter(packets),
        bytes: parseCounter(bytes),
        rate: parseRate(rate),
        counterOid,
      }
    }

    debugLog({
      event: 'namespace_collected',
      namespace: client.namespace,
      counterType: this.counterType.name,
      entityCount: Object.keys(readings).length,
    })

    return readings
  }
}

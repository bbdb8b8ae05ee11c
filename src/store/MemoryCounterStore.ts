import { CounterStoreClient, CounterStoreConnector, CounterStoreError } from './CounterStore'

type NamespaceData = Map<string, Map<string, string>>

class MemoryCounterStoreClient implements CounterStoreClient {
  constructor(readonly namespace: string, private data: NamespaceData) {}

  async getAll(key: string): Promise<Record<string, string>> {
    return Object.fromEntries(this.data.get(key) ?? new Map<string, string>())
  }

  async get(key: string, field: string): Promise<string | null> {
    return this.data.get(key)?.get(field) ?? null
  }
}

export class MemoryCounterStore implements CounterStoreConnector {
  private namespaces: Map<string, NamespaceData> = new Map()

  constructor(namespaces: string[] = ['']) {
    for (const namespace of namespaces) {
      this.namespaces.set(namespace, new Map())
    }
  }

  async listNamespaces(): Promise<string[]> {
    return Array.from(this.namespaces.keys())
  }

  async connect(namespace: string): Promise<CounterStoreClient> {
    return new MemoryCounterStoreClient(namespace, this.namespaceData(namespace))
  }

  setFields(namespace: string, key: string, fields: Record<string, string>): void {
    const data = this.namespaceData(namespace)
    const entry = data.get(key) ?? new Map<string, string>()
    for (const [field, value] of Object.entries(fields)) {
      entry.set(field, value)
    }
    data.set(key, entry)
  }

  deleteKey(namespace: string, key: string): void {
    this.namespaceData(namespace).delete(key)
  }

  deleteField(namespace: string, key: string, field: string): void {
    this.namespaceData(namespace).get(key)?.delete(field)
  }

  private namespaceData(namespace: string): NamespaceData {
    const data = this.namespaces.get(namespace)
    if (!data) {
      throw new CounterStoreError(`Unknown namespace: ${namespace || '<default>'}`)
    }
    return data
  }
}

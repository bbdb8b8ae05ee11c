import { promises as fs } from 'fs'
import { z } from 'zod'
import { CounterDumpSchema } from '../contracts'
import { CounterStoreClient, CounterStoreConnector, CounterStoreError } from './CounterStore'
import { debugLog, errorMessage } from '../utils/debug'

type CounterDump = z.infer<typeof CounterDumpSchema>

class DumpClient implements CounterStoreClient {
  constructor(
    readonly namespace: string,
    private data: Record<string, Record<string, string>>
  ) {}

  async getAll(key: string): Promise<Record<string, string>> {
    return { ...(this.data[key] ?? {}) }
  }

  async get(key: string, field: string): Promise<string | null> {
    return this.data[key]?.[field] ?? null
  }
}

/**
 * Counter store backed by a JSON dump of the counters database.
 *
 * The dump maps each namespace ("" for the default one) to its keys, and
 * each key to a field map, e.g.
 * `{ "": { "COUNTERS_TRAP_NAME_MAP": { "bgp": "oid:0x1" } } }`.
 * The file is read once, on first use.
 */
export class FileCounterStore implements CounterStoreConnector {
  private dump: CounterDump | null = null

  constructor(private dumpPath: string) {}

  async listNamespaces(): Promise<string[]> {
    const dump = await this.load()
    return Object.keys(dump)
  }

  async connect(namespace: string): Promise<CounterStoreClient> {
    const dump = await this.load()
    const data = dump[namespace]
    if (!data) {
      throw new CounterStoreError(
        `Namespace ${namespace || '<default>'} not found in ${this.dumpPath}`,
        this.dumpPath
      )
    }
    return new DumpClient(namespace, data)
  }

  private async load(): Promise<CounterDump> {
    if (this.dump) {
      return this.dump
    }

    let raw: string
    try {
      raw = await fs.readFile(this.dumpPath, 'utf8')
    } catch (error) {
      throw new CounterStoreError(
        `Unable to read counters from ${this.dumpPath}: ${errorMessage(error)}`,
        this.dumpPath,
        { cause: error }
      )
    }

    let parsed: unknown
    try {
      parsed = JSON.parse(raw)
    } catch (error) {
      throw new CounterStoreError(
        `Invalid JSON in counters dump ${this.dumpPath}`,
        this.dumpPath,
        { cause: error }
      )
    }

    const result = CounterDumpSchema.safeParse(parsed)
    if (!result.success) {
      throw new CounterStoreError(
        `Malformed counters dump ${this.dumpPath}: ${result.error.issues[0]?.message ?? 'unknown issue'}`,
        this.dumpPath
      )
    }

    debugLog({
      event: 'counters_dump_loaded',
      file: this.dumpPath,
      namespaces: Object.keys(result.data),
    })

    this.dump = result.data
    return this.dump
  }
}

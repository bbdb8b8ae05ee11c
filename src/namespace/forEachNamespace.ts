import { CounterStoreClient, CounterStoreConnector } from '../store/CounterStore'
import { UsageError } from '../contracts'

/**
 * Resolve which namespaces to visit: the selected one, or all of them
 */
export async function resolveNamespaces(
  connector: CounterStoreConnector,
  selection?: string
): Promise<string[]> {
  const namespaces = await connector.listNamespaces()
  if (selection === undefined) {
    return namespaces
  }
  if (!namespaces.includes(selection)) {
    const known = namespaces.map((ns) => ns || '<default>').join(', ')
    throw new UsageError(`Unknown namespace '${selection}'. Available: ${known}`)
  }
  return [selection]
}

/**
 * Visit each namespace in turn with a client connected to it, collecting
 * the results keyed by namespace. Namespaces are visited one at a time.
 */
export async function forEachNamespace<T>(
  connector: CounterStoreConnector,
  selection: string | undefined,
  visit: (client: CounterStoreClient) => Promise<T>
): Promise<Record<string, T>> {
  const results: Record<string, T> = {}
  for (const namespace of await resolveNamespaces(connector, selection)) {
    const client = await connector.connect(namespace)
    results[namespace] = await visit(client)
  }
  return results
}

import { ConfigLoader } from '../config/ConfigLoader'
import { commands } from '../commands'
import { FlowCounterStats } from '../counters/FlowCounterStats'
import { PresenterFactory } from '../formatting'
import { CounterStoreConnector } from '../store/CounterStore'
import { FileCounterStore } from '../store/FileCounterStore'
import { SnapshotStore } from '../storage/SnapshotStore'
import { FileSnapshotStore, currentUserId, snapshotPath } from '../storage/FileSnapshotStore'
import { UsageError } from '../contracts'
import { USAGE, parseArgs } from './args'
import { debugLog } from '../utils/debug'

export const EXIT_OK = 0
export const EXIT_FAILURE = 1
export const EXIT_USAGE = 2

/**
 * Collaborators the CLI would otherwise build from configuration
 */
export interface RunDependencies {
  configLoader?: ConfigLoader
  connector?: CounterStoreConnector
  snapshotStore?: SnapshotStore
}

export async function run(argv: string[], deps: RunDependencies = {}): Promise<number> {
  try {
    const args = parseArgs(argv)
    if (args.help) {
      console.log(USAGE)
      return EXIT_OK
    }

    const configLoader = deps.configLoader ?? new ConfigLoader(args.config)
    const config = configLoader.getConfig()
    const counterType = configLoader.getCounterType(args.type)

    const connector = deps.connector ?? new FileCounterStore(config.store.dumpPath)
    const snapshotStore = deps.snapshotStore ??
      new FileSnapshotStore(snapshotPath(config.cache.dir, counterType.name, currentUserId()))

    const stats = new FlowCounterStats(connector, snapshotStore, counterType)
    if (args.delete) {
      await stats.deleteSnapshot()
    }

    const command = commands[args.clear ? 'clear' : 'show']

    debugLog({ event: 'command_start', command: command.name, counterType: counterType.name, namespace: args.namespace })

    const result = await command.execute({
      stats,
      counterType,
      presenter: PresenterFactory.createPresenter(args.json ? 'json' : 'table'),
      namespace: args.namespace,
    })
    console.log(result.output)
    return EXIT_OK
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`flowstat: ${error.message}`)
      console.error(USAGE)
      return EXIT_USAGE
    }
    console.error('flowstat: failed to read counters:', error)
    return EXIT_FAILURE
  }
}

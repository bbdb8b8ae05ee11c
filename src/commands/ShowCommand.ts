import { Command, CommandContext, CommandResult } from './types'
import { debugLog } from '../utils/debug'

export const ShowCommand: Command = {
  name: 'show',
  description: 'Show counters accumulated since the last clear',
  execute: async ({ stats, counterType, presenter, namespace }: CommandContext): Promise<CommandResult> => {
    const { readings, rebased } = await stats.show(namespace)
    const showNamespace = await stats.hasMultipleNamespaces()

    if (rebased) {
      debugLog({ event: 'baseline_rebased', counterType: counterType.name, namespace: namespace ?? null })
    }

    return {
      output: presenter.render(readings, { counterType, namespace, showNamespace }),
    }
  },
}

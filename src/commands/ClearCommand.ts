import { Command, CommandContext, CommandResult } from './types'

export const ClearCommand: Command = {
  name: 'clear',
  description: 'Use the current counter values as the new baseline',
  execute: async ({ stats, counterType, namespace }: CommandContext): Promise<CommandResult> => {
    const { saved } = await stats.clear(namespace)

    return {
      output: saved
        ? `${counterType.label} counters were successfully cleared`
        : `${counterType.label} counters could not be cleared`,
    }
  },
}

import { CounterTypeDefinition } from '../contracts'
import { FlowCounterStats } from '../counters/FlowCounterStats'
import { Presenter } from '../formatting'

export interface CommandContext {
  stats: FlowCounterStats
  counterType: CounterTypeDefinition
  presenter: Presenter
  namespace?: string
}

export interface CommandResult {
  output: string
}

export type CommandName = 'show' | 'clear'

export interface Command {
  name: CommandName
  description: string
  execute: (context: CommandContext) => Promise<CommandResult>
}

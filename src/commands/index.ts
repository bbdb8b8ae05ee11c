export * from './types'
export { ShowCommand } from './ShowCommand'
export { ClearCommand } from './ClearCommand'

import { Command, CommandName } from './types'
import { ShowCommand } from './ShowCommand'
import { ClearCommand } from './ClearCommand'

export const commands: Record<CommandName, Command> = {
  show: ShowCommand,
  clear: ClearCommand,
}

import { parseArgs as parseNodeArgs } from 'util'
import { UsageError } from '../contracts'

export interface CliOptions {
  type: string
  clear: boolean
  delete: boolean
  json: boolean
  namespace?: string
  config?: string
}

export type ParsedArgs = { help: true } | ({ help: false } & CliOptions)

export const USAGE = `Usage: flowstat --type <type> [options]

Show per-entity packet and byte counters, relative to the last clear.

Options:
  -t, --type <type>       counter type to show (required), e.g. trap
  -c, --clear             use the current values as the new baseline
  -d, --delete            delete the saved baseline before proceeding
  -j, --json              print JSON instead of a table
  -n, --namespace <ns>    only show one namespace
      --config <path>     read configuration from this file
  -h, --help              show this help`

const parseOptions = (argv: string[]) =>
  parseNodeArgs({
    args: argv,
    strict: true,
    allowPositionals: false,
    options: {
      type: { type: 'string', short: 't' },
      clear: { type: 'boolean', short: 'c' },
      delete: { type: 'boolean', short: 'd' },
      json: { type: 'boolean', short: 'j' },
      namespace: { type: 'string', short: 'n' },
      config: { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
  })

export function parseArgs(argv: string[]): ParsedArgs {
  let parsed: ReturnType<typeof parseOptions>
  try {
    parsed = parseOptions(argv)
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error))
  }

  const { values } = parsed
  if (values.help) {
    return { help: true }
  }

  if (!values.type) {
    throw new UsageError('Missing required option --type')
  }

  return {
    help: false,
    type: values.type,
    clear: values.clear ?? false,
    delete: values.delete ?? false,
    json: values.json ?? false,
    namespace: values.namespace,
    config: values.config,
  }
}

import fs from 'fs'
import path from 'path'
import { z } from 'zod'
import { CounterTypeDefinition, FlowstatConfig, FlowstatConfigSchema, UsageError } from '../contracts'
import { DEFAULT_CACHE_DIR } from '../storage/FileSnapshotStore'

export const DEFAULT_DUMP_PATH = '/var/run/flowstat/counters-db.json'

export const BUILTIN_COUNTER_TYPES: FlowstatConfig['counterTypes'] = {
  trap: {
    nameMapKey: 'COUNTERS_TRAP_NAME_MAP',
    nameHeader: 'Trap Name',
    label: 'Trap',
  },
}

export class ConfigLoader {
  private config: FlowstatConfig

  constructor(
    private configPath?: string,
    private env: NodeJS.ProcessEnv = process.env
  ) {
    this.config = this.loadConfig()
  }

  private findConfigFile(): string | null {
    const configNames = ['.flowstat.config.json', 'flowstat.config.json']

    // Start from current directory and walk up
    let currentDir = process.cwd()

    while (currentDir !== path.parse(currentDir).root) {
      for (const configName of configNames) {
        const configPath = path.join(currentDir, configName)
        if (fs.existsSync(configPath)) {
          return configPath
        }
      }
      currentDir = path.dirname(currentDir)
    }

    return null
  }

  private readConfigFile(): z.infer<typeof FlowstatConfigSchema> | null {
    const configPath = this.configPath ?? this.findConfigFile()

    if (!configPath || !fs.existsSync(configPath)) {
      return null
    }

    try {
      const rawConfig = fs.readFileSync(configPath, 'utf-8')
      const parsedConfig: unknown = JSON.parse(rawConfig)
      return FlowstatConfigSchema.parse(parsedConfig)
    } catch (error) {
      if (error instanceof z.ZodError) {
        console.error(`Invalid config at ${configPath}:`, error.errors)
      } else if (error instanceof SyntaxError) {
        console.error(`Invalid JSON in config file ${configPath}`)
      } else {
        console.error(`Error loading config from ${configPath}:`, error)
      }

      return null
    }
  }

  private loadConfig(): FlowstatConfig {
    const fileConfig = this.readConfigFile()

    return {
      store: {
        dumpPath: this.env.FLOWSTAT_COUNTERS_DUMP || fileConfig?.store.dumpPath || DEFAULT_DUMP_PATH,
      },
      cache: {
        dir: this.env.FLOWSTAT_CACHE_DIR || fileConfig?.cache.dir || DEFAULT_CACHE_DIR,
      },
      counterTypes: {
        ...BUILTIN_COUNTER_TYPES,
        ...fileConfig?.counterTypes,
      },
    }
  }

  getConfig(): FlowstatConfig {
    return this.config
  }

  getCounterTypeNames(): string[] {
    return Object.keys(this.config.counterTypes).sort()
  }

  getCounterType(name: string): CounterTypeDefinition {
    const definition = Object.hasOwn(this.config.counterTypes, name)
      ? this.config.counterTypes[name]
      : undefined
    if (!definition) {
      throw new UsageError(
        `Unknown counter type '${name}'. Valid types: ${this.getCounterTypeNames().join(', ')}`
      )
    }
    return { name, ...definition }
  }
}

import { describe, it, expect } from 'vitest'
import { parseArgs } from './args'
import { UsageError } from '../contracts'

describe('parseArgs', () => {
  it('should parse long options', () => {
    expect(parseArgs(['--type', 'trap', '--json', '--namespace', 'asic1', '--delete'])).toEqual({
      help: false,
      type: 'trap',
      clear: false,
      delete: true,
      json: true,
      namespace: 'asic1',
      config: undefined,
    })
  })

  it('should parse short options and inline values', () => {
    expect(parseArgs(['-t', 'trap', '-c', '--config=/etc/flowstat.json'])).toEqual({
      help: false,
      type: 'trap',
      clear: true,
      delete: false,
      json: false,
      namespace: undefined,
      config: '/etc/flowstat.json',
    })
  })

  it('should return help without requiring a type', () => {
    expect(parseArgs(['--help'])).toEqual({ help: true })
  })

  it('should require --type', () => {
    expect(() => parseArgs(['--clear'])).toThrow(new UsageError('Missing required option --type'))
  })

  it('should reject unknown options and positionals', () => {
    expect(() => parseArgs(['--type', 'trap', '--verbose'])).toThrow(UsageError)
    expect(() => parseArgs(['--type', 'trap', 'extra'])).toThrow(UsageError)
  })
})

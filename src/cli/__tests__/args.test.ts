import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { CommanderError, InvalidArgumentError } from 'commander'
import { parseArgs, parseIsoDate, parsePositiveInt } from '../args.js'

const argv = (...args: string[]) => ['node', 'expense-report', ...args]

describe('parsePositiveInt', () => {
  it('accepts whole numbers from 1', () => {
    expect(parsePositiveInt('1')).toBe(1)
    expect(parsePositiveInt('25')).toBe(25)
  })

  it.each(['0', '-3', '2.5', 'ten', ''])('rejects %j', (value) => {
    expect(() => parsePositiveInt(value)).toThrow(InvalidArgumentError)
  })
})

describe('parseIsoDate', () => {
  it('returns valid dates unchanged', () => {
    expect(parseIsoDate('2022-02-28')).toBe('2022-02-28')
    expect(parseIsoDate('2024-02-29')).toBe('2024-02-29')
  })

  it.each(['2022-02-30', '2022-13-01', '01/02/2022', '2022-1-5'])('rejects %j', (value) => {
    expect(() => parseIsoDate(value)).toThrow('Expected a date in YYYY-MM-DD format.')
  })
})

describe('parseArgs', () => {
  beforeEach(() => {
    vi.spyOn(process.stdout, 'write').mockImplementation(() => true)
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true)
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('opens the browser when no command is given', () => {
    expect(parseArgs(argv())).toEqual({ command: 'tui', forceSetup: false, config: undefined })
  })

  it('passes --setup and --config to the browser', () => {
    expect(parseArgs(argv('--setup', '--config', '/tmp/test.json'))).toEqual({
      command: 'tui',
      forceSetup: true,
      config: '/tmp/test.json',
    })
  })

  it('parses report options with JSON output by default', () => {
    expect(parseArgs(argv('report', '-i', 'exports', '-t', 'Household', '--currency', '$'))).toEqual({
      command: 'report',
      options: {
        format: 'json',
        quiet: false,
        input: 'exports',
        title: 'Household',
        currency: '$',
      },
    })
  })

  it('reads --config given after the subcommand', () => {
    const action = parseArgs(argv('report', '--config', '/tmp/test.json'))

    expect(action).toMatchObject({ command: 'report', options: { config: '/tmp/test.json' } })
  })

  it('parses summary options with text output by default', () => {
    expect(parseArgs(argv('summary', '--averages', '-l', '3', '-q'))).toEqual({
      command: 'summary',
      options: { format: 'text', quiet: true, averages: true, limit: 3 },
    })
  })

  it('fills in the example range for generate', () => {
    expect(parseArgs(argv('generate', '-o', 'example.csv'))).toEqual({
      command: 'generate',
      options: {
        format: 'json',
        quiet: false,
        from: '2018-01-01',
        to: '2022-12-31',
        output: 'example.csv',
      },
    })
  })

  it('parses init', () => {
    expect(parseArgs(argv('init', '-f', 'json'))).toEqual({
      command: 'init',
      options: { format: 'json', quiet: false },
    })
  })

  it('returns null after printing help or version', () => {
    expect(parseArgs(argv('--help'))).toBeNull()
    expect(parseArgs(argv('summary', '--help'))).toBeNull()
    expect(parseArgs(argv('--version'))).toBeNull()
  })

  it('throws on an invalid option value', () => {
    expect(() => parseArgs(argv('summary', '--limit', '0'))).toThrow(CommanderError)
    expect(() => parseArgs(argv('report', '-f', 'xml'))).toThrow(CommanderError)
    expect(() => parseArgs(argv('generate', '--from', '2022-02-30'))).toThrow(CommanderError)
  })
})

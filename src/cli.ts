#!/usr/bin/env node
import { UsageError, describeError } from './errors'
import type { iScanOptions } from './interfaces'
import { report } from './reporter'
import { DeprecationScanner } from './scanner'
import { DEFAULT_MAX_DEPTH } from './tree'

type ParsedArgs = iScanOptions | { help: true }

const HELP = `legacy-config-scan

Identifies and flags deprecated features in configuration files.

Usage:
  legacy-config-scan --config-file <path> [--config-type yaml|json]
                     --deprecated-features-file <path> [options]

Options:
  --config-file <path>               configuration file to scan
  --config-type <yaml|json>          format of the configuration file (default: from extension)
  --deprecated-features-file <path>  JSON object mapping feature names to deprecation details
  --json                             print findings as a JSON array
  --max-depth <n>                    maximum nesting depth of the configuration (default ${DEFAULT_MAX_DEPTH})
  --no-color                         disable ANSI colours (also NO_COLOR)
  -h, --help                         show this help

Exit codes:
  0  no deprecated features found
  1  an input file is missing or could not be loaded
  2  deprecated features were found
`

export const parseArgs = (
  argv: ReadonlyArray<string>,
  env: NodeJS.ProcessEnv = process.env,
  isTTY: boolean = Boolean(process.stdout.isTTY)
): ParsedArgs => {
  const args = [...argv]

  let configFile: string | undefined
  let configType: string | undefined
  let deprecatedFeaturesFile: string | undefined
  let json = false
  let color = isTTY && !env.NO_COLOR
  let maxDepth = DEFAULT_MAX_DEPTH

  // value given as --flag=value, if any
  let inline: string | undefined

  const takeValue = (flag: string): string => {
    const value = inline ?? args.shift()

    if (value === undefined || (inline === undefined && value.startsWith('--'))) {
      throw new UsageError(`${flag} requires a value`)
    }

    return value
  }

  const noValue = (flag: string) => {
    if (inline !== undefined) {
      throw new UsageError(`${flag} does not take a value`)
    }
  }

  while (args.length) {
    const raw = args.shift()

    if (raw === undefined) {
      break
    }

    const eq = raw.startsWith('--') ? raw.indexOf('=') : -1
    const arg = eq > 0 ? raw.slice(0, eq) : raw

    inline = eq > 0 ? raw.slice(eq + 1) : undefined

    switch (arg) {
      case '-h':
      case '--help':
        noValue(arg)
        return { help: true }
      case '--config-file':
        configFile = takeValue(arg)
        break
      case '--config-type':
        configType = takeValue(arg)
        break
      case '--deprecated-features-file':
        deprecatedFeaturesFile = takeValue(arg)
        break
      case '--json':
        noValue(arg)
        json = true
        break
      case '--no-color':
        noValue(arg)
        color = false
        break
      case '--max-depth': {
        const value = takeValue(arg)
        const parsed = Number.parseInt(value, 10)

        if (!/^\d+$/.test(value) || parsed < 1) {
          throw new UsageError(`--max-depth must be a positive integer: ${value}`)
        }

        maxDepth = parsed
        break
      }
      default:
        throw new UsageError(`Unknown argument: ${arg}`)
    }
  }

  if (!configFile) {
    throw new UsageError('--config-file is required')
  }

  if (!deprecatedFeaturesFile) {
    throw new UsageError('--deprecated-features-file is required')
  }

  return { configFile, configType, deprecatedFeaturesFile, json, color, maxDepth }
}

/**
 * Runs one scan and returns the process exit code.
 */
function main(argv: ReadonlyArray<string> = process.argv.slice(2)): number {
  let options: ParsedArgs

  try {
    options = parseArgs(argv)
  } catch (error) {
    console.error(`❌ ${describeError(error)}\n`)
    console.error(HELP)
    return 1
  }

  if ('help' in options) {
    console.log(HELP)
    return 0
  }

  try {
    if (!options.json) {
      console.log('🔍 Starting deprecation scan...')
    }

    const scanner = new DeprecationScanner(options)
    const outcome = scanner.scan()

    if (outcome.kind === 'load-failure') {
      console.error(`❌ ${describeError(outcome.error)}`)
      console.error('Failed to load configuration data or deprecated features. Exiting.')
    } else {
      scanner.printFindings()
    }

    return report(outcome).code
  } catch (error) {
    console.error('Scanner error:', error)
    return 1
  }
}

export { main, HELP }

if (require.main === module) {
  process.exit(main())
}

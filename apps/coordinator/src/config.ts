/**
 * Command line options for the generator process.
 */
export interface CoordinatorArgs {
  /** YAML or JSON configuration file. */
  configPath: string
  /** Stop after this many seconds; runs until a signal when absent. */
  durationSeconds?: number
  /** Overrides `shutdown_timeout` from the configuration file. */
  shutdownTimeoutSeconds?: number
  help: boolean
}

export const usage = `Usage: datafaucet [options]

Options:
  --config <file>              Configuration file, YAML or JSON (default: config.yaml)
  --duration <seconds>         Stop after a fixed duration instead of waiting for a signal
  --shutdown-timeout <seconds> Maximum wait for pipelines to stop (default: from config)
  -h, --help                   Show this help message

Environment:
  LOG_LEVEL                    debug | info | warn | error (default: info)
`

const requireValue = (value: string | undefined, flag: string): string => {
  if (!value) {
    throw new Error(`Missing value for ${flag}`)
  }
  return value
}

const parseSecondsArg = (value: string, flag: string): number => {
  const parsed = Number(value)
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`Invalid number of seconds for ${flag}: ${value}`)
  }
  return parsed
}

/**
 * Parses CLI arguments.
 * @param argv CLI arguments (excluding node and script path).
 * @returns Parsed options.
 * @throws When a flag is unknown, missing its value or has an invalid number.
 */
export const parseCoordinatorArgs = (argv: string[]): CoordinatorArgs => {
  const args: CoordinatorArgs = { configPath: 'config.yaml', help: false }

  for (let i = 0; i < argv.length; i += 1) {
    const flag = argv[i]
    const value = argv[i + 1]

    if (flag === '--help' || flag === '-h') {
      args.help = true
    } else if (flag === '--config') {
      args.configPath = requireValue(value, flag)
      i += 1
    } else if (flag === '--duration') {
      args.durationSeconds = parseSecondsArg(requireValue(value, flag), flag)
      i += 1
    } else if (flag === '--shutdown-timeout') {
      args.shutdownTimeoutSeconds = parseSecondsArg(requireValue(value, flag), flag)
      i += 1
    } else {
      throw new Error(`Unknown argument: ${flag}`)
    }
  }

  return args
}

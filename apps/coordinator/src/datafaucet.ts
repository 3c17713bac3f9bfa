/* eslint-disable no-console */
import {
  ConfigError,
  createLogger,
  describeError,
  sleepUnlessAborted,
  systemClock,
} from '@datafaucet/common'
import { loadGeneratorConfig } from '@datafaucet/pipeline-common'
import { createSinkFactory } from '@datafaucet/sinks'
import { parseCoordinatorArgs, usage, type CoordinatorArgs } from './config'
import { startCoordinator } from './coordinator'
import { formatSummary } from './summary'

const waitForStopRequest = (args: CoordinatorArgs, done: Promise<void>): Promise<string> => {
  const cancelDuration = new AbortController()
  const requests: Promise<string>[] = [
    new Promise((resolve) => {
      process.once('SIGINT', () => resolve('SIGINT'))
      process.once('SIGTERM', () => resolve('SIGTERM'))
    }),
    done.then(() => 'all pipelines stopped'),
  ]
  if (args.durationSeconds != null) {
    const durationMs = args.durationSeconds * 1000
    requests.push(
      sleepUnlessAborted(systemClock, durationMs, cancelDuration.signal).then(
        () => `duration of ${args.durationSeconds}s elapsed`
      )
    )
  }
  return Promise.race(requests).finally(() => cancelDuration.abort())
}

const run = async (): Promise<void> => {
  let args: CoordinatorArgs
  try {
    args = parseCoordinatorArgs(process.argv.slice(2))
  } catch (error) {
    console.error(describeError(error))
    console.error(usage)
    process.exit(1)
  }

  if (args.help) {
    console.log(usage)
    return
  }

  const logger = createLogger('datafaucet')

  try {
    const config = await loadGeneratorConfig(args.configPath)
    if (args.shutdownTimeoutSeconds != null) {
      config.shutdownTimeout = args.shutdownTimeoutSeconds
    }

    const handle = await startCoordinator(config, {
      logger,
      sinkFactory: createSinkFactory(logger),
    })

    const reason = await waitForStopRequest(args, handle.done)
    logger.info(`Shutting down: ${reason}`)
    const forceExit = (signal: NodeJS.Signals): void => {
      logger.warn(`Received ${signal} during shutdown; exiting now`)
      process.exit(1)
    }
    process.once('SIGINT', forceExit)
    process.once('SIGTERM', forceExit)
    await handle.stop()

    console.log(formatSummary(handle.status()))
    process.exit(0)
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(error.message)
      process.exit(1)
    }
    logger.error('Generator failed', { error: describeError(error) })
    process.exit(1)
  }
}

void run()

/**
 * Flow Telemetry Monitor CLI
 * Connects to the flow sensor board and shows live readings in the terminal
 */

import chalk from 'chalk'
import { Command, InvalidArgumentError } from 'commander'
import { emitKeypressEvents } from 'readline'

import { type FlowMonitorConfig, loadMonitorSettings } from './services/config-store'
import { FlowMonitorService } from './services/flow-monitor-service'
import { listFlowPorts } from './services/flow-port-discovery'
import { DEFAULT_PORT_TEST_MS } from './services/flow-port-test'
import { DEFAULT_LOG_FILE, setupLogService } from './services/log'
import { formatPortTable, formatPortTestReport, formatStatusLine } from './status-line'

const STATUS_REFRESH_MS = 1000

interface CliOptions {
  baud?: number
  list?: boolean
  /** Seconds to listen; true when given without a value */
  test?: number | true
  staleTimeout?: number
  window?: number
  capacity?: number
  exportOnExit?: string
  logFile: string
}

function parseInteger(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.')
  }
  return parsed
}

const program = new Command()
  .name('flow-monitor')
  .description('Monitor a serial flow sensor in real time')
  .argument('[port]', 'Serial port (defaults to the remembered or auto-detected port)')
  .option('-b, --baud <rate>', 'Baud rate', parseInteger)
  .option('-l, --list', 'List serial ports and exit')
  .option('-t, --test [seconds]', 'Listen on the port, report valid frames against noise and exit', parseInteger)
  .option('-s, --stale-timeout <ms>', 'Silence tolerated before data is stale', parseInteger)
  .option('-w, --window <samples>', 'Moving average window', parseInteger)
  .option('-c, --capacity <points>', 'Number of points kept in memory', parseInteger)
  .option('-e, --export-on-exit <file>', 'Write the series to this CSV file on exit')
  .option('--log-file <file>', 'Log file path', DEFAULT_LOG_FILE)

/**
 * @param port
 * @param options
 */
async function run(port: string | undefined, options: CliOptions): Promise<void> {
  setupLogService({ logFile: options.logFile, consoleLevel: 'warn' })

  if (options.list) {
    process.stdout.write(`${formatPortTable(await listFlowPorts())}\n`)
    return
  }

  const overrides: Partial<FlowMonitorConfig> = {
    baudRate: options.baud,
    staleTimeoutMs: options.staleTimeout,
    smoothingWindow: options.window,
    seriesCapacity: options.capacity,
  }
  const settings = loadMonitorSettings(overrides)
  const monitor = new FlowMonitorService({ settings })

  if (options.test !== undefined) {
    const durationMs = options.test === true ? DEFAULT_PORT_TEST_MS : options.test * 1000
    process.stdout.write(chalk.blue(`Testing ${port ?? 'auto-detected port'} for up to ${durationMs / 1000} s...\n`))
    const tested = await monitor.testPort(port, durationMs)
    if (!tested.success) {
      console.error(chalk.red(`Port test failed: ${tested.error}`))
      process.exitCode = 1
      return
    }
    process.stdout.write(`${formatPortTestReport(tested.data)}\n`)
    if (tested.data.verdict !== 'pass') {
      process.exitCode = 1
    }
    return
  }

  monitor.on('connection-lost', (error) => {
    process.stdout.write('\n')
    console.warn(chalk.red(`Connection lost: ${error.message}. Press 'c' to reconnect.`))
  })

  process.stdout.write(chalk.blue(`Connecting to ${port ?? 'auto-detected port'}...\n`))
  const connected = await monitor.connect(port)
  if (!connected.success) {
    console.error(chalk.red(`Connect failed: ${connected.error}`))
    process.exitCode = 1
    return
  }
  process.stdout.write(
    chalk.green(`Connected to ${connected.data.port} @ ${connected.data.baudRate} baud. `) +
      chalk.gray('Keys: r reset, e export, p pause, c reconnect, q quit\n')
  )

  let shuttingDown = false

  const renderStatus = async (): Promise<void> => {
    const health = await monitor.getHealth()
    if (health.success && !shuttingDown) {
      process.stdout.write(`\r\x1b[2K${formatStatusLine(health.data)}`)
    }
  }

  const printNotice = (text: string): void => {
    process.stdout.write(`\r\x1b[2K${text}\n`)
  }

  const statusTimer = setInterval(() => {
    void renderStatus()
  }, STATUS_REFRESH_MS)

  const shutdown = async (): Promise<void> => {
    if (shuttingDown) return
    shuttingDown = true
    clearInterval(statusTimer)
    process.stdout.write('\n')

    if (options.exportOnExit) {
      const exported = await monitor.exportData(options.exportOnExit)
      if (exported.success) {
        console.warn(chalk.green(`Exported ${exported.data.rows} rows to ${exported.data.path}`))
      } else {
        console.error(chalk.red(`Export failed: ${exported.error}`))
      }
    }

    await monitor.disconnect()
    if (process.stdin.isTTY) {
      process.stdin.setRawMode(false)
    }
    process.stdin.pause()
  }

  const handleKey = async (key: string): Promise<void> => {
    switch (key) {
      case 'r': {
        const result = await monitor.reset()
        if (result.success) printNotice(chalk.cyan(`Session reset (${result.data.sessionId})`))
        break
      }
      case 'e': {
        const result = await monitor.exportData()
        printNotice(
          result.success
            ? chalk.green(`Exported ${result.data.rows} rows to ${result.data.path}`)
            : chalk.red(`Export failed: ${result.error}`)
        )
        break
      }
      case 'p': {
        const health = await monitor.getHealth()
        const paused = health.success && health.data.recordingPaused
        const result = await monitor.setRecordingPaused(!paused)
        if (result.success) printNotice(chalk.cyan(result.data.paused ? 'Recording paused' : 'Recording resumed'))
        break
      }
      case 'c': {
        printNotice(chalk.blue('Reconnecting...'))
        const result = await monitor.reconnect()
        printNotice(result.success ? chalk.green(`Reconnected to ${result.data.port}`) : chalk.red(result.error))
        break
      }
      case 'q':
        await shutdown()
        break
    }
  }

  if (process.stdin.isTTY) {
    emitKeypressEvents(process.stdin)
    process.stdin.setRawMode(true)
    process.stdin.on('keypress', (_text: string | undefined, key: { name?: string; ctrl?: boolean } | undefined) => {
      if (key?.ctrl && key.name === 'c') {
        void shutdown()
        return
      }
      if (key?.name) {
        handleKey(key.name).catch((error: unknown) => {
          printNotice(chalk.red(`Command failed: ${error instanceof Error ? error.message : String(error)}`))
        })
      }
    })
  }

  process.on('SIGINT', () => void shutdown())
  process.on('SIGTERM', () => void shutdown())
}

program.action(async (port: string | undefined, options: CliOptions) => {
  await run(port, options)
})

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red(error instanceof Error ? error.message : String(error)))
  process.exitCode = 1
})

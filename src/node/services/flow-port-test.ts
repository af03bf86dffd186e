// * Port connection test
// * Opens a port through the acquisition loop, listens for a bounded time and reports valid frames
// * against noise. Listening stops early once enough valid frames have arrived or the link is lost.

import type { PortTestReport, SmoothedPoint } from '@/types/flow-monitor'

import type { FlowSerialController } from './flow-serial-controller'
import { DEFAULT_BAUD_RATE } from './link/serial'

export const DEFAULT_PORT_TEST_MS = 10000
export const ENOUGH_VALID_FRAMES = 3

export interface PortTestOptions {
  baudRate?: number
  /** Listening time after the connection is up */
  durationMs?: number
  /** Stop as soon as this many valid frames arrived */
  enoughFrames?: number
}

/**
 * Run a connection test on a disconnected controller. The controller is disconnected again afterwards.
 * @param controller
 * @param port
 * @param options
 */
export async function runPortTest(
  controller: FlowSerialController,
  port: string,
  options: PortTestOptions = {}
): Promise<PortTestReport> {
  const baudRate = options.baudRate ?? DEFAULT_BAUD_RATE
  const durationMs = options.durationMs ?? DEFAULT_PORT_TEST_MS
  const enoughFrames = options.enoughFrames ?? ENOUGH_VALID_FRAMES

  if (!(durationMs > 0)) {
    throw new RangeError(`Test duration must be positive, got ${durationMs}`)
  }

  const samples: SmoothedPoint[] = []
  const outcome: { lostError: Error | null } = { lostError: null }
  let stopListening: (() => void) | null = null

  const onPoint = (point: SmoothedPoint): void => {
    if (samples.length < enoughFrames) {
      samples.push(point)
    }
    if (samples.length >= enoughFrames) {
      stopListening?.()
    }
  }
  const onLost = (error: Error): void => {
    outcome.lostError = error
    stopListening?.()
  }

  controller.on('point', onPoint)
  controller.on('connection-lost', onLost)
  console.log(`[FlowPortTest] Testing ${port} @ ${baudRate} baud for up to ${durationMs} ms`)

  try {
    try {
      await controller.connect(port, baudRate)
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      console.warn(`[FlowPortTest] ${port} failed: ${message}`)
      return { port, baudRate, verdict: 'fail', acceptedSamples: 0, rejectedLines: 0, samples: [], error: message }
    }

    // Frames that came in with the first bytes may already be enough
    if (samples.length < enoughFrames && outcome.lostError === null) {
      await new Promise<void>((resolve) => {
        const timer = setTimeout(() => finish(), durationMs)
        const finish = (): void => {
          clearTimeout(timer)
          stopListening = null
          resolve()
        }
        stopListening = finish
      })
    }

    const health = controller.getHealth()
    const verdict = health.acceptedSamples > 0 ? 'pass' : 'partial'
    console.log(
      `[FlowPortTest] ${port}: ${verdict} (${health.acceptedSamples} valid, ${health.rejectedLines} rejected)`
    )
    return {
      port,
      baudRate,
      verdict,
      acceptedSamples: health.acceptedSamples,
      rejectedLines: health.rejectedLines,
      samples,
      error: outcome.lostError === null ? null : `Connection lost: ${outcome.lostError.message}`,
    }
  } finally {
    controller.off('point', onPoint)
    controller.off('connection-lost', onLost)
    await controller.disconnect()
  }
}

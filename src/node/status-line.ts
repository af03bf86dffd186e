import chalk, { type ChalkInstance } from 'chalk'

import {
  formatReading,
  formatRuntime,
  lastUpdateText,
  type StatusTone,
  summarizeStatus,
} from '@/stores/flow-monitor-common'
import type { FlowMonitorHealth, PortTestReport, RankedSerialPort } from '@/types/flow-monitor'

/**
 * @param tone
 * @param painter
 */
function toneColor(tone: StatusTone, painter: ChalkInstance): ChalkInstance {
  switch (tone) {
    case 'ok':
      return painter.green
    case 'warn':
      return painter.yellow
    case 'error':
      return painter.red
  }
}

/**
 * One-line live status for the terminal.
 * @param health
 * @param painter - Chalk instance (tests pass a colourless one)
 * @param now - Reference for the connection runtime
 */
export function formatStatusLine(
  health: FlowMonitorHealth,
  painter: ChalkInstance = chalk,
  now: number = Date.now()
): string {
  const summary = summarizeStatus(health)
  const color = toneColor(summary.tone, painter)

  const parts = [
    color(summary.connection),
    `Data: ${color(summary.data)}`,
    `Sensor: ${summary.sensor}`,
    `Flow: ${formatReading(health.latestFlowRateLpm, 2)} L/min`,
    `Total: ${formatReading(health.latestVolumeL, 3)} L`,
    `Points: ${health.points}/${health.capacity}`,
    `Last Update: ${lastUpdateText(health)}`,
  ]

  if (health.liveness.connectedAt !== null) {
    parts.push(`Runtime: ${formatRuntime(now - health.liveness.connectedAt)}`)
  }

  if (health.rejectedLines > 0) {
    parts.push(painter.gray(`Rejected: ${health.rejectedLines}`))
  }
  if (health.recordingPaused) {
    parts.push(painter.yellow('PAUSED'))
  }

  return parts.join(' | ')
}

/**
 * Port table for --list.
 * @param ports
 * @param painter
 */
export function formatPortTable(ports: readonly RankedSerialPort[], painter: ChalkInstance = chalk): string {
  if (ports.length === 0) {
    return painter.yellow('No serial ports found')
  }

  return ports
    .map((port, index) => {
      const line = `${index + 1}. ${port.path.padEnd(20)} | ${port.kind.padEnd(10)} | ${port.description}`
      return port.kind === 'arduino' ? painter.green(line) : line
    })
    .join('\n')
}

/**
 * Result of --test: the first valid frames, the counts and a verdict.
 * @param report
 * @param painter
 */
export function formatPortTestReport(report: PortTestReport, painter: ChalkInstance = chalk): string {
  const lines = [`Port test: ${report.port} @ ${report.baudRate} baud`]

  for (const sample of report.samples) {
    lines.push(
      `  ${sample.deviceTimeMs} ms | Flow: ${sample.rawFlowRateLpm.toFixed(3)} L/min | ` +
        `Volume: ${sample.cumulativeVolumeL.toFixed(4)} L | Status: ${sample.statusTag}`
    )
  }

  if (report.verdict !== 'fail') {
    lines.push(`Valid frames: ${report.acceptedSamples} | Noise: ${report.rejectedLines}`)
  }

  switch (report.verdict) {
    case 'pass':
      lines.push(painter.green('PASSED: the sensor is sending valid telemetry'))
      break
    case 'partial':
      lines.push(painter.yellow('PARTIAL: the port sends data but no valid frames; check the firmware and sensor wiring'))
      break
    case 'fail':
      lines.push(painter.red(`FAILED: ${report.error ?? 'no data received'}`))
      break
  }
  if (report.verdict !== 'fail' && report.error) {
    lines.push(painter.yellow(report.error))
  }

  return lines.join('\n')
}

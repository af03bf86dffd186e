/**
 * Display helpers shared by the flow monitor consumers (Pinia store, CLI status line).
 *
 * Status bar texts:
 * - Connection: "Connected (<port>)" / "Connecting..." / "Disconnected"
 * - Data:       "Receiving" / "Stale (x.xs)" / "Waiting..." / "No connection"
 * - Sensor:     the device's own status tag, or "-" before the first sample
 * - Last update: "x.xs ago", or "n/a" before the first sample
 *
 * The tone drives colouring: 'ok' (green), 'warn' (orange), 'error' (red).
 */

import type { FlowLinkStatus, FlowMonitorHealth } from '@/types/flow-monitor'

export type StatusTone = 'ok' | 'warn' | 'error'

export interface StatusSummary {
  connection: string
  data: string
  sensor: string
  tone: StatusTone
}

/**
 * Short label for the combined link status.
 * @param status
 */
export function statusLabel(status: FlowLinkStatus): string {
  switch (status) {
    case 'disconnected':
      return 'Disconnected'
    case 'connecting':
      return 'Connecting...'
    case 'connected-fresh':
      return 'Connected'
    case 'connected-stale':
      return 'Connected (stale)'
  }
}

/**
 * Colour class for a status.
 * @param status
 */
export function statusTone(status: FlowLinkStatus): StatusTone {
  switch (status) {
    case 'connected-fresh':
      return 'ok'
    case 'connecting':
    case 'connected-stale':
      return 'warn'
    case 'disconnected':
      return 'error'
  }
}

/**
 * Data column text.
 * @param health
 */
export function dataStatusText(health: FlowMonitorHealth): string {
  switch (health.status) {
    case 'disconnected':
    case 'connecting':
      return 'No connection'
    case 'connected-stale':
      return health.lastSampleAgeMs === null ? 'Waiting...' : `Stale (${(health.lastSampleAgeMs / 1000).toFixed(1)}s)`
    case 'connected-fresh':
      return health.liveness.awaitingFirstSample ? 'Waiting...' : 'Receiving'
  }
}

/**
 * Build the three status bar texts and the tone.
 * @param health
 */
export function summarizeStatus(health: FlowMonitorHealth): StatusSummary {
  const connection =
    health.status === 'disconnected' || health.status === 'connecting'
      ? statusLabel(health.status)
      : `Connected (${health.port ?? 'unknown'})`

  return {
    connection,
    data: dataStatusText(health),
    sensor: health.latestStatusTag || '-',
    tone: statusTone(health.status),
  }
}

/**
 * @param value
 * @param digits
 */
export function formatReading(value: number | null, digits: number): string {
  return value === null ? '-' : value.toFixed(digits)
}

/**
 * Age of the newest sample.
 * @param health
 */
export function lastUpdateText(health: FlowMonitorHealth): string {
  return health.lastSampleAgeMs === null ? 'n/a' : `${(health.lastSampleAgeMs / 1000).toFixed(1)}s ago`
}

/**
 * Elapsed time as 42s, 3.5m or 1.2h.
 * @param ms
 */
export function formatRuntime(ms: number): string {
  const seconds = ms / 1000
  if (seconds < 60) {
    return `${seconds.toFixed(0)}s`
  }
  if (seconds < 3600) {
    return `${(seconds / 60).toFixed(1)}m`
  }
  return `${(seconds / 3600).toFixed(1)}h`
}

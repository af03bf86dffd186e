/**
 * Shared flow monitor type definitions.
 *
 * These types cross the boundary between the acquisition side (serial controller,
 * monitor service) and its consumers (CLI, Pinia store). Everything handed across
 * is a plain frozen value; nothing here is a live reference into controller state.
 */

/**
 * Transport connectivity of the serial link.
 * - 'disconnected': no device handle
 * - 'connecting': handle being opened / banner being drained
 * - 'connected': handle open and streaming
 */
export type TransportState = 'disconnected' | 'connecting' | 'connected'

/**
 * Freshness of the data stream while the transport is connected.
 */
export type FreshnessState = 'fresh' | 'stale'

/**
 * Combined status shown to users.
 */
export type FlowLinkStatus = 'disconnected' | 'connecting' | 'connected-fresh' | 'connected-stale'

/**
 * Classification of the device-reported status tag.
 */
export type SensorStatus = 'awaiting-flow' | 'active' | 'disconnected' | 'unknown'

/**
 * Why the transport last went down.
 * - 'user': explicit disconnect()
 * - 'io-error': link failed or closed underneath us
 * - 'open-failed': connect() did not complete
 */
export interface DisconnectReason {
  /** Origin of the transition */
  kind: 'user' | 'io-error' | 'open-failed'
  /** Human-readable detail */
  message: string
}

/**
 * Point appended to the series store for every accepted sample.
 */
export interface SmoothedPoint {
  /** Host wall clock at ingestion (ms since epoch) */
  hostTimestampMs: number
  /** Device clock as reported in the frame */
  deviceTimeMs: number
  /** Flow rate as reported by the device (L/min) */
  rawFlowRateLpm: number
  /** Host-side moving average of the reported rate (L/min) */
  smoothedFlowRateLpm: number
  /** Session-relative cumulative volume (L) */
  cumulativeVolumeL: number
  /** Status tag exactly as sent by the device */
  statusTag: string
}

/**
 * Read-only view of the liveness tracker.
 */
export interface LivenessSnapshot {
  transport: TransportState
  freshness: FreshnessState
  status: FlowLinkStatus
  /** When the transport last reached 'connected' */
  connectedAt: number | null
  /** When the last sample was accepted in the current connection */
  lastSampleAt: number | null
  /** Connected, but no sample accepted yet */
  awaitingFirstSample: boolean
  /** Set after any transition to 'disconnected' */
  disconnectReason: DisconnectReason | null
}

/**
 * Health/diagnostics for the current session.
 */
export interface FlowMonitorHealth {
  port: string | null
  sessionId: string
  status: FlowLinkStatus
  liveness: LivenessSnapshot
  recordingPaused: boolean
  points: number
  capacity: number
  acceptedSamples: number
  rejectedLines: number
  rejectionsByReason: Readonly<Record<string, number>>
  discontinuities: number
  maxFlowRateLpm: number
  latestFlowRateLpm: number | null
  latestVolumeL: number | null
  latestStatusTag: string | null
  lastSampleAgeMs: number | null
}

/**
 * Serial port candidate as presented to the user.
 */
export interface RankedSerialPort {
  path: string
  description: string
  manufacturer: string | null
  serialNumber: string | null
  vendorId: string | null
  productId: string | null
  kind: 'arduino' | 'usb-serial' | 'usb' | 'bluetooth' | 'other'
  /** Lower is better */
  priority: number
}

/**
 * Summary of a completed export.
 */
export interface ExportSummary {
  path: string
  rows: number
  bytes: number
}

/**
 * pass: valid frames arrived. partial: the port talks but sent no valid frame. fail: no data or no port.
 */
export type PortTestVerdict = 'pass' | 'partial' | 'fail'

/**
 * Outcome of listening on a port for a bounded time.
 */
export interface PortTestReport {
  port: string
  baudRate: number
  verdict: PortTestVerdict
  acceptedSamples: number
  rejectedLines: number
  /** First accepted points, for display */
  samples: SmoothedPoint[]
  error: string | null
}

/**
 * Result envelope used at the service boundary.
 */
export type ServiceResult<T> =
  | {
      success: true
      data: T
    }
  | {
      success: false
      error: string
    }

// * Flow Sensor Serial Controller (acquisition loop)
// * Owns the serial link to the flow sensor board and is the only writer of session state.
// * ARCHITECTURE:
// * - connect(): open link → settle (board resets on open) → drain banner → first bytes → connected
// *   Lines that arrive after the drain are held until the session starts, then processed like any other line
// * - Every complete line goes Frame Parser → Volume Tracker → Smoothing Filter → Series Store → Liveness Tracker
// * - A fixed tick polls the liveness tracker so silence turns into 'connected-stale' without new data
// * - Link failures tear the session down and surface 'connection-lost'; nothing reconnects on its own
// * EVENT EMISSION: 'status-change', 'point', 'rejected', 'connection-lost', 'session-reset'.
// ! Consumers get frozen points and snapshots only. Control goes through the public methods.

import EventEmitter from 'events'
import { v4 as uuidv4 } from 'uuid'

import type {
  DisconnectReason,
  ExportSummary,
  FlowLinkStatus,
  FlowMonitorHealth,
  LivenessSnapshot,
  SmoothedPoint,
} from '@/types/flow-monitor'

import { exportSeriesCsv } from './flow-exporter'
import { DEFAULT_STALE_TIMEOUT_MS, LivenessTracker } from './flow-liveness'
import { DEFAULT_MIN_FIELD_COUNT, FlowLineTokenizer, parseFlowFrame, type RejectReason } from './flow-protocol'
import { DEFAULT_SERIES_CAPACITY, FlowSeriesStore } from './flow-series-store'
import { DEFAULT_SMOOTHING_WINDOW, MovingAverageFilter } from './flow-smoothing'
import { CumulativeVolumeTracker } from './flow-volume'
import { buildSerialUri, DEFAULT_BAUD_RATE, type FlowLink, SerialLink } from './link/serial'

// ============================================================================
// Type Definitions
// ============================================================================

/**
 *
 */
export interface FlowControllerOptions {
  /** Silence tolerated before data is stale */
  staleTimeoutMs: number
  /** Liveness poll period; bounds how late a stale transition is noticed */
  readTimeoutMs: number
  smoothingWindow: number
  seriesCapacity: number
  /** Firmware contract: fields required per frame */
  minFieldCount: number
  /** Wait after opening the port; Arduino-class boards reset when DTR toggles */
  settleDelayMs: number
  /** Maximum wait for the first bytes after the banner drain */
  connectTimeoutMs: number
  /** Accepted, but logged as suspicious */
  highFlowWarningLpm: number
}

export const DEFAULT_CONTROLLER_OPTIONS: Readonly<FlowControllerOptions> = Object.freeze({
  staleTimeoutMs: DEFAULT_STALE_TIMEOUT_MS,
  readTimeoutMs: 1000,
  smoothingWindow: DEFAULT_SMOOTHING_WINDOW,
  seriesCapacity: DEFAULT_SERIES_CAPACITY,
  minFieldCount: DEFAULT_MIN_FIELD_COUNT,
  settleDelayMs: 2000,
  connectTimeoutMs: 10000,
  highFlowWarningLpm: 20,
})

export type ConnectionErrorCode =
  | 'port-not-found'
  | 'permission-denied'
  | 'port-busy'
  | 'no-data'
  | 'already-connected'
  | 'cancelled'
  | 'unknown'

/**
 * Line dropped by the parser or by session validation.
 */
export interface RejectedLine {
  reason: RejectReason
  detail: string
  line: string
}

interface SessionStats {
  acceptedSamples: number
  rejectedLines: number
  rejectionsByReason: Record<string, number>
  discontinuities: number
  maxFlowRateLpm: number
  latestFlowRateLpm: number | null
  latestVolumeL: number | null
  latestStatusTag: string | null
}

function createSessionStats(): SessionStats {
  return {
    acceptedSamples: 0,
    rejectedLines: 0,
    rejectionsByReason: {},
    discontinuities: 0,
    maxFlowRateLpm: 0,
    latestFlowRateLpm: null,
    latestVolumeL: null,
    latestStatusTag: null,
  }
}

interface PendingWait {
  stage: 'settle' | 'first-bytes'
  resolve: () => void
  reject: (error: ConnectionError) => void
}

// ============================================================================
// Custom Errors
// ============================================================================

/**
 *
 */
export class ConnectionError extends Error {
  /**
   * @param message
   * @param code
   * @param cause
   */
  constructor(
    message: string,
    readonly code: ConnectionErrorCode,
    cause?: unknown
  ) {
    super(message, { cause })
    this.name = 'ConnectionError'
  }
}

/**
 * Map an OS/serialport failure to a connection error code.
 * @param error
 */
export function classifyConnectionFailure(error: unknown): ConnectionErrorCode {
  if (error instanceof ConnectionError) {
    return error.code
  }

  const errno = error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : ''
  const text = `${errno} ${error instanceof Error ? error.message : String(error)}`

  if (/ENOENT|No such file|File not found|cannot find/i.test(text)) {
    return 'port-not-found'
  }
  if (/EACCES|EPERM|Permission denied|Access denied/i.test(text)) {
    return 'permission-denied'
  }
  if (/EBUSY|Resource busy|Cannot lock port|in use/i.test(text)) {
    return 'port-busy'
  }
  return 'unknown'
}

function toConnectionError(error: unknown, port: string): ConnectionError {
  if (error instanceof ConnectionError) {
    return error
  }
  const reason = error instanceof Error ? error.message : String(error)
  return new ConnectionError(`Failed to open port ${port}: ${reason}`, classifyConnectionFailure(error), error)
}

// ============================================================================
// FlowSerialController Class
// ============================================================================

/**
 *
 */
export class FlowSerialController extends EventEmitter {
  readonly options: Readonly<FlowControllerOptions>

  private link: FlowLink | null = null
  private readonly tokenizer = new FlowLineTokenizer()
  private readonly filter: MovingAverageFilter
  private readonly volume = new CumulativeVolumeTracker()
  private readonly series: FlowSeriesStore
  private readonly liveness: LivenessTracker

  // Connection parameters for reconnection
  private port: string | null = null
  private lastPort: string | null = null
  private lastBaud = DEFAULT_BAUD_RATE

  // Connect attempt bookkeeping; bumped by disconnect() to cancel an attempt in flight
  private connectAttempt = 0
  private bytesSinceDrain = false
  private linesSinceDrain: string[] = []
  private pendingWait: PendingWait | null = null
  // Link failure seen while connecting with no wait pending; fails the attempt at its next step
  private connectFailure: ConnectionError | null = null

  private livenessInterval: NodeJS.Timeout | null = null
  private sessionId: string = uuidv4()
  private stats: SessionStats = createSessionStats()
  private recordingPaused = false

  /**
   * @param options - Overrides for DEFAULT_CONTROLLER_OPTIONS
   */
  constructor(options: Partial<FlowControllerOptions> = {}) {
    super()
    this.options = Object.freeze({ ...DEFAULT_CONTROLLER_OPTIONS, ...options })

    for (const key of ['staleTimeoutMs', 'readTimeoutMs'] as const) {
      if (!(this.options[key] > 0)) {
        throw new RangeError(`${key} must be positive, got ${this.options[key]}`)
      }
    }

    this.filter = new MovingAverageFilter(this.options.smoothingWindow)
    this.series = new FlowSeriesStore(this.options.seriesCapacity)
    this.liveness = new LivenessTracker(this.options.staleTimeoutMs)
  }

  // Allow tests to override scheduling behavior
  /**
   *
   * @param callback
   * @param periodMs
   */
  protected scheduleInterval(callback: () => void, periodMs: number): NodeJS.Timeout {
    return setInterval(callback, periodMs)
  }

  /**
   *
   * @param handle
   */
  protected clearScheduledInterval(handle: NodeJS.Timeout): void {
    clearInterval(handle)
  }

  // ========================================================================
  // Factory Methods (for test injection)
  // ========================================================================

  // * Create the link for a port (protected so tests can substitute an in-process double).
  /**
   *
   * @param port
   * @param baudRate
   */
  protected createSerialLink(port: string, baudRate: number): FlowLink {
    return new SerialLink(buildSerialUri(port, baudRate))
  }

  // ========================================================================
  // Connection Management
  // ========================================================================

  // * Open the port, drain the startup banner and wait for the device to stream.
  /**
   *
   * @param port
   * @param baudRate
   */
  async connect(port: string, baudRate = DEFAULT_BAUD_RATE): Promise<void> {
    console.log(`[FlowSerial] connect() called - port: ${port}, baudRate: ${baudRate}, status: ${this.status()}`)

    if (this.liveness.snapshot().transport !== 'disconnected') {
      const errorMsg = `Already connected (status: ${this.status()})`
      console.error(`[FlowSerial] connect() rejected: ${errorMsg}`)
      throw new ConnectionError(errorMsg, 'already-connected')
    }

    const attempt = ++this.connectAttempt
    this.connectFailure = null
    this.lastPort = port
    this.lastBaud = baudRate

    this.liveness.markConnecting()
    this.emitStatusChange()

    let link: FlowLink
    try {
      link = this.createSerialLink(port, baudRate)
    } catch (error) {
      const connectionError = toConnectionError(error, port)
      this.failConnect(connectionError)
      throw connectionError
    }

    this.link = link
    link.on('data', (data: Buffer) => this.handleSerialData(link, data))
    link.on('error', (error: Error) => this.handleSerialError(link, error))
    link.on('close', () => this.handleSerialClose(link))

    try {
      await link.open()
      this.ensureCurrentAttempt(attempt)
      console.log(`[FlowSerial] Port ${port} opened, waiting ${this.options.settleDelayMs} ms for the board to settle`)

      await this.waitForSettle(this.options.settleDelayMs)
      this.ensureCurrentAttempt(attempt)

      // Drain the startup banner
      this.tokenizer.clear()
      this.bytesSinceDrain = false
      this.linesSinceDrain = []
      await link.flush()
      this.ensureCurrentAttempt(attempt)

      await this.waitForFirstBytes(port)
      this.ensureCurrentAttempt(attempt)
    } catch (error) {
      const connectionError = toConnectionError(error, port)
      this.linesSinceDrain = []
      this.connectFailure = null
      if (attempt === this.connectAttempt) {
        console.error(`[FlowSerial] Connect failed (${connectionError.code}): ${connectionError.message}`)
        this.link = null
        await this.releaseLink(link)
        this.failConnect(connectionError)
      } else {
        // disconnect() already moved the state machine; only make sure the handle is gone
        await this.releaseLink(link)
      }
      throw connectionError
    }

    this.port = port
    this.startSession()
    this.liveness.markConnected(Date.now())
    this.startLivenessTicker()
    this.emitStatusChange()
    console.log(`[FlowSerial] Connected to ${port} (session ${this.sessionId})`)

    const earlyLines = this.linesSinceDrain
    this.linesSinceDrain = []
    for (const line of earlyLines) {
      this.processLine(line)
    }
  }

  // * Release the port. Safe to call in any state; cancels a connect() in flight.
  /**
   *
   */
  async disconnect(): Promise<void> {
    if (this.liveness.snapshot().transport === 'disconnected') {
      return
    }

    console.log('[FlowSerial] Disconnecting...')

    this.connectAttempt++
    this.pendingWait?.reject(new ConnectionError('Connection attempt cancelled', 'cancelled'))
    this.stopLivenessTicker()

    const link = this.link
    this.link = null
    if (link) {
      await this.releaseLink(link)
    }

    this.port = null
    this.liveness.markDisconnected({ kind: 'user', message: 'Disconnected by user' })
    this.emitStatusChange()
    console.log('[FlowSerial] Disconnected')
  }

  // * Reconnect using last known port/baud.
  /**
   *
   */
  async reconnect(): Promise<void> {
    if (!this.lastPort) {
      throw new ConnectionError('Cannot reconnect: no previous connection', 'unknown')
    }

    console.log(`[FlowSerial] Reconnecting to ${this.lastPort}...`)

    if (this.liveness.snapshot().transport !== 'disconnected') {
      await this.disconnect()
    }

    await this.connect(this.lastPort, this.lastBaud)
  }

  // ========================================================================
  // Session Control
  // ========================================================================

  // * Start a new session on the same connection: clear the series and restart volume from zero.
  /**
   *
   */
  reset(): void {
    this.series.reset()
    this.filter.reset()
    this.volume.rebase()
    this.stats = createSessionStats()
    this.sessionId = uuidv4()
    console.log(`[FlowSerial] Session reset (session ${this.sessionId})`)
    this.emit('session-reset', this.sessionId)
  }

  /**
   * Stop appending to the series; liveness and latest values keep updating.
   */
  pauseRecording(): void {
    if (!this.recordingPaused) {
      this.recordingPaused = true
      console.log('[FlowSerial] Recording paused')
    }
  }

  resumeRecording(): void {
    if (this.recordingPaused) {
      this.recordingPaused = false
      console.log('[FlowSerial] Recording resumed')
    }
  }

  /**
   * Write the current series to CSV.
   * @param filePath
   */
  async exportData(filePath: string): Promise<ExportSummary> {
    return exportSeriesCsv(this.series.snapshot(), filePath)
  }

  // ========================================================================
  // Read-only Views
  // ========================================================================

  snapshot(): readonly SmoothedPoint[] {
    return this.series.snapshot()
  }

  status(): FlowLinkStatus {
    return this.liveness.status
  }

  getLiveness(): LivenessSnapshot {
    return this.liveness.snapshot()
  }

  isConnected(): boolean {
    return this.liveness.snapshot().transport === 'connected'
  }

  isRecordingPaused(): boolean {
    return this.recordingPaused
  }

  getSessionId(): string {
    return this.sessionId
  }

  getPort(): string | null {
    return this.port
  }

  getLastPort(): string | null {
    return this.lastPort
  }

  getLastBaudRate(): number {
    return this.lastBaud
  }

  getHealth(): FlowMonitorHealth {
    const liveness = this.liveness.snapshot()
    return {
      port: this.port,
      sessionId: this.sessionId,
      status: liveness.status,
      liveness,
      recordingPaused: this.recordingPaused,
      points: this.series.size,
      capacity: this.series.capacity,
      acceptedSamples: this.stats.acceptedSamples,
      rejectedLines: this.stats.rejectedLines,
      rejectionsByReason: { ...this.stats.rejectionsByReason },
      discontinuities: this.stats.discontinuities,
      maxFlowRateLpm: this.stats.maxFlowRateLpm,
      latestFlowRateLpm: this.stats.latestFlowRateLpm,
      latestVolumeL: this.stats.latestVolumeL,
      latestStatusTag: this.stats.latestStatusTag,
      lastSampleAgeMs: liveness.lastSampleAt === null ? null : Date.now() - liveness.lastSampleAt,
    }
  }

  // ========================================================================
  // Internal Helpers: Connection
  // ========================================================================

  /**
   *
   * @param attempt
   */
  private ensureCurrentAttempt(attempt: number): void {
    if (attempt !== this.connectAttempt) {
      throw new ConnectionError('Connection attempt cancelled', 'cancelled')
    }
    if (this.connectFailure) {
      throw this.connectFailure
    }
  }

  // * Wait that disconnect() or a link failure can cut short. The timer either resolves or rejects the wait.
  /**
   *
   * @param stage
   * @param ms
   * @param onTimeout - Error to reject with when the timer fires; resolve when omitted
   */
  private startWait(stage: PendingWait['stage'], ms: number, onTimeout?: () => ConnectionError): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pendingWait = null
        if (onTimeout) {
          reject(onTimeout())
        } else {
          resolve()
        }
      }, ms)

      this.pendingWait = {
        stage,
        resolve: () => {
          clearTimeout(timer)
          this.pendingWait = null
          resolve()
        },
        reject: (error) => {
          clearTimeout(timer)
          this.pendingWait = null
          reject(error)
        },
      }
    })
  }

  /**
   *
   * @param ms
   */
  private waitForSettle(ms: number): Promise<void> {
    if (ms <= 0) {
      return Promise.resolve()
    }
    return this.startWait('settle', ms)
  }

  /**
   *
   * @param port
   */
  private waitForFirstBytes(port: string): Promise<void> {
    if (this.bytesSinceDrain) {
      return Promise.resolve()
    }

    const timeoutMs = this.options.connectTimeoutMs
    return this.startWait(
      'first-bytes',
      timeoutMs,
      () => new ConnectionError(`No data received from ${port} within ${timeoutMs} ms`, 'no-data')
    )
  }

  /**
   * Fail the connect attempt in flight because the link reported a problem.
   * @param error
   */
  private abortConnect(error: ConnectionError): void {
    if (this.pendingWait) {
      this.pendingWait.reject(error)
    } else {
      this.connectFailure = error
    }
  }

  /**
   *
   * @param error
   */
  private failConnect(error: ConnectionError): void {
    this.port = null
    this.liveness.markDisconnected({ kind: 'open-failed', message: error.message })
    this.emitStatusChange()
  }

  /**
   *
   * @param link
   */
  private async releaseLink(link: FlowLink): Promise<void> {
    link.removeAllListeners()
    try {
      await link.close()
    } catch (error) {
      console.error('[FlowSerial] Error closing port:', error)
    }
  }

  /**
   *
   */
  private startSession(): void {
    this.series.reset()
    this.filter.reset()
    this.volume.clear()
    this.stats = createSessionStats()
    this.sessionId = uuidv4()
  }

  // ========================================================================
  // Internal Helpers: Acquisition
  // ========================================================================

  /**
   *
   */
  private startLivenessTicker(): void {
    this.stopLivenessTicker()
    this.livenessInterval = this.scheduleInterval(() => this.pollLiveness(), this.options.readTimeoutMs)
  }

  /**
   *
   */
  private stopLivenessTicker(): void {
    if (this.livenessInterval) {
      this.clearScheduledInterval(this.livenessInterval)
      this.livenessInterval = null
    }
  }

  /**
   *
   */
  private pollLiveness(): void {
    if (this.liveness.poll(Date.now())) {
      console.warn(`[FlowSerial] No valid data for more than ${this.options.staleTimeoutMs} ms, marking stale`)
      this.emitStatusChange()
    }
  }

  /**
   *
   * @param link
   * @param data
   */
  private handleSerialData(link: FlowLink, data: Buffer): void {
    if (link !== this.link) {
      return
    }

    const lines = this.tokenizer.feed(data)
    const transport = this.liveness.snapshot().transport

    if (transport === 'connecting') {
      // Held until connect() starts the session; the drain throws away whatever came before it
      this.linesSinceDrain.push(...lines)
      this.bytesSinceDrain = true
      if (this.pendingWait?.stage === 'first-bytes') {
        this.pendingWait.resolve()
      }
      return
    }

    if (transport !== 'connected') {
      return
    }

    for (const line of lines) {
      this.processLine(line)
    }
  }

  /**
   *
   * @param line
   */
  private processLine(line: string): void {
    const parsed = parseFlowFrame(line, { minFieldCount: this.options.minFieldCount })
    if (!parsed.ok) {
      this.recordRejection({ reason: parsed.reason, detail: parsed.detail, line })
      return
    }

    const { sample } = parsed
    const checked = this.volume.accept(sample)
    if (!checked.ok) {
      this.recordRejection({ reason: checked.reason, detail: checked.detail, line })
      return
    }

    if (checked.discontinuity) {
      this.stats.discontinuities++
      console.warn(`[FlowSerial] Device clock went backwards (${sample.deviceTimeMs} ms): board restarted, volume re-based`)
    }

    if (sample.flowRateLpm > this.options.highFlowWarningLpm) {
      console.warn(
        `[FlowSerial] Very high flow rate: ${sample.flowRateLpm} L/min (${sample.pulseCount ?? 'n/a'} pulses)`
      )
    }

    const now = Date.now()
    const point: SmoothedPoint = Object.freeze({
      hostTimestampMs: now,
      deviceTimeMs: sample.deviceTimeMs,
      rawFlowRateLpm: sample.flowRateLpm,
      smoothedFlowRateLpm: this.filter.push(sample.flowRateLpm),
      cumulativeVolumeL: checked.sessionVolumeL,
      statusTag: sample.statusTag,
    })

    this.stats.acceptedSamples++
    this.stats.maxFlowRateLpm = Math.max(this.stats.maxFlowRateLpm, sample.flowRateLpm)
    this.stats.latestFlowRateLpm = sample.flowRateLpm
    this.stats.latestVolumeL = checked.sessionVolumeL
    this.stats.latestStatusTag = sample.statusTag

    if (!this.recordingPaused) {
      this.series.append(point)
    }

    const statusChanged = this.liveness.recordSample(now)

    if (!this.recordingPaused) {
      this.emit('point', point)
    }
    if (statusChanged) {
      console.log('[FlowSerial] Data flow resumed')
      this.emitStatusChange()
    }
  }

  /**
   *
   * @param rejected
   */
  private recordRejection(rejected: RejectedLine): void {
    this.stats.rejectedLines++
    this.stats.rejectionsByReason[rejected.reason] = (this.stats.rejectionsByReason[rejected.reason] ?? 0) + 1
    console.debug(`[FlowSerial] Rejected line (${rejected.reason}): ${rejected.line.slice(0, 80)}`)
    this.emit('rejected', rejected)
  }

  /**
   *
   * @param link
   * @param error
   */
  private handleSerialError(link: FlowLink, error: Error): void {
    if (link !== this.link) {
      return
    }

    console.error('[FlowSerial] Serial error:', error)

    const transport = this.liveness.snapshot().transport
    if (transport === 'connecting') {
      this.abortConnect(toConnectionError(error, this.lastPort ?? 'unknown'))
      return
    }

    if (transport === 'connected') {
      this.handleUnexpectedDisconnect(link, { kind: 'io-error', message: error.message }, error)
    }
  }

  /**
   *
   * @param link
   */
  private handleSerialClose(link: FlowLink): void {
    if (link !== this.link) {
      return
    }

    console.warn('[FlowSerial] Serial port closed unexpectedly')
    const error = new ConnectionError('Serial port closed unexpectedly', 'unknown')

    const transport = this.liveness.snapshot().transport
    if (transport === 'connecting') {
      this.abortConnect(error)
      return
    }

    if (transport === 'connected') {
      this.handleUnexpectedDisconnect(link, { kind: 'io-error', message: error.message }, error)
    }
  }

  /**
   *
   * @param link
   * @param reason
   * @param error
   */
  private handleUnexpectedDisconnect(link: FlowLink, reason: DisconnectReason, error: Error): void {
    this.connectAttempt++
    this.stopLivenessTicker()
    this.link = null
    this.port = null
    this.liveness.markDisconnected(reason)
    this.emitStatusChange()
    this.emit('connection-lost', error)
    void this.releaseLink(link)
  }

  /**
   *
   */
  private emitStatusChange(): void {
    this.emit('status-change', this.liveness.status, this.liveness.snapshot())
  }
}

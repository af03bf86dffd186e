// * Flow Monitor Service
// * Boundary between the acquisition loop and its consumers (CLI, Pinia store).
// * Every operation returns a ServiceResult; exceptions never cross this boundary.
// * Consumers subscribe to controller events through on(), which hands back an unsubscribe function.

import { join } from 'path'

import type {
  ExportSummary,
  FlowLinkStatus,
  FlowMonitorHealth,
  LivenessSnapshot,
  PortTestReport,
  RankedSerialPort,
  ServiceResult,
  SmoothedPoint,
} from '@/types/flow-monitor'

import { type FlowMonitorSettings, rememberPort } from './config-store'
import { defaultExportFileName } from './flow-exporter'
import { listFlowPorts, normalizePortPath, selectDefaultPort } from './flow-port-discovery'
import { runPortTest } from './flow-port-test'
import { type FlowControllerOptions, FlowSerialController, type RejectedLine } from './flow-serial-controller'

// ============================================================================
// Type Definitions
// ============================================================================

/**
 * Event payloads forwarded from the controller.
 */
export interface FlowMonitorEvents {
  'status-change': [status: FlowLinkStatus, liveness: LivenessSnapshot]
  'point': [point: SmoothedPoint]
  'rejected': [rejected: RejectedLine]
  'connection-lost': [error: Error]
  'session-reset': [sessionId: string]
}

export type FlowMonitorEventName = keyof FlowMonitorEvents

export interface ConnectInfo {
  port: string
  baudRate: number
  sessionId: string
}

/**
 * What a consumer can do with a running monitor.
 */
export interface FlowMonitorApi {
  connect(port?: string, baudRate?: number): Promise<ServiceResult<ConnectInfo>>
  disconnect(): Promise<ServiceResult<void>>
  reconnect(): Promise<ServiceResult<ConnectInfo>>
  reset(): Promise<ServiceResult<{ sessionId: string }>>
  snapshot(): Promise<ServiceResult<readonly SmoothedPoint[]>>
  status(): Promise<ServiceResult<FlowLinkStatus>>
  getHealth(): Promise<ServiceResult<FlowMonitorHealth>>
  exportData(filePath?: string): Promise<ServiceResult<ExportSummary>>
  listPorts(): Promise<ServiceResult<RankedSerialPort[]>>
  testPort(port?: string, durationMs?: number, baudRate?: number): Promise<ServiceResult<PortTestReport>>
  setRecordingPaused(paused: boolean): Promise<ServiceResult<{ paused: boolean }>>
  on<E extends FlowMonitorEventName>(event: E, listener: (...args: FlowMonitorEvents[E]) => void): () => void
}

export interface FlowMonitorServiceOptions {
  settings: FlowMonitorSettings
  /** Pre-built controller (tests inject one wired to an in-process link) */
  controller?: FlowSerialController
  portLister?: () => Promise<RankedSerialPort[]>
  /** Called after a successful connect; defaults to persisting the port in the config store */
  onPortConnected?: (port: string) => void
  now?: () => number
}

/**
 * Controller options derived from the stored/overridden settings.
 * @param settings
 */
export function controllerOptionsFromSettings(settings: FlowMonitorSettings): FlowControllerOptions {
  return {
    staleTimeoutMs: settings.staleTimeoutMs,
    readTimeoutMs: settings.readTimeoutMs,
    smoothingWindow: settings.smoothingWindow,
    seriesCapacity: settings.seriesCapacity,
    minFieldCount: settings.minFieldCount,
    settleDelayMs: settings.settleDelayMs,
    connectTimeoutMs: settings.connectTimeoutMs,
    highFlowWarningLpm: settings.highFlowWarningLpm,
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

// ============================================================================
// FlowMonitorService Class
// ============================================================================

/**
 *
 */
export class FlowMonitorService implements FlowMonitorApi {
  readonly controller: FlowSerialController
  private readonly settings: FlowMonitorSettings
  private readonly portLister: () => Promise<RankedSerialPort[]>
  private readonly onPortConnected: (port: string) => void
  private readonly now: () => number

  /**
   * @param options
   */
  constructor(options: FlowMonitorServiceOptions) {
    this.settings = options.settings
    this.controller = options.controller ?? new FlowSerialController(controllerOptionsFromSettings(options.settings))
    this.portLister = options.portLister ?? listFlowPorts
    this.onPortConnected = options.onPortConnected ?? ((port) => rememberPort(port))
    this.now = options.now ?? Date.now
  }

  /**
   * Connect to a port. Without one, the remembered port is used, then the best discovered candidate.
   * @param port
   * @param baudRate
   */
  async connect(port?: string, baudRate?: number): Promise<ServiceResult<ConnectInfo>> {
    const baud = baudRate ?? this.settings.baudRate
    console.log(`[FlowMonitor] connect() called - port: ${port ?? '(auto)'}, baudRate: ${baud}`)

    try {
      const target = await this.resolvePort(port)
      await this.controller.connect(target, baud)
      this.persistPort(target)

      return {
        success: true,
        data: { port: target, baudRate: baud, sessionId: this.controller.getSessionId() },
      }
    } catch (error) {
      console.error('[FlowMonitor] Connect failed:', errorMessage(error))
      return { success: false, error: errorMessage(error) }
    }
  }

  /**
   *
   */
  async disconnect(): Promise<ServiceResult<void>> {
    try {
      await this.controller.disconnect()
      return { success: true, data: undefined }
    } catch (error) {
      console.error('[FlowMonitor] Disconnect failed:', errorMessage(error))
      return { success: false, error: errorMessage(error) }
    }
  }

  /**
   * Reconnect to the last port with the last baud rate.
   */
  async reconnect(): Promise<ServiceResult<ConnectInfo>> {
    try {
      await this.controller.reconnect()
      const port = this.controller.getPort()
      if (!port) {
        return { success: false, error: 'Reconnect finished without an open port' }
      }
      return {
        success: true,
        data: { port, baudRate: this.controller.getLastBaudRate(), sessionId: this.controller.getSessionId() },
      }
    } catch (error) {
      console.error('[FlowMonitor] Reconnect failed:', errorMessage(error))
      return { success: false, error: errorMessage(error) }
    }
  }

  /**
   *
   */
  async reset(): Promise<ServiceResult<{ sessionId: string }>> {
    this.controller.reset()
    return { success: true, data: { sessionId: this.controller.getSessionId() } }
  }

  async snapshot(): Promise<ServiceResult<readonly SmoothedPoint[]>> {
    return { success: true, data: this.controller.snapshot() }
  }

  async status(): Promise<ServiceResult<FlowLinkStatus>> {
    return { success: true, data: this.controller.status() }
  }

  async getHealth(): Promise<ServiceResult<FlowMonitorHealth>> {
    return { success: true, data: this.controller.getHealth() }
  }

  /**
   * Export the series to CSV. Without a path, a timestamped file is written to the export directory.
   * @param filePath
   */
  async exportData(filePath?: string): Promise<ServiceResult<ExportSummary>> {
    const target = filePath ?? this.defaultExportPath()
    try {
      const summary = await this.controller.exportData(target)
      console.log(`[FlowMonitor] Exported ${summary.rows} rows to ${summary.path}`)
      return { success: true, data: summary }
    } catch (error) {
      return { success: false, error: errorMessage(error) }
    }
  }

  /**
   *
   */
  async listPorts(): Promise<ServiceResult<RankedSerialPort[]>> {
    try {
      return { success: true, data: await this.portLister() }
    } catch (error) {
      console.error('[FlowMonitor] List ports failed:', errorMessage(error))
      return { success: false, error: errorMessage(error) }
    }
  }

  /**
   * Listen on a port for a bounded time and report valid frames against noise.
   * Only runs while the monitor is disconnected; the port is released afterwards.
   * @param port - Defaults like connect()
   * @param durationMs
   * @param baudRate
   */
  async testPort(port?: string, durationMs?: number, baudRate?: number): Promise<ServiceResult<PortTestReport>> {
    if (this.controller.status() !== 'disconnected') {
      return { success: false, error: 'Disconnect before testing a port' }
    }

    try {
      const target = await this.resolvePort(port)
      const report = await runPortTest(this.controller, target, {
        baudRate: baudRate ?? this.settings.baudRate,
        durationMs,
      })
      return { success: true, data: report }
    } catch (error) {
      console.error('[FlowMonitor] Port test failed:', errorMessage(error))
      return { success: false, error: errorMessage(error) }
    }
  }

  /**
   * @param paused
   */
  async setRecordingPaused(paused: boolean): Promise<ServiceResult<{ paused: boolean }>> {
    if (paused) {
      this.controller.pauseRecording()
    } else {
      this.controller.resumeRecording()
    }
    return { success: true, data: { paused: this.controller.isRecordingPaused() } }
  }

  /**
   * Subscribe to a controller event.
   * @param event
   * @param listener
   * @returns Unsubscribe function
   */
  on<E extends FlowMonitorEventName>(event: E, listener: (...args: FlowMonitorEvents[E]) => void): () => void {
    this.controller.on(event, listener)
    return () => {
      this.controller.off(event, listener)
    }
  }

  // ========================================================================
  // Helpers
  // ========================================================================

  private async resolvePort(port?: string): Promise<string> {
    return normalizePortPath(port ?? (await this.resolveDefaultPort()))
  }

  private async resolveDefaultPort(): Promise<string> {
    if (this.settings.serialPort) {
      return this.settings.serialPort
    }

    const candidate = selectDefaultPort(await this.portLister())
    if (!candidate) {
      throw new Error('No serial port given and no Arduino-like port found')
    }
    return candidate.path
  }

  private persistPort(port: string): void {
    try {
      this.onPortConnected(port)
    } catch (error) {
      console.warn('[FlowMonitor] Could not remember port:', errorMessage(error))
    }
  }

  private defaultExportPath(): string {
    return join(this.settings.exportDirectory ?? process.cwd(), defaultExportFileName(this.now()))
  }
}

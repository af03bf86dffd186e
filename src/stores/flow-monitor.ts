/**
 * Pinia store mirroring a running flow monitor.
 *
 * The store only reflects what the monitor reports (events plus polled health) and
 * forwards user requests. It never touches controller state directly.
 */

import { defineStore } from 'pinia'
import { computed, ref, shallowRef } from 'vue'

import type { FlowMonitorApi } from '@/node/services/flow-monitor-service'
import { summarizeStatus } from '@/stores/flow-monitor-common'
import type {
  ExportSummary,
  FlowLinkStatus,
  FlowMonitorHealth,
  RankedSerialPort,
  ServiceResult,
  SmoothedPoint,
} from '@/types/flow-monitor'

export const useFlowMonitorStore = defineStore('flow-monitor', () => {
  const monitor = shallowRef<FlowMonitorApi | null>(null)
  const unsubscribers: Array<() => void> = []

  const status = ref<FlowLinkStatus>('disconnected')
  const points = shallowRef<readonly SmoothedPoint[]>([])
  const health = shallowRef<FlowMonitorHealth | null>(null)
  const availablePorts = ref<RankedSerialPort[]>([])
  const lastError = ref<string | null>(null)
  const lastExport = ref<ExportSummary | null>(null)
  const rejectedLines = ref(0)

  const isConnected = computed(() => status.value === 'connected-fresh' || status.value === 'connected-stale')
  const isStale = computed(() => status.value === 'connected-stale')
  const isRecordingPaused = computed(() => health.value?.recordingPaused ?? false)
  const latestPoint = computed(() => points.value[points.value.length - 1] ?? null)
  const summary = computed(() => (health.value ? summarizeStatus(health.value) : null))

  /**
   * @param result
   */
  function unwrap<T>(result: ServiceResult<T>): T | null {
    if (!result.success) {
      lastError.value = result.error
      return null
    }
    return result.data
  }

  function requireMonitor(): FlowMonitorApi {
    if (!monitor.value) {
      throw new Error('Flow monitor store is not attached')
    }
    return monitor.value
  }

  /**
   * Start mirroring a monitor. Replaces any previous attachment.
   * @param api
   */
  async function attach(api: FlowMonitorApi): Promise<void> {
    detach()
    monitor.value = api

    unsubscribers.push(
      api.on('status-change', (next) => {
        status.value = next
      }),
      api.on('point', () => {
        void refreshFromEvent()
      }),
      api.on('rejected', () => {
        rejectedLines.value++
      }),
      api.on('connection-lost', (error) => {
        lastError.value = `Connection lost: ${error.message}`
      }),
      api.on('session-reset', () => {
        rejectedLines.value = 0
        void refreshFromEvent()
      })
    )

    await refresh()
  }

  function detach(): void {
    while (unsubscribers.length > 0) {
      unsubscribers.pop()?.()
    }
    monitor.value = null
  }

  /**
   * Pull snapshot, status and health from the monitor.
   */
  async function refresh(): Promise<void> {
    const api = requireMonitor()
    const [nextStatus, nextPoints, nextHealth] = await Promise.all([api.status(), api.snapshot(), api.getHealth()])

    const statusValue = unwrap(nextStatus)
    if (statusValue !== null) status.value = statusValue
    const pointsValue = unwrap(nextPoints)
    if (pointsValue !== null) points.value = pointsValue
    const healthValue = unwrap(nextHealth)
    if (healthValue !== null) health.value = healthValue
  }

  // Event-driven refreshes have no caller to report to
  async function refreshFromEvent(): Promise<void> {
    if (!monitor.value) return
    try {
      await refresh()
    } catch (error) {
      lastError.value = error instanceof Error ? error.message : String(error)
    }
  }

  /**
   * @param port - Omit to use the remembered or auto-detected port
   * @param baudRate
   */
  async function connect(port?: string, baudRate?: number): Promise<boolean> {
    lastError.value = null
    const result = unwrap(await requireMonitor().connect(port, baudRate))
    await refresh()
    return result !== null
  }

  async function disconnect(): Promise<void> {
    unwrap(await requireMonitor().disconnect())
    await refresh()
  }

  async function reconnect(): Promise<boolean> {
    lastError.value = null
    const result = unwrap(await requireMonitor().reconnect())
    await refresh()
    return result !== null
  }

  async function reset(): Promise<void> {
    unwrap(await requireMonitor().reset())
    await refresh()
  }

  /**
   * @param filePath
   */
  async function exportData(filePath?: string): Promise<ExportSummary | null> {
    const summary = unwrap(await requireMonitor().exportData(filePath))
    if (summary) {
      lastExport.value = summary
    }
    return summary
  }

  async function togglePause(): Promise<boolean> {
    const result = unwrap(await requireMonitor().setRecordingPaused(!isRecordingPaused.value))
    await refresh()
    return result?.paused ?? isRecordingPaused.value
  }

  async function refreshPorts(): Promise<RankedSerialPort[]> {
    const ports = unwrap(await requireMonitor().listPorts())
    if (ports) {
      availablePorts.value = ports
    }
    return availablePorts.value
  }

  return {
    // State
    status,
    points,
    health,
    availablePorts,
    lastError,
    lastExport,
    rejectedLines,

    // Computed
    isConnected,
    isStale,
    isRecordingPaused,
    latestPoint,
    summary,

    // Actions
    attach,
    detach,
    refresh,
    connect,
    disconnect,
    reconnect,
    reset,
    exportData,
    togglePause,
    refreshPorts,
  }
})

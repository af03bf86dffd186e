// * Flow Series Exporter
// * Serializes a series snapshot to CSV on demand.
// * CSV SCHEMA:
// * Time(s),FlowRate(L/min),TotalVolume(L),Status
// * 0.000,2.500,0.0417,CONNECTED
// * Time is relative to the first exported point so exports from different sessions line up.
// ! The in-memory series is never touched; callers pass a frozen snapshot.

import * as fs from 'fs/promises'

import type { ExportSummary, SmoothedPoint } from '@/types/flow-monitor'

import { UNKNOWN_STATUS_TAG } from './flow-protocol'

export const EXPORT_HEADER = 'Time(s),FlowRate(L/min),TotalVolume(L),Status'

/**
 *
 */
export class ExportError extends Error {
  /**
   * @param message
   * @param code - 'empty-series' when there is nothing to write, 'io-error' for filesystem failures
   * @param cause
   */
  constructor(
    message: string,
    readonly code: 'empty-series' | 'io-error',
    cause?: unknown
  ) {
    super(message, { cause })
    this.name = 'ExportError'
  }
}

/**
 * Escape a status tag for CSV. Tags are plain words in practice, but the device is not trusted.
 * @param value
 */
function csvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`
  }
  return value
}

/**
 * Render points as CSV text (header + one row per point, trailing newline).
 * @param points
 */
export function formatSeriesCsv(points: readonly SmoothedPoint[]): string {
  const lines = [EXPORT_HEADER]
  if (points.length > 0) {
    const originMs = points[0].hostTimestampMs
    for (const point of points) {
      const elapsedS = (point.hostTimestampMs - originMs) / 1000
      const status = point.statusTag || UNKNOWN_STATUS_TAG
      lines.push(
        `${elapsedS.toFixed(3)},${point.rawFlowRateLpm.toFixed(3)},${point.cumulativeVolumeL.toFixed(4)},${csvField(status)}`
      )
    }
  }
  return lines.join('\n') + '\n'
}

/**
 * Write the series to `filePath` atomically (.tmp → rename).
 * @param points - Snapshot to export
 * @param filePath - Destination CSV path
 */
export async function exportSeriesCsv(points: readonly SmoothedPoint[], filePath: string): Promise<ExportSummary> {
  if (points.length === 0) {
    throw new ExportError('No data to export', 'empty-series')
  }

  const content = formatSeriesCsv(points)
  const tmpPath = `${filePath}.tmp`

  try {
    await fs.writeFile(tmpPath, content, 'utf-8')
    await fs.rename(tmpPath, filePath)
  } catch (error) {
    await fs.rm(tmpPath, { force: true }).catch((cleanupError: unknown) => {
      console.warn(`[FlowExport] Could not remove ${tmpPath}:`, cleanupError)
    })
    const reason = error instanceof Error ? error.message : String(error)
    console.error(`[FlowExport] Export to ${filePath} failed: ${reason}`)
    throw new ExportError(`Export failed: ${reason}`, 'io-error', error)
  }

  const summary: ExportSummary = {
    path: filePath,
    rows: points.length,
    bytes: Buffer.byteLength(content, 'utf-8'),
  }
  console.log(`[FlowExport] Exported ${summary.rows} rows (${summary.bytes} bytes) to ${filePath}`)
  return summary
}

/**
 * Default export file name: flow_data_<unix seconds>.csv
 * @param now
 */
export function defaultExportFileName(now: number = Date.now()): string {
  return `flow_data_${Math.floor(now / 1000)}.csv`
}

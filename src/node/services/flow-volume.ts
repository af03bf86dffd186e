// * Session accounting for the device's cumulative volume counter.
// * The device counter only restarts when the board resets, so the host keeps its own baseline:
// *   session volume = carried + (device cumulative − base)

import type { FlowSample } from './flow-protocol'

export type VolumeCheckResult =
  | {
      ok: true
      sessionVolumeL: number
      /** Device clock went backwards: the board restarted and the baseline was moved */
      discontinuity: boolean
    }
  | {
      ok: false
      reason: 'volume-regressed'
      detail: string
    }

/**
 *
 */
export class CumulativeVolumeTracker {
  private carriedL = 0
  private baseL = 0
  private lastDeviceVolumeL: number | null = null
  private lastDeviceTimeMs: number | null = null
  private lastSessionVolumeL = 0

  /**
   * Validate a parsed sample against the session and compute its session-relative volume.
   * Nothing is updated when the sample is rejected.
   * @param sample
   */
  accept(sample: FlowSample): VolumeCheckResult {
    const discontinuity = this.lastDeviceTimeMs !== null && sample.deviceTimeMs < this.lastDeviceTimeMs

    if (discontinuity) {
      // The device counter restarted from zero; keep the session total growing from where it was
      this.carriedL = this.lastSessionVolumeL
      this.baseL = 0
    } else if (this.lastDeviceVolumeL !== null && sample.cumulativeVolumeL < this.lastDeviceVolumeL) {
      return {
        ok: false,
        reason: 'volume-regressed',
        detail: `Cumulative volume went from ${this.lastDeviceVolumeL} L to ${sample.cumulativeVolumeL} L`,
      }
    }

    const sessionVolumeL = Math.max(0, this.carriedL + (sample.cumulativeVolumeL - this.baseL))

    this.lastDeviceVolumeL = sample.cumulativeVolumeL
    this.lastDeviceTimeMs = sample.deviceTimeMs
    this.lastSessionVolumeL = sessionVolumeL

    return { ok: true, sessionVolumeL, discontinuity }
  }

  /**
   * Restart the session total from zero on the same device stream (user reset).
   */
  rebase(): void {
    this.carriedL = 0
    this.baseL = this.lastDeviceVolumeL ?? 0
    this.lastSessionVolumeL = 0
  }

  /**
   * Forget everything (new connection: the board resets when the port opens).
   */
  clear(): void {
    this.carriedL = 0
    this.baseL = 0
    this.lastDeviceVolumeL = null
    this.lastDeviceTimeMs = null
    this.lastSessionVolumeL = 0
  }

  get sessionVolumeL(): number {
    return this.lastSessionVolumeL
  }
}

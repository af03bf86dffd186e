// * Bounded series of smoothed flow points.
// * Fixed-capacity ring: append is O(1), the oldest point is evicted once full.
// * Consumers only ever receive frozen snapshots, rebuilt lazily after a mutation.

import type { SmoothedPoint } from '@/types/flow-monitor'

/** Enough for ~8 minutes at 1 Hz */
export const DEFAULT_SERIES_CAPACITY = 500

const EMPTY_SNAPSHOT: readonly SmoothedPoint[] = Object.freeze([])

/**
 *
 */
export class FlowSeriesStore {
  private readonly ring: (SmoothedPoint | undefined)[]
  private head = 0 // index of the oldest point
  private count = 0
  private cachedSnapshot: readonly SmoothedPoint[] | null = EMPTY_SNAPSHOT

  /**
   * @param capacity - Maximum number of points retained
   */
  constructor(capacity: number = DEFAULT_SERIES_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Series capacity must be a positive integer, got ${capacity}`)
    }
    this.ring = new Array<SmoothedPoint | undefined>(capacity).fill(undefined)
  }

  /**
   * Append a point, evicting the oldest one when full.
   * @param point
   * @returns The evicted point, if any
   */
  append(point: SmoothedPoint): SmoothedPoint | undefined {
    const frozen = Object.isFrozen(point) ? point : Object.freeze({ ...point })
    let evicted: SmoothedPoint | undefined

    if (this.count < this.ring.length) {
      this.ring[(this.head + this.count) % this.ring.length] = frozen
      this.count++
    } else {
      evicted = this.ring[this.head]
      this.ring[this.head] = frozen
      this.head = (this.head + 1) % this.ring.length
    }

    this.cachedSnapshot = null
    return evicted
  }

  /**
   * Ordered (oldest → newest) immutable copy of the stored points.
   */
  snapshot(): readonly SmoothedPoint[] {
    if (this.cachedSnapshot === null) {
      const points: SmoothedPoint[] = []
      for (let i = 0; i < this.count; i++) {
        const point = this.ring[(this.head + i) % this.ring.length]
        if (point) {
          points.push(point)
        }
      }
      this.cachedSnapshot = Object.freeze(points)
    }
    return this.cachedSnapshot
  }

  latest(): SmoothedPoint | null {
    if (this.count === 0) {
      return null
    }
    return this.ring[(this.head + this.count - 1) % this.ring.length] ?? null
  }

  /**
   * Drop every point (new session).
   */
  reset(): void {
    this.ring.fill(undefined)
    this.head = 0
    this.count = 0
    this.cachedSnapshot = EMPTY_SNAPSHOT
  }

  get size(): number {
    return this.count
  }

  get capacity(): number {
    return this.ring.length
  }
}

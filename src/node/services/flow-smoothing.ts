// * Host-side smoothing of the device-reported flow rate.
// * The firmware already averages pulse counts on-board; this filter is a separate layer over the
// * reported rate so the two can be compared and tested in isolation.

export const DEFAULT_SMOOTHING_WINDOW = 10

/**
 * Simple moving average over a trailing window.
 *
 * During warm-up the mean covers only the values seen so far, so the output at
 * step k is the mean of the last min(k, N) inputs.
 */
export class MovingAverageFilter {
  private readonly window: Float64Array
  private nextIndex = 0
  private count = 0

  /**
   * @param windowSize - Number of trailing values averaged (positive integer)
   */
  constructor(windowSize: number = DEFAULT_SMOOTHING_WINDOW) {
    if (!Number.isInteger(windowSize) || windowSize < 1) {
      throw new RangeError(`Smoothing window must be a positive integer, got ${windowSize}`)
    }
    this.window = new Float64Array(windowSize)
  }

  /**
   * Add a value and return the current mean.
   * @param raw
   */
  push(raw: number): number {
    this.window[this.nextIndex] = raw
    this.nextIndex = (this.nextIndex + 1) % this.window.length
    if (this.count < this.window.length) {
      this.count++
    }
    return this.current() ?? raw
  }

  /**
   * Mean of the values currently held, or null before the first push.
   */
  current(): number | null {
    if (this.count === 0) {
      return null
    }

    let sum = 0
    for (let i = 0; i < this.count; i++) {
      sum += this.window[i]
    }
    return sum / this.count
  }

  reset(): void {
    this.window.fill(0)
    this.nextIndex = 0
    this.count = 0
  }

  get size(): number {
    return this.count
  }

  get windowSize(): number {
    return this.window.length
  }
}

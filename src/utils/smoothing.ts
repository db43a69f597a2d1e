export const MONITOR_WINDOW_SIZE = 20
export const PREVIEW_WINDOW_SIZE = 30

/**
 * Rolling mean over the last `windowSize` scores.
 *
 * The oldest score is evicted before a new one is appended once the window is
 * full. Each consumer owns its own instance.
 */
export class ScoreSmoother {
  private readonly windowSize: number
  private window: number[] = []

  constructor(windowSize: number = MONITOR_WINDOW_SIZE) {
    if (!Number.isInteger(windowSize) || windowSize < 1) {
      throw new RangeError(`windowSize must be a positive integer, got ${windowSize}`)
    }
    this.windowSize = windowSize
  }

  push(score: number): number {
    if (this.window.length >= this.windowSize) {
      this.window.shift()
    }
    this.window.push(score)
    return this.computeValue()
  }

  getValue(): number | null {
    return this.window.length === 0 ? null : this.computeValue()
  }

  getWindow(): readonly number[] {
    return [...this.window]
  }

  get size(): number {
    return this.window.length
  }

  get capacity(): number {
    return this.windowSize
  }

  reset(): void {
    this.window = []
  }

  private computeValue(): number {
    const sum = this.window.reduce((acc, s) => acc + s, 0)
    return Math.round(sum / this.window.length)
  }
}

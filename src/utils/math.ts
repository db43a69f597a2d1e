export interface Point2D {
  readonly x: number
  readonly y: number
}

export function midpoint(p1: Point2D, p2: Point2D): Point2D {
  return {
    x: (p1.x + p2.x) / 2,
    y: (p1.y + p2.y) / 2,
  }
}

export function distance2D(p1: Point2D, p2: Point2D): number {
  const dx = p2.x - p1.x
  const dy = p2.y - p1.y
  return Math.sqrt(dx * dx + dy * dy)
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) {
    throw new RangeError('mean of an empty list is undefined')
  }
  let sum = 0
  for (const value of values) {
    sum += value
  }
  return sum / values.length
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value))
}

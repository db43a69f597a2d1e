import type { Landmark, LandmarkFrame } from './pose-types'

export class LandmarkParseError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'LandmarkParseError'
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value)
}

function parseLandmark(value: unknown, where: string): Landmark {
  if (!isRecord(value)) {
    throw new LandmarkParseError(`${where}: expected an object`)
  }
  const { x, y, z, visibility } = value
  if (!isFiniteNumber(x) || !isFiniteNumber(y)) {
    throw new LandmarkParseError(`${where}: x and y must be finite numbers`)
  }
  if (z !== undefined && !isFiniteNumber(z)) {
    throw new LandmarkParseError(`${where}: z must be a finite number`)
  }
  if (!isFiniteNumber(visibility) || visibility < 0 || visibility > 1) {
    throw new LandmarkParseError(`${where}: visibility must be within [0, 1]`)
  }
  return { x, y, z: z ?? 0, visibility }
}

function parseLandmarkList(value: unknown, where: string): readonly Landmark[] {
  if (!Array.isArray(value)) {
    throw new LandmarkParseError(`${where}: expected an array of landmarks`)
  }
  return value.map((item: unknown, i) => parseLandmark(item, `${where}[${i}]`))
}

/**
 * Validate recorded detector output:
 * `[{ timestamp, pose: Landmark[], face?: Landmark[] | null }, ...]`.
 * `z` may be omitted and defaults to 0.
 */
export function parseLandmarkFrames(raw: unknown): LandmarkFrame[] {
  if (!Array.isArray(raw)) {
    throw new LandmarkParseError('expected an array of frames')
  }

  return raw.map((item: unknown, i): LandmarkFrame => {
    const where = `frame ${i}`
    if (!isRecord(item)) {
      throw new LandmarkParseError(`${where}: expected an object`)
    }
    if (!isFiniteNumber(item.timestamp)) {
      throw new LandmarkParseError(`${where}: timestamp must be a finite number`)
    }
    const pose = parseLandmarkList(item.pose, `${where}.pose`)
    const face = item.face === undefined || item.face === null
      ? null
      : parseLandmarkList(item.face, `${where}.face`)
    return { timestamp: item.timestamp, pose, face }
  })
}

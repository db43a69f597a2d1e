import type { Landmark, LandmarkSet } from '@/services/pose-detection/pose-types'
import {
  FaceMeshIndex,
  MIN_VISIBILITY,
  PoseLandmarkIndex,
} from '@/services/pose-detection/pose-types'
import { distance2D, midpoint } from '@/utils/math'
import type { MetricMap, MetricName } from './posture-types'

// Below this the reference width is treated as degenerate (points coincide).
const MIN_REFERENCE_WIDTH = 1e-6

function visiblePoint(points: readonly Landmark[], index: number): Landmark | null {
  const point: Landmark | undefined = points[index]
  if (point === undefined || !(point.visibility >= MIN_VISIBILITY)) {
    return null
  }
  return point
}

interface BodyPoints {
  readonly nose: Landmark | null
  readonly leftEar: Landmark | null
  readonly rightEar: Landmark | null
  readonly leftShoulder: Landmark
  readonly rightShoulder: Landmark
  readonly shoulderWidth: number
}

function bodyPoints(pose: readonly Landmark[]): BodyPoints | null {
  const leftShoulder = visiblePoint(pose, PoseLandmarkIndex.LEFT_SHOULDER)
  const rightShoulder = visiblePoint(pose, PoseLandmarkIndex.RIGHT_SHOULDER)
  if (leftShoulder === null || rightShoulder === null) return null

  const shoulderWidth = distance2D(leftShoulder, rightShoulder)
  if (shoulderWidth < MIN_REFERENCE_WIDTH) return null

  return {
    nose: visiblePoint(pose, PoseLandmarkIndex.NOSE),
    leftEar: visiblePoint(pose, PoseLandmarkIndex.LEFT_EAR),
    rightEar: visiblePoint(pose, PoseLandmarkIndex.RIGHT_EAR),
    leftShoulder,
    rightShoulder,
    shoulderWidth,
  }
}

function faceWidthRatio(
  face: readonly Landmark[],
  shoulderWidth: number,
): number | null {
  const leftCheek = visiblePoint(face, FaceMeshIndex.LEFT_CHEEK)
  const rightCheek = visiblePoint(face, FaceMeshIndex.RIGHT_CHEEK)
  if (leftCheek === null || rightCheek === null) return null
  return Math.abs(leftCheek.x - rightCheek.x) / shoulderWidth
}

/**
 * Horizontal offset of forehead over chin, in inter-eye widths.
 * Positive when the forehead sits right of the chin in the frame.
 */
export function faceTilt(face: readonly Landmark[]): number | null {
  const forehead = visiblePoint(face, FaceMeshIndex.FOREHEAD)
  const chin = visiblePoint(face, FaceMeshIndex.CHIN)
  const leftEye = visiblePoint(face, FaceMeshIndex.LEFT_EYE_OUTER)
  const rightEye = visiblePoint(face, FaceMeshIndex.RIGHT_EYE_OUTER)
  if (forehead === null || chin === null || leftEye === null || rightEye === null) {
    return null
  }

  const eyeWidth = distance2D(leftEye, rightEye)
  if (eyeWidth < MIN_REFERENCE_WIDTH) return null
  return (forehead.x - chin.x) / eyeWidth
}

/**
 * Convert one frame of landmarks into shoulder-width-relative metrics.
 * Image y grows downwards, so a dropping head raises `head_drop` and a
 * collapsing neck lowers `ear_shoulder_dist`.
 */
export function extractMetrics(landmarks: LandmarkSet): MetricMap {
  const metrics: Partial<Record<MetricName, number>> = {}
  const body = bodyPoints(landmarks.pose)
  const face = landmarks.face ?? null

  if (body !== null) {
    const { nose, leftEar, rightEar, leftShoulder, rightShoulder, shoulderWidth } = body
    const shoulderMid = midpoint(leftShoulder, rightShoulder)
    const earMid = leftEar !== null && rightEar !== null ? midpoint(leftEar, rightEar) : null

    if (nose !== null) {
      metrics.head_drop = (nose.y - shoulderMid.y) / shoulderWidth
      metrics.lean_offset = (nose.x - shoulderMid.x) / shoulderWidth
    }
    if (earMid !== null) {
      metrics.ear_shoulder_dist = (shoulderMid.y - earMid.y) / shoulderWidth
    }
    if (nose !== null && earMid !== null) {
      metrics.nose_to_ear = (nose.y - earMid.y) / shoulderWidth
    }
    metrics.shoulder_tilt = (leftShoulder.y - rightShoulder.y) / shoulderWidth

    if (face !== null) {
      const ratio = faceWidthRatio(face, shoulderWidth)
      if (ratio !== null) metrics.face_distance = ratio
    }
  }

  if (face !== null) {
    const tilt = faceTilt(face)
    if (tilt !== null) metrics.face_tilt = tilt
  }

  return metrics
}

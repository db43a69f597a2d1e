export const PoseLandmarkIndex = {
  NOSE: 0,
  LEFT_EYE_INNER: 1,
  LEFT_EYE: 2,
  LEFT_EYE_OUTER: 3,
  RIGHT_EYE_INNER: 4,
  RIGHT_EYE: 5,
  RIGHT_EYE_OUTER: 6,
  LEFT_EAR: 7,
  RIGHT_EAR: 8,
  MOUTH_LEFT: 9,
  MOUTH_RIGHT: 10,
  LEFT_SHOULDER: 11,
  RIGHT_SHOULDER: 12,
} as const

export const TOTAL_POSE_LANDMARKS = 33

// Face-mesh topology points used for face metrics
export const FaceMeshIndex = {
  FOREHEAD: 10,
  CHIN: 152,
  LEFT_CHEEK: 234,
  RIGHT_CHEEK: 454,
  LEFT_EYE_OUTER: 33,
  RIGHT_EYE_OUTER: 263,
} as const

export interface Landmark {
  readonly x: number
  readonly y: number
  readonly z: number
  readonly visibility: number
}

/**
 * One frame of detector output. `pose` follows the 33-point pose topology,
 * `face` the face-mesh topology. Face-mesh detectors that report no per-point
 * confidence should pass visibility 1.
 */
export interface LandmarkSet {
  readonly pose: readonly Landmark[]
  readonly face?: readonly Landmark[] | null
}

export interface LandmarkFrame extends LandmarkSet {
  readonly timestamp: number
}

export const MIN_VISIBILITY = 0.4

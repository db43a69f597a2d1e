export const METRIC_NAMES = [
  'head_drop',
  'ear_shoulder_dist',
  'lean_offset',
  'shoulder_tilt',
  'nose_to_ear',
  'face_distance',
  'face_tilt',
] as const

export type MetricName = typeof METRIC_NAMES[number]

/**
 * Normalized posture metrics for one frame. A metric whose landmarks were not
 * visible is absent, never zero.
 */
export type MetricMap = Readonly<Partial<Record<MetricName, number>>>

export type Baseline = MetricMap

export type IssueCategory =
  | 'headDrop'
  | 'slouch'
  | 'lean'
  | 'shoulderTilt'
  | 'forwardLean'

export type IssueLabel =
  | 'HEAD_DROP'
  | 'SLOUCH'
  | 'LEAN_LEFT'
  | 'LEAN_RIGHT'
  | 'SHOULDER_TILT'
  | 'FORWARD_LEAN'

export interface PostureIssue {
  readonly label: IssueLabel
  readonly category: IssueCategory
  // raw metric delta from baseline, before severity weighting
  readonly deviation: number
  readonly severity: number
  readonly penalty: number
  readonly message: string
}

export type RuleResult = PostureIssue | null

export interface ComparisonResult {
  readonly score: number
  readonly issues: readonly PostureIssue[]
}

export function isMetricName(key: string): key is MetricName {
  return (METRIC_NAMES as readonly string[]).includes(key)
}

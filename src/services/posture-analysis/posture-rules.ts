import type {
  Baseline,
  IssueCategory,
  IssueLabel,
  MetricMap,
  MetricName,
  PostureIssue,
  RuleResult,
} from './posture-types'
import type { IssueThresholds } from './thresholds'

export const ISSUE_WEIGHTS: Readonly<Record<IssueCategory, number>> = {
  headDrop: 30,
  slouch: 35,
  lean: 20,
  shoulderTilt: 20,
  forwardLean: 25,
}

// Severity reaches 1 at this multiple of the threshold
export const SEVERITY_SATURATION = 3

export const ISSUE_MESSAGES: Readonly<Record<IssueLabel, string>> = {
  HEAD_DROP: 'Head dropping',
  SLOUCH: 'Slouching',
  LEAN_LEFT: 'Leaning left',
  LEAN_RIGHT: 'Leaning right',
  SHOULDER_TILT: 'Shoulders uneven',
  FORWARD_LEAN: 'Leaning forward',
}

// Metrics that feed a scored category; the rest are informational
export const SCORED_METRICS: readonly MetricName[] = [
  'head_drop',
  'ear_shoulder_dist',
  'lean_offset',
  'shoulder_tilt',
  'face_distance',
]

/**
 * Linear ramp clamped to [0, 1]: one third at the threshold, full severity
 * at three times the threshold.
 */
export function computeSeverity(deviation: number, threshold: number): number {
  if (threshold <= 0) return 1
  return Math.min(1, Math.max(0, deviation / (threshold * SEVERITY_SATURATION)))
}

function metricDelta(current: MetricMap, baseline: Baseline, name: MetricName): number | null {
  const now = current[name]
  const reference = baseline[name]
  if (now === undefined || reference === undefined) return null
  return now - reference
}

function buildIssue(
  label: IssueLabel,
  category: IssueCategory,
  deviation: number,
  threshold: number,
): RuleResult {
  if (!(deviation > threshold)) return null
  const severity = computeSeverity(deviation, threshold)
  return {
    label,
    category,
    deviation,
    severity,
    penalty: severity * ISSUE_WEIGHTS[category],
    message: ISSUE_MESSAGES[label],
  }
}

export function headDropRule(current: MetricMap, baseline: Baseline, threshold: number): RuleResult {
  const delta = metricDelta(current, baseline, 'head_drop')
  if (delta === null) return null
  return buildIssue('HEAD_DROP', 'headDrop', delta, threshold)
}

export function slouchRule(current: MetricMap, baseline: Baseline, threshold: number): RuleResult {
  const delta = metricDelta(current, baseline, 'ear_shoulder_dist')
  if (delta === null) return null
  // ears sinking towards the shoulders shrinks the distance
  return buildIssue('SLOUCH', 'slouch', -delta, threshold)
}

export function leanRule(current: MetricMap, baseline: Baseline, threshold: number): RuleResult {
  const delta = metricDelta(current, baseline, 'lean_offset')
  if (delta === null) return null
  const label: IssueLabel = delta < 0 ? 'LEAN_LEFT' : 'LEAN_RIGHT'
  return buildIssue(label, 'lean', Math.abs(delta), threshold)
}

export function shoulderTiltRule(current: MetricMap, baseline: Baseline, threshold: number): RuleResult {
  const delta = metricDelta(current, baseline, 'shoulder_tilt')
  if (delta === null) return null
  return buildIssue('SHOULDER_TILT', 'shoulderTilt', Math.abs(delta), threshold)
}

export function forwardLeanRule(current: MetricMap, baseline: Baseline, threshold: number): RuleResult {
  const delta = metricDelta(current, baseline, 'face_distance')
  if (delta === null) return null
  // face grows relative to the shoulders as the head moves towards the camera
  return buildIssue('FORWARD_LEAN', 'forwardLean', delta, threshold)
}

export function evaluateAllRules(
  current: MetricMap,
  baseline: Baseline,
  thresholds: IssueThresholds,
): readonly PostureIssue[] {
  const results = [
    headDropRule(current, baseline, thresholds.headDrop),
    slouchRule(current, baseline, thresholds.slouch),
    leanRule(current, baseline, thresholds.lean),
    shoulderTiltRule(current, baseline, thresholds.shoulderTilt),
    forwardLeanRule(current, baseline, thresholds.forwardLean),
  ]
  return results.filter((r): r is PostureIssue => r !== null)
}

export function hasScoredMetrics(metrics: MetricMap): boolean {
  return SCORED_METRICS.some((name) => metrics[name] !== undefined)
}

export function hasComparableMetrics(current: MetricMap, baseline: Baseline): boolean {
  return SCORED_METRICS.some((name) => current[name] !== undefined && baseline[name] !== undefined)
}

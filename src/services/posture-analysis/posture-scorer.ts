import { clamp } from '@/utils/math'
import type { Baseline, ComparisonResult, MetricMap, PostureIssue } from './posture-types'
import type { ThresholdConfig } from './thresholds'
import { evaluateAllRules } from './posture-rules'

export const MAX_SCORE = 100

// Worst first; equal weighted severity falls back to label order
function byPenaltyThenLabel(a: PostureIssue, b: PostureIssue): number {
  if (a.penalty !== b.penalty) return b.penalty - a.penalty
  if (a.label < b.label) return -1
  if (a.label > b.label) return 1
  return 0
}

/**
 * Score the current frame against the calibrated baseline.
 *
 * Categories whose metric is missing on either side are skipped: absent data
 * never counts as bad posture. Penalties compound across categories and the
 * total is rounded half up, then clamped to [0, 100].
 */
export function compareToBaseline(
  current: MetricMap,
  baseline: Baseline,
  config: ThresholdConfig,
): ComparisonResult {
  const issues = [...evaluateAllRules(current, baseline, config.thresholds)]
  const penalty = issues.reduce((sum, issue) => sum + issue.penalty, 0)
  const score = clamp(Math.round(MAX_SCORE - penalty), 0, MAX_SCORE)

  return {
    score,
    issues: issues.sort(byPenaltyThenLabel),
  }
}

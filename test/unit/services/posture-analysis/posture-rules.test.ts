import { describe, it, expect } from 'vitest'
import {
  computeSeverity,
  evaluateAllRules,
  forwardLeanRule,
  hasComparableMetrics,
  hasScoredMetrics,
  headDropRule,
  leanRule,
  shoulderTiltRule,
  slouchRule,
} from '@/services/posture-analysis/posture-rules'
import { BASE_THRESHOLDS } from '@/services/posture-analysis/thresholds'
import type { Baseline } from '@/services/posture-analysis/posture-types'

const BASELINE: Baseline = {
  head_drop: 0,
  ear_shoulder_dist: 0.5,
  lean_offset: 0,
  shoulder_tilt: 0,
  face_distance: 0.4,
}

describe('computeSeverity', () => {
  it('is one third at the threshold', () => {
    expect(computeSeverity(0.06, 0.06)).toBeCloseTo(1 / 3, 10)
  })

  it('saturates at three times the threshold', () => {
    expect(computeSeverity(0.5, 0.05)).toBe(1)
  })

  it('never goes below 0', () => {
    expect(computeSeverity(-1, 0.05)).toBe(0)
  })

  it('is 1 for a non-positive threshold', () => {
    expect(computeSeverity(0.01, 0)).toBe(1)
  })
})

describe('headDropRule', () => {
  it('ignores a deviation at the threshold', () => {
    expect(headDropRule({ head_drop: 0.04 }, { head_drop: 0 }, 0.04)).toBeNull()
  })

  it('reports a deviation above the threshold', () => {
    const issue = headDropRule({ head_drop: 0.08 }, { head_drop: 0 }, 0.04)
    expect(issue).not.toBeNull()
    expect(issue?.label).toBe('HEAD_DROP')
    expect(issue?.category).toBe('headDrop')
    expect(issue?.deviation).toBe(0.08)
    expect(issue?.severity).toBeCloseTo(2 / 3, 10)
    expect(issue?.penalty).toBeCloseTo(20, 10)
    expect(issue?.message).toBe('Head dropping')
  })

  it('ignores the head rising', () => {
    expect(headDropRule({ head_drop: -0.2 }, { head_drop: 0 }, 0.04)).toBeNull()
  })

  it('is skipped when the baseline lacks the metric', () => {
    expect(headDropRule({ head_drop: 0.5 }, {}, 0.04)).toBeNull()
  })
})

describe('slouchRule', () => {
  it('reports the ears sinking towards the shoulders', () => {
    const issue = slouchRule({ ear_shoulder_dist: 0.3 }, BASELINE, 0.06)
    expect(issue?.label).toBe('SLOUCH')
    expect(issue?.deviation).toBeCloseTo(0.2, 10)
    expect(issue?.severity).toBe(1)
    expect(issue?.penalty).toBe(35)
  })

  it('ignores the neck lengthening', () => {
    expect(slouchRule({ ear_shoulder_dist: 0.7 }, BASELINE, 0.06)).toBeNull()
  })
})

describe('leanRule', () => {
  it('labels a negative offset as leaning left', () => {
    const issue = leanRule({ lean_offset: -0.1 }, BASELINE, 0.03)
    expect(issue?.label).toBe('LEAN_LEFT')
    expect(issue?.deviation).toBe(0.1)
    expect(issue?.message).toBe('Leaning left')
  })

  it('labels a positive offset as leaning right', () => {
    const issue = leanRule({ lean_offset: 0.1 }, BASELINE, 0.03)
    expect(issue?.label).toBe('LEAN_RIGHT')
    expect(issue?.deviation).toBe(0.1)
  })
})

describe('shoulderTiltRule', () => {
  it('uses the absolute change in tilt', () => {
    const issue = shoulderTiltRule({ shoulder_tilt: -0.03 }, { shoulder_tilt: 0.02 }, 0.025)
    expect(issue?.label).toBe('SHOULDER_TILT')
    expect(issue?.deviation).toBeCloseTo(0.05, 10)
  })
})

describe('forwardLeanRule', () => {
  it('reports the face growing relative to the shoulders', () => {
    const issue = forwardLeanRule({ face_distance: 0.5 }, BASELINE, 0.03)
    expect(issue?.label).toBe('FORWARD_LEAN')
    expect(issue?.deviation).toBeCloseTo(0.1, 10)
  })

  it('ignores moving away from the camera', () => {
    expect(forwardLeanRule({ face_distance: 0.2 }, BASELINE, 0.03)).toBeNull()
  })
})

describe('evaluateAllRules', () => {
  it('returns nothing when current equals the baseline', () => {
    expect(evaluateAllRules(BASELINE, BASELINE, BASE_THRESHOLDS)).toEqual([])
  })

  it('returns every triggered category in rule order', () => {
    const issues = evaluateAllRules(
      { head_drop: 0.2, ear_shoulder_dist: 0.2, lean_offset: 0.2, shoulder_tilt: 0.2, face_distance: 0.8 },
      BASELINE,
      BASE_THRESHOLDS,
    )
    expect(issues.map((i) => i.label)).toEqual([
      'HEAD_DROP',
      'SLOUCH',
      'LEAN_RIGHT',
      'SHOULDER_TILT',
      'FORWARD_LEAN',
    ])
  })
})

describe('metric presence checks', () => {
  it('treats informational metrics as not scored', () => {
    expect(hasScoredMetrics({ face_tilt: 0.1, nose_to_ear: 0 })).toBe(false)
    expect(hasScoredMetrics({ lean_offset: 0 })).toBe(true)
  })

  it('needs a scored metric on both sides to compare', () => {
    expect(hasComparableMetrics({ head_drop: 0 }, { lean_offset: 0 })).toBe(false)
    expect(hasComparableMetrics({ head_drop: 0 }, { head_drop: 0.1 })).toBe(true)
  })
})

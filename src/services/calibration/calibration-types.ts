import type { Baseline, MetricMap } from '@/services/posture-analysis/posture-types'

export interface CalibrationProgress {
  readonly progress: number // 0-1
  readonly complete: boolean
  readonly sampleCount: number
  readonly totalSamples: number
  readonly rejectedCount: number
}

export interface CalibrationConfig {
  readonly totalSamples: number
  readonly minSamples: number
}

export interface CalibrationResult {
  readonly baseline: Baseline
  readonly sampleStdDev: MetricMap
  readonly sampleCount: number
}

// ~3 seconds of frames at the capture cadence
export const DEFAULT_CALIBRATION_CONFIG: CalibrationConfig = {
  totalSamples: 45,
  minSamples: 10,
} as const

export class InsufficientDataError extends Error {
  readonly sampleCount: number
  readonly required: number

  constructor(sampleCount: number, required: number) {
    super(`Cannot compute baseline: ${sampleCount} usable samples, need at least ${required}`)
    this.name = 'InsufficientDataError'
    this.sampleCount = sampleCount
    this.required = required
  }
}

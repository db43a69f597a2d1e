import type { IssueCategory } from './posture-types'

export type IssueThresholds = Readonly<Record<IssueCategory, number>>

export type SensitivityLevel = 'low' | 'medium' | 'high'

export interface ThresholdConfig {
  readonly sensitivity: SensitivityLevel
  readonly thresholds: IssueThresholds
}

export type CustomThresholdOverrides = Partial<IssueThresholds>

// Medium-sensitivity deviations, in shoulder-width units
export const BASE_THRESHOLDS: IssueThresholds = {
  headDrop: 0.04,
  slouch: 0.06,
  lean: 0.03,
  shoulderTilt: 0.025,
  forwardLean: 0.03,
}

export const SENSITIVITY_PRESETS: Readonly<Record<SensitivityLevel, number>> = {
  low: 1.5,
  medium: 1.0,
  high: 0.625,
}

export const SENSITIVITY_LEVELS: readonly SensitivityLevel[] = ['low', 'medium', 'high']

const CATEGORIES: readonly IssueCategory[] = [
  'headDrop',
  'slouch',
  'lean',
  'shoulderTilt',
  'forwardLean',
]

export function isSensitivityLevel(value: unknown): value is SensitivityLevel {
  return typeof value === 'string' && (SENSITIVITY_LEVELS as readonly string[]).includes(value)
}

/**
 * Build a threshold table for one consumer. Every call returns a fresh frozen
 * object, so the monitor loop and the preview can hold different presets.
 * Overrides replace the scaled value for their category.
 */
export function createThresholdConfig(
  sensitivity: SensitivityLevel = 'medium',
  overrides?: CustomThresholdOverrides,
): ThresholdConfig {
  if (!isSensitivityLevel(sensitivity)) {
    throw new RangeError(`unknown sensitivity level: ${String(sensitivity)}`)
  }
  const scale = SENSITIVITY_PRESETS[sensitivity]
  const thresholds: Record<IssueCategory, number> = { ...BASE_THRESHOLDS }

  for (const category of CATEGORIES) {
    const override = overrides?.[category]
    if (override === undefined) {
      thresholds[category] = BASE_THRESHOLDS[category] * scale
      continue
    }
    if (!Number.isFinite(override) || override <= 0) {
      throw new RangeError(`threshold for ${category} must be a positive number, got ${override}`)
    }
    thresholds[category] = override
  }

  return Object.freeze({
    sensitivity,
    thresholds: Object.freeze(thresholds),
  })
}

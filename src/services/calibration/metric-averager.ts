import type { Baseline, MetricMap, MetricName } from '@/services/posture-analysis/posture-types'
import { METRIC_NAMES } from '@/services/posture-analysis/posture-types'
import { mean } from '@/utils/math'
import { InsufficientDataError } from './calibration-types'

function presentValues(samples: readonly MetricMap[], key: MetricName): number[] {
  const values: number[] = []
  for (const sample of samples) {
    const value = sample[key]
    if (value !== undefined) values.push(value)
  }
  return values
}

/**
 * Average calibration samples key by key. Each key is averaged over the
 * samples that contain it; a key missing from every sample stays absent.
 */
export function averageMetrics(samples: readonly MetricMap[]): Baseline {
  if (samples.length === 0) {
    throw new InsufficientDataError(0, 1)
  }

  const baseline: Partial<Record<MetricName, number>> = {}
  for (const key of METRIC_NAMES) {
    const values = presentValues(samples, key)
    if (values.length > 0) {
      baseline[key] = mean(values)
    }
  }
  return baseline
}

export function standardDeviations(samples: readonly MetricMap[], means: Baseline): MetricMap {
  const result: Partial<Record<MetricName, number>> = {}
  for (const key of METRIC_NAMES) {
    const center = means[key]
    if (center === undefined) continue
    const values = presentValues(samples, key)
    result[key] = Math.sqrt(mean(values.map((v) => (v - center) ** 2)))
  }
  return result
}

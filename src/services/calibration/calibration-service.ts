import type { MetricMap } from '@/services/posture-analysis/posture-types'
import { hasScoredMetrics } from '@/services/posture-analysis/posture-rules'
import type {
  CalibrationConfig,
  CalibrationProgress,
  CalibrationResult,
} from './calibration-types'
import { DEFAULT_CALIBRATION_CONFIG, InsufficientDataError } from './calibration-types'
import { averageMetrics, standardDeviations } from './metric-averager'

export class CalibrationService {
  private readonly config: CalibrationConfig
  private samples: readonly MetricMap[]
  private rejectedCount: number

  constructor(config?: Partial<CalibrationConfig>) {
    this.config = {
      ...DEFAULT_CALIBRATION_CONFIG,
      ...config,
    }
    if (!Number.isInteger(this.config.totalSamples) || this.config.totalSamples < 1) {
      throw new RangeError(`totalSamples must be a positive integer, got ${this.config.totalSamples}`)
    }
    if (!Number.isInteger(this.config.minSamples) || this.config.minSamples < 1) {
      throw new RangeError(`minSamples must be a positive integer, got ${this.config.minSamples}`)
    }
    this.samples = []
    this.rejectedCount = 0
  }

  /** Frames without any scored metric are counted but not kept. */
  addSample(metrics: MetricMap): CalibrationProgress {
    if (!hasScoredMetrics(metrics)) {
      this.rejectedCount += 1
    } else {
      this.samples = [...this.samples, metrics]
    }
    return this.buildProgress()
  }

  computeBaseline(): CalibrationResult {
    if (this.samples.length < this.config.minSamples) {
      throw new InsufficientDataError(this.samples.length, this.config.minSamples)
    }

    const baseline = averageMetrics(this.samples)
    return {
      baseline,
      sampleStdDev: standardDeviations(this.samples, baseline),
      sampleCount: this.samples.length,
    }
  }

  reset(): void {
    this.samples = []
    this.rejectedCount = 0
  }

  getProgress(): CalibrationProgress {
    return this.buildProgress()
  }

  private buildProgress(): CalibrationProgress {
    const { length } = this.samples
    const total = this.config.totalSamples
    return {
      progress: Math.min(length / total, 1),
      complete: length >= total,
      sampleCount: length,
      totalSamples: total,
      rejectedCount: this.rejectedCount,
    }
  }
}

import type { LandmarkSet } from '@/services/pose-detection/pose-types'
import type { EngineSettings } from '@/types/settings'
import { ScoreSmoother } from '@/utils/smoothing'
import type { Baseline, MetricMap, PostureIssue } from './posture-types'
import type { ThresholdConfig } from './thresholds'
import { createThresholdConfig } from './thresholds'
import { extractMetrics } from './metric-extractor'
import { compareToBaseline } from './posture-scorer'
import { hasComparableMetrics } from './posture-rules'
import {
  MONITOR_ZONE_BANDS,
  PREVIEW_ZONE_BANDS,
  scoreZone,
  type ScoreZone,
  type ZoneBands,
} from './score-zones'

export type MonitorStatus = 'ok' | 'uncalibrated' | 'no-pose'

export type MonitorPurpose = 'monitor' | 'preview'

export interface MonitorReading {
  readonly status: MonitorStatus
  readonly score: number | null
  readonly smoothedScore: number | null
  readonly zone: ScoreZone | null
  readonly issues: readonly PostureIssue[]
  readonly metrics: MetricMap
  readonly timestamp: number
}

export interface MonitorOptions {
  readonly windowSize?: number
  readonly zoneBands?: ZoneBands
  readonly debugMode?: boolean
}

function debugFromEnv(): boolean {
  return process.env.POSTURE_DEBUG === '1'
}

/**
 * One consumer's view of the engine: extraction, comparison and a private
 * smoother. The monitoring loop and the live preview each hold their own.
 */
export class PostureMonitor {
  private baseline: Baseline | null
  private thresholds: ThresholdConfig
  private readonly smoother: ScoreSmoother
  private readonly zoneBands: ZoneBands
  private debugMode: boolean

  constructor(
    baseline: Baseline | null,
    thresholds: ThresholdConfig,
    options?: MonitorOptions,
  ) {
    this.baseline = baseline
    this.thresholds = thresholds
    this.smoother = new ScoreSmoother(options?.windowSize)
    this.zoneBands = options?.zoneBands ?? MONITOR_ZONE_BANDS
    this.debugMode = options?.debugMode ?? false
  }

  evaluate(landmarks: LandmarkSet, timestamp: number = Date.now()): MonitorReading {
    return this.evaluateMetrics(extractMetrics(landmarks), timestamp)
  }

  evaluateMetrics(metrics: MetricMap, timestamp: number = Date.now()): MonitorReading {
    if (this.baseline === null) {
      return this.emptyReading('uncalibrated', metrics, timestamp)
    }

    // Nothing to compare: keep the smoothed history as it was
    if (!hasComparableMetrics(metrics, this.baseline)) {
      return this.emptyReading('no-pose', metrics, timestamp)
    }

    const { score, issues } = compareToBaseline(metrics, this.baseline, this.thresholds)
    const smoothedScore = this.smoother.push(score)
    const reading: MonitorReading = {
      status: 'ok',
      score,
      smoothedScore,
      zone: scoreZone(smoothedScore, this.zoneBands),
      issues,
      metrics,
      timestamp,
    }

    if (this.debugMode || debugFromEnv()) {
      console.log(
        `[PostureDebug] ` +
        `score: ${score} smoothed: ${smoothedScore} (${this.smoother.size}/${this.smoother.capacity}) | ` +
        `sensitivity: ${this.thresholds.sensitivity} | ` +
        `[${issues.map((i) => `${i.label}=${i.deviation.toFixed(4)}`).join(',')}]`,
      )
    }

    return reading
  }

  isCalibrated(): boolean {
    return this.baseline !== null
  }

  updateBaseline(baseline: Baseline | null): void {
    this.baseline = baseline
    this.smoother.reset()
  }

  updateThresholds(thresholds: ThresholdConfig): void {
    this.thresholds = thresholds
  }

  getThresholds(): ThresholdConfig {
    return this.thresholds
  }

  setDebugMode(enabled: boolean): void {
    this.debugMode = enabled
  }

  reset(): void {
    this.smoother.reset()
  }

  private emptyReading(
    status: Exclude<MonitorStatus, 'ok'>,
    metrics: MetricMap,
    timestamp: number,
  ): MonitorReading {
    const smoothedScore = this.smoother.getValue()
    return {
      status,
      score: null,
      smoothedScore,
      zone: smoothedScore === null ? null : scoreZone(smoothedScore, this.zoneBands),
      issues: [],
      metrics,
      timestamp,
    }
  }
}

export function createPostureMonitor(
  settings: EngineSettings,
  baseline: Baseline | null,
  purpose: MonitorPurpose = 'monitor',
): PostureMonitor {
  const thresholds = createThresholdConfig(
    settings.detection.sensitivity,
    settings.advanced.customThresholds,
  )
  return new PostureMonitor(baseline, thresholds, {
    windowSize: purpose === 'monitor'
      ? settings.smoothing.monitorWindow
      : settings.smoothing.previewWindow,
    zoneBands: purpose === 'monitor' ? MONITOR_ZONE_BANDS : PREVIEW_ZONE_BANDS,
    debugMode: settings.advanced.debugMode,
  })
}

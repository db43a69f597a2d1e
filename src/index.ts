export {
  FaceMeshIndex,
  MIN_VISIBILITY,
  PoseLandmarkIndex,
  TOTAL_POSE_LANDMARKS,
} from './services/pose-detection/pose-types'
export type { Landmark, LandmarkFrame, LandmarkSet } from './services/pose-detection/pose-types'
export { LandmarkParseError, parseLandmarkFrames } from './services/pose-detection/landmark-parser'

export { METRIC_NAMES, isMetricName } from './services/posture-analysis/posture-types'
export type {
  Baseline,
  ComparisonResult,
  IssueCategory,
  IssueLabel,
  MetricMap,
  MetricName,
  PostureIssue,
} from './services/posture-analysis/posture-types'
export { extractMetrics } from './services/posture-analysis/metric-extractor'
export {
  BASE_THRESHOLDS,
  SENSITIVITY_PRESETS,
  createThresholdConfig,
  isSensitivityLevel,
} from './services/posture-analysis/thresholds'
export type {
  CustomThresholdOverrides,
  IssueThresholds,
  SensitivityLevel,
  ThresholdConfig,
} from './services/posture-analysis/thresholds'
export { ISSUE_WEIGHTS, computeSeverity } from './services/posture-analysis/posture-rules'
export { compareToBaseline } from './services/posture-analysis/posture-scorer'
export { MONITOR_ZONE_BANDS, PREVIEW_ZONE_BANDS, scoreZone } from './services/posture-analysis/score-zones'
export type { ScoreZone, ZoneBands } from './services/posture-analysis/score-zones'
export { PostureMonitor, createPostureMonitor } from './services/posture-analysis/posture-monitor'
export type {
  MonitorOptions,
  MonitorPurpose,
  MonitorReading,
  MonitorStatus,
} from './services/posture-analysis/posture-monitor'

export { averageMetrics } from './services/calibration/metric-averager'
export { CalibrationService } from './services/calibration/calibration-service'
export { InsufficientDataError, DEFAULT_CALIBRATION_CONFIG } from './services/calibration/calibration-types'
export type {
  CalibrationConfig,
  CalibrationProgress,
  CalibrationResult,
} from './services/calibration/calibration-types'
export { BaselineStore } from './services/calibration/baseline-store'
export type { BaselineStoreOptions } from './services/calibration/baseline-store'

export { ReminderManager } from './services/reminder/reminder-manager'
export { formatAlertLine, formatSpokenAlert, getAlertContent } from './services/reminder/alert-messages'
export { DEFAULT_REMINDER_CONFIG } from './services/reminder/reminder-types'
export type {
  AlertContent,
  PostureAlert,
  PostureObservation,
  ReminderCallbacks,
  ReminderConfig,
  ReminderState,
} from './services/reminder/reminder-types'

export { MONITOR_WINDOW_SIZE, PREVIEW_WINDOW_SIZE, ScoreSmoother } from './utils/smoothing'
export { ConfigStore } from './store/config-store'
export { DEFAULT_SETTINGS } from './types/settings'
export type { EngineSettings } from './types/settings'

import type {
  CustomThresholdOverrides,
  SensitivityLevel,
} from '@/services/posture-analysis/thresholds'

export interface EngineSettings {
  readonly detection: DetectionSettings
  readonly smoothing: SmoothingSettings
  readonly calibration: CalibrationSettings
  readonly reminder: ReminderSettings
  readonly advanced: AdvancedSettings
}

export interface DetectionSettings {
  readonly intervalMs: number
  readonly sensitivity: SensitivityLevel
}

export interface SmoothingSettings {
  readonly monitorWindow: number
  readonly previewWindow: number
}

export interface CalibrationSettings {
  readonly totalSamples: number
  readonly minSamples: number
}

export interface ReminderSettings {
  readonly enabled: boolean
  readonly sustainedMs: number
  readonly cooldownMs: number
}

export interface AdvancedSettings {
  readonly debugMode: boolean
  readonly customThresholds?: CustomThresholdOverrides
}

export const DEFAULT_SETTINGS: EngineSettings = {
  detection: {
    intervalMs: 500,
    sensitivity: 'medium',
  },
  smoothing: {
    monitorWindow: 20,
    previewWindow: 30,
  },
  calibration: {
    totalSamples: 45,
    minSamples: 10,
  },
  reminder: {
    enabled: true,
    sustainedMs: 5000,
    cooldownMs: 45_000,
  },
  advanced: {
    debugMode: false,
  },
}

import Conf from 'conf'
import { isSensitivityLevel } from '@/services/posture-analysis/thresholds'
import type { CustomThresholdOverrides } from '@/services/posture-analysis/thresholds'
import type { IssueCategory } from '@/services/posture-analysis/posture-types'
import { DEFAULT_SETTINGS, type EngineSettings } from '@/types/settings'

interface StoreSchema {
  settings: EngineSettings
}

export interface ConfigStoreOptions {
  readonly cwd?: string
}

type Section = Readonly<Record<string, unknown>>

const THRESHOLD_CATEGORIES: readonly IssueCategory[] = [
  'headDrop',
  'slouch',
  'lean',
  'shoulderTilt',
  'forwardLean',
]

function isSection(value: unknown): value is Section {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isPositiveNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0
}

function isNonNegativeNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0
}

function isPositiveInteger(value: unknown): value is number {
  return Number.isInteger(value) && isPositiveNumber(value)
}

function isBoolean(value: unknown): value is boolean {
  return typeof value === 'boolean'
}

function sectionOf(stored: Section, name: string): Section {
  const value = stored[name]
  if (value === undefined) return {}
  if (!isSection(value)) {
    console.warn(`[ConfigStore] Ignoring invalid settings section: ${name}`)
    return {}
  }
  return value
}

function field<T>(
  section: Section,
  path: string,
  check: (value: unknown) => value is T,
  fallback: T,
): T {
  const key = path.slice(path.lastIndexOf('.') + 1)
  const value = section[key]
  if (value === undefined) return fallback
  if (!check(value)) {
    console.warn(`[ConfigStore] Ignoring invalid setting ${path}:`, value)
    return fallback
  }
  return value
}

function thresholdOverrides(section: Section): CustomThresholdOverrides | undefined {
  const raw = section.customThresholds
  if (raw === undefined) return undefined
  if (!isSection(raw)) {
    console.warn('[ConfigStore] Ignoring invalid setting advanced.customThresholds:', raw)
    return undefined
  }

  const overrides: Partial<Record<IssueCategory, number>> = {}
  for (const category of THRESHOLD_CATEGORIES) {
    const value = raw[category]
    if (value === undefined) continue
    if (isPositiveNumber(value)) {
      overrides[category] = value
    } else {
      console.warn(`[ConfigStore] Ignoring invalid setting advanced.customThresholds.${category}:`, value)
    }
  }
  return overrides
}

/**
 * Merge whatever is on disk over the defaults field by field. Missing or
 * invalid fields keep their default value.
 */
export function normalizeSettings(stored: unknown): EngineSettings {
  if (!isSection(stored)) return DEFAULT_SETTINGS

  const detection = sectionOf(stored, 'detection')
  const smoothing = sectionOf(stored, 'smoothing')
  const calibration = sectionOf(stored, 'calibration')
  const reminder = sectionOf(stored, 'reminder')
  const advanced = sectionOf(stored, 'advanced')
  const defaults = DEFAULT_SETTINGS
  const customThresholds = thresholdOverrides(advanced)

  return {
    detection: {
      intervalMs: field(detection, 'detection.intervalMs', isPositiveNumber, defaults.detection.intervalMs),
      sensitivity: field(detection, 'detection.sensitivity', isSensitivityLevel, defaults.detection.sensitivity),
    },
    smoothing: {
      monitorWindow: field(smoothing, 'smoothing.monitorWindow', isPositiveInteger, defaults.smoothing.monitorWindow),
      previewWindow: field(smoothing, 'smoothing.previewWindow', isPositiveInteger, defaults.smoothing.previewWindow),
    },
    calibration: {
      totalSamples: field(calibration, 'calibration.totalSamples', isPositiveInteger, defaults.calibration.totalSamples),
      minSamples: field(calibration, 'calibration.minSamples', isPositiveInteger, defaults.calibration.minSamples),
    },
    reminder: {
      enabled: field(reminder, 'reminder.enabled', isBoolean, defaults.reminder.enabled),
      sustainedMs: field(reminder, 'reminder.sustainedMs', isNonNegativeNumber, defaults.reminder.sustainedMs),
      cooldownMs: field(reminder, 'reminder.cooldownMs', isNonNegativeNumber, defaults.reminder.cooldownMs),
    },
    advanced: {
      debugMode: field(advanced, 'advanced.debugMode', isBoolean, defaults.advanced.debugMode),
      ...(customThresholds === undefined ? {} : { customThresholds }),
    },
  }
}

export class ConfigStore {
  private readonly store: Conf<StoreSchema>

  constructor(options: ConfigStoreOptions = {}) {
    this.store = new Conf<StoreSchema>({
      projectName: 'posture-sentinel',
      configName: 'settings',
      cwd: options.cwd,
      defaults: {
        settings: DEFAULT_SETTINGS,
      },
      clearInvalidConfig: true,
    })
  }

  /** Stored settings, completed and checked against the defaults. */
  getSettings(): EngineSettings {
    const stored: unknown = this.store.get('settings')
    return normalizeSettings(stored)
  }

  setSettings(settings: EngineSettings): void {
    this.store.set('settings', normalizeSettings(settings))
  }

  getPath(): string {
    return this.store.path
  }

  clear(): void {
    this.store.clear()
  }
}

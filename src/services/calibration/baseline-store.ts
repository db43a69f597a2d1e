import Conf from 'conf'
import { homedir } from 'node:os'
import { resolve } from 'node:path'
import type { Baseline, MetricName } from '@/services/posture-analysis/posture-types'
import { isMetricName } from '@/services/posture-analysis/posture-types'

export const DEFAULT_BASELINE_NAME = 'posture_calibration'

export interface BaselineStoreOptions {
  // directory holding the record; defaults to the home directory
  readonly cwd?: string
  readonly configName?: string
}

type BaselineRecord = Record<string, unknown>

/**
 * Validate a stored record. Anything other than a non-empty flat map of
 * known metric names to finite numbers is treated as no calibration.
 */
export function parseBaseline(record: BaselineRecord): Baseline | null {
  const baseline: Partial<Record<MetricName, number>> = {}
  const entries = Object.entries(record)
  if (entries.length === 0) return null

  for (const [key, value] of entries) {
    if (!isMetricName(key) || typeof value !== 'number' || !Number.isFinite(value)) {
      return null
    }
    baseline[key] = value
  }
  return baseline
}

export class BaselineStore {
  private readonly cwd: string
  private readonly configName: string
  private store: Conf<BaselineRecord> | null = null

  constructor(options: BaselineStoreOptions = {}) {
    this.cwd = options.cwd ?? homedir()
    this.configName = options.configName ?? DEFAULT_BASELINE_NAME
  }

  /** Returns null when uncalibrated or when the record cannot be trusted. */
  load(): Baseline | null {
    let record: BaselineRecord
    try {
      record = this.open().store
    } catch (error) {
      console.warn('[BaselineStore] Failed to read baseline:', error)
      return null
    }

    const baseline = parseBaseline(record)
    if (baseline === null && Object.keys(record).length > 0) {
      console.warn(`[BaselineStore] Ignoring malformed baseline at ${this.path}`)
    }
    return baseline
  }

  /** Replaces the whole record; the previous file survives a failed write. */
  save(baseline: Baseline): boolean {
    if (parseBaseline({ ...baseline }) === null) {
      console.warn('[BaselineStore] Refusing to save an empty or non-finite baseline')
      return false
    }

    try {
      this.open().store = { ...baseline }
      return true
    } catch (error) {
      console.error('[BaselineStore] Failed to save baseline:', error)
      return false
    }
  }

  isCalibrated(): boolean {
    return this.load() !== null
  }

  clear(): boolean {
    try {
      this.open().clear()
      return true
    } catch (error) {
      console.error('[BaselineStore] Failed to clear baseline:', error)
      return false
    }
  }

  get path(): string {
    return resolve(this.cwd, `${this.configName}.json`)
  }

  // conf reads the file on construction, so opening can fail like any read
  private open(): Conf<BaselineRecord> {
    if (this.store === null) {
      this.store = new Conf<BaselineRecord>({
        cwd: this.cwd,
        configName: this.configName,
        clearInvalidConfig: true,
      })
    }
    return this.store
  }
}

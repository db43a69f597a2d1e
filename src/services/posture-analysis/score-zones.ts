export type ScoreZone = 'good' | 'warning' | 'bad'

// A score strictly above `good` is good, strictly above `warning` is a warning
export interface ZoneBands {
  readonly good: number
  readonly warning: number
}

export const MONITOR_ZONE_BANDS: ZoneBands = { good: 80, warning: 50 }
export const PREVIEW_ZONE_BANDS: ZoneBands = { good: 70, warning: 40 }

export function scoreZone(score: number, bands: ZoneBands = MONITOR_ZONE_BANDS): ScoreZone {
  if (score > bands.good) return 'good'
  if (score > bands.warning) return 'warning'
  return 'bad'
}

import type { PostureIssue } from '@/services/posture-analysis/posture-types'

export interface ReminderConfig {
  readonly enabled: boolean
  readonly sustainedMs: number
  readonly cooldownMs: number
}

export interface AlertContent {
  readonly title: string
  readonly advice: string
}

export interface PostureAlert {
  readonly issue: PostureIssue
  readonly score: number
  readonly content: AlertContent
  readonly timestamp: number
}

// What the manager needs from each monitor reading
export interface PostureObservation {
  readonly score: number
  readonly issues: readonly PostureIssue[]
  readonly timestamp: number
}

export interface ReminderCallbacks {
  readonly onAlert: (alert: PostureAlert) => void
  readonly onRecovered?: () => void
}

export type ReminderState = 'idle' | 'delaying' | 'triggered'

export const DEFAULT_REMINDER_CONFIG: ReminderConfig = {
  enabled: true,
  sustainedMs: 5000,
  cooldownMs: 45_000,
} as const

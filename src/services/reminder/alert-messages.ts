import type { IssueLabel, PostureIssue } from '@/services/posture-analysis/posture-types'
import type { AlertContent } from './reminder-types'

const ALERT_MAP: Readonly<Record<IssueLabel, AlertContent>> = {
  HEAD_DROP: {
    title: 'Head dropping',
    advice: 'Chin up!',
  },
  SLOUCH: {
    title: 'Slouching',
    advice: 'Sit up straight!',
  },
  LEAN_LEFT: {
    title: 'Leaning left',
    advice: 'Center up!',
  },
  LEAN_RIGHT: {
    title: 'Leaning right',
    advice: 'Center up!',
  },
  SHOULDER_TILT: {
    title: 'Shoulders uneven',
    advice: 'Level out!',
  },
  FORWARD_LEAN: {
    title: 'Leaning forward',
    advice: 'Sit back!',
  },
}

const GENERAL_ALERT: AlertContent = {
  title: 'Posture check',
  advice: 'Fix your posture!',
}

/** Content for the worst issue; issues arrive sorted worst first. */
export function getAlertContent(issues: readonly PostureIssue[]): AlertContent {
  if (issues.length === 0) {
    return GENERAL_ALERT
  }
  return ALERT_MAP[issues[0].label]
}

export function formatSpokenAlert(content: AlertContent): string {
  return `Hey! ${content.advice}`
}

export function formatAlertLine(content: AlertContent): string {
  return `${content.title} — ${content.advice}`
}

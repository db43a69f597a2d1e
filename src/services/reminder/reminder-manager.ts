import type {
  PostureObservation,
  ReminderCallbacks,
  ReminderConfig,
  ReminderState,
} from './reminder-types'
import { getAlertContent } from './alert-messages'

/**
 * Alert policy over successive readings. Bad posture has to persist for
 * `sustainedMs` before the first alert, and alerts are at least `cooldownMs`
 * apart. Time comes from the observations, not from timers.
 */
export class ReminderManager {
  private config: ReminderConfig
  private readonly callbacks: ReminderCallbacks
  private state: ReminderState = 'idle'
  private badSince: number | null = null
  private lastAlertAt = Number.NEGATIVE_INFINITY

  constructor(config: ReminderConfig, callbacks: ReminderCallbacks) {
    this.config = config
    this.callbacks = callbacks
  }

  onPostureUpdate(observation: PostureObservation): void {
    if (!this.config.enabled || observation.issues.length === 0) {
      this.handleGoodPosture()
      return
    }
    this.handleBadPosture(observation)
  }

  updateConfig(partial: Partial<ReminderConfig>): void {
    this.config = { ...this.config, ...partial }
  }

  getState(): ReminderState {
    return this.state
  }

  dispose(): void {
    this.state = 'idle'
    this.badSince = null
    this.lastAlertAt = Number.NEGATIVE_INFINITY
  }

  private handleGoodPosture(): void {
    switch (this.state) {
      case 'idle':
        break
      case 'delaying':
        this.state = 'idle'
        break
      case 'triggered':
        this.state = 'idle'
        this.callbacks.onRecovered?.()
        break
    }
    this.badSince = null
  }

  private handleBadPosture(observation: PostureObservation): void {
    const now = observation.timestamp

    switch (this.state) {
      case 'idle':
        this.state = 'delaying'
        this.badSince = now
        break
      case 'delaying':
      case 'triggered':
        break
    }

    const since = this.badSince ?? now
    const sustained = now - since >= this.config.sustainedMs
    const cooledDown = now - this.lastAlertAt >= this.config.cooldownMs
    if (sustained && cooledDown) {
      this.trigger(observation)
    }
  }

  private trigger(observation: PostureObservation): void {
    this.state = 'triggered'
    this.lastAlertAt = observation.timestamp
    this.callbacks.onAlert({
      issue: observation.issues[0],
      score: observation.score,
      content: getAlertContent(observation.issues),
      timestamp: observation.timestamp,
    })
  }
}

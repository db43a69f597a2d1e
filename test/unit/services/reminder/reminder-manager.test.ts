import { describe, it, expect, vi, beforeEach } from 'vitest'
import { ReminderManager } from '@/services/reminder/reminder-manager'
import {
  DEFAULT_REMINDER_CONFIG,
  type PostureObservation,
  type ReminderCallbacks,
  type ReminderConfig,
} from '@/services/reminder/reminder-types'
import type { PostureIssue } from '@/services/posture-analysis/posture-types'

function createMockCallbacks(): ReminderCallbacks {
  return {
    onAlert: vi.fn(),
    onRecovered: vi.fn(),
  }
}

function createConfig(overrides?: Partial<ReminderConfig>): ReminderConfig {
  return {
    ...DEFAULT_REMINDER_CONFIG,
    ...overrides,
  }
}

const slouchIssue: PostureIssue = {
  label: 'SLOUCH',
  category: 'slouch',
  deviation: 0.15,
  severity: 0.8,
  penalty: 28,
  message: 'Slouching',
}

const leanIssue: PostureIssue = {
  label: 'LEAN_LEFT',
  category: 'lean',
  deviation: 0.05,
  severity: 0.5,
  penalty: 10,
  message: 'Leaning left',
}

function badPosture(
  timestamp: number,
  issues: readonly PostureIssue[] = [slouchIssue],
): PostureObservation {
  return { score: 62, issues, timestamp }
}

function goodPosture(timestamp: number): PostureObservation {
  return { score: 97, issues: [], timestamp }
}

describe('ReminderManager', () => {
  let callbacks: ReminderCallbacks
  let config: ReminderConfig

  beforeEach(() => {
    callbacks = createMockCallbacks()
    config = createConfig()
  })

  describe('initial state', () => {
    it('should start in idle state', () => {
      const manager = new ReminderManager(config, callbacks)
      expect(manager.getState()).toBe('idle')
    })
  })

  describe('normal trigger flow', () => {
    it('should transition to delaying when receiving bad posture', () => {
      const manager = new ReminderManager(config, callbacks)

      manager.onPostureUpdate(badPosture(0))

      expect(manager.getState()).toBe('delaying')
      expect(callbacks.onAlert).not.toHaveBeenCalled()
    })

    it('should not alert before the sustained duration', () => {
      const manager = new ReminderManager(config, callbacks)

      manager.onPostureUpdate(badPosture(1000))
      manager.onPostureUpdate(badPosture(5999))

      expect(manager.getState()).toBe('delaying')
      expect(callbacks.onAlert).not.toHaveBeenCalled()
    })

    it('should alert once bad posture has lasted the sustained duration', () => {
      const manager = new ReminderManager(config, callbacks)

      manager.onPostureUpdate(badPosture(1000))
      manager.onPostureUpdate(badPosture(6000, [slouchIssue, leanIssue]))

      expect(manager.getState()).toBe('triggered')
      expect(callbacks.onAlert).toHaveBeenCalledOnce()
      expect(callbacks.onAlert).toHaveBeenCalledWith({
        issue: slouchIssue,
        score: 62,
        content: { title: 'Slouching', advice: 'Sit up straight!' },
        timestamp: 6000,
      })
    })

    it('should alert on the first update when sustainedMs is 0', () => {
      const manager = new ReminderManager(createConfig({ sustainedMs: 0 }), callbacks)

      manager.onPostureUpdate(badPosture(0))

      expect(callbacks.onAlert).toHaveBeenCalledOnce()
    })
  })

  describe('cancel during delay', () => {
    it('should return to idle when posture becomes good during delay', () => {
      const manager = new ReminderManager(config, callbacks)

      manager.onPostureUpdate(badPosture(0))
      manager.onPostureUpdate(goodPosture(3000))
      manager.onPostureUpdate(badPosture(4000))
      manager.onPostureUpdate(badPosture(8000))

      expect(manager.getState()).toBe('delaying')
      expect(callbacks.onAlert).not.toHaveBeenCalled()
      expect(callbacks.onRecovered).not.toHaveBeenCalled()
    })
  })

  describe('recovery from triggered state', () => {
    it('should report recovery after an alert', () => {
      const manager = new ReminderManager(config, callbacks)

      manager.onPostureUpdate(badPosture(0))
      manager.onPostureUpdate(badPosture(5000))
      manager.onPostureUpdate(goodPosture(5500))

      expect(manager.getState()).toBe('idle')
      expect(callbacks.onRecovered).toHaveBeenCalledOnce()
    })
  })

  describe('cooldown', () => {
    it('should not re-alert within the cooldown while posture stays bad', () => {
      const manager = new ReminderManager(config, callbacks)

      manager.onPostureUpdate(badPosture(0))
      manager.onPostureUpdate(badPosture(5000))
      manager.onPostureUpdate(badPosture(20_000))
      manager.onPostureUpdate(badPosture(49_999))

      expect(callbacks.onAlert).toHaveBeenCalledOnce()
    })

    it('should re-alert every cooldown while posture stays bad', () => {
      const manager = new ReminderManager(config, callbacks)

      manager.onPostureUpdate(badPosture(0))
      manager.onPostureUpdate(badPosture(5000))
      manager.onPostureUpdate(badPosture(50_000))

      expect(callbacks.onAlert).toHaveBeenCalledTimes(2)
    })

    it('should keep the cooldown across a short recovery', () => {
      const manager = new ReminderManager(config, callbacks)

      manager.onPostureUpdate(badPosture(0))
      manager.onPostureUpdate(badPosture(5000))
      manager.onPostureUpdate(goodPosture(6000))
      manager.onPostureUpdate(badPosture(7000))
      manager.onPostureUpdate(badPosture(12_000))

      expect(callbacks.onAlert).toHaveBeenCalledOnce()
      expect(manager.getState()).toBe('delaying')
    })

    it('should forget the cooldown after dispose', () => {
      const manager = new ReminderManager(config, callbacks)

      manager.onPostureUpdate(badPosture(0))
      manager.onPostureUpdate(badPosture(5000))
      manager.dispose()
      expect(manager.getState()).toBe('idle')

      manager.onPostureUpdate(badPosture(6000))
      manager.onPostureUpdate(badPosture(11_000))

      expect(callbacks.onAlert).toHaveBeenCalledTimes(2)
    })
  })

  describe('configuration', () => {
    it('should treat every reading as good when disabled', () => {
      const manager = new ReminderManager(createConfig({ enabled: false }), callbacks)

      manager.onPostureUpdate(badPosture(0))
      manager.onPostureUpdate(badPosture(60_000))

      expect(manager.getState()).toBe('idle')
      expect(callbacks.onAlert).not.toHaveBeenCalled()
    })

    it('should apply a shorter sustained duration immediately', () => {
      const manager = new ReminderManager(config, callbacks)

      manager.onPostureUpdate(badPosture(0))
      manager.updateConfig({ sustainedMs: 1000 })
      manager.onPostureUpdate(badPosture(1000))

      expect(callbacks.onAlert).toHaveBeenCalledOnce()
    })

    it('should work without an onRecovered callback', () => {
      const onAlert = vi.fn()
      const manager = new ReminderManager(config, { onAlert })

      manager.onPostureUpdate(badPosture(0))
      manager.onPostureUpdate(badPosture(5000))
      expect(() => manager.onPostureUpdate(goodPosture(6000))).not.toThrow()
      expect(onAlert).toHaveBeenCalledOnce()
    })
  })
})

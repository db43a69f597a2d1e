/**
 * Replay recorded landmark frames through the posture engine.
 *
 * Usage:
 *   npm run replay -- calibrate <frames.json> [--baseline-dir <dir>]
 *   npm run replay -- monitor <frames.json> [--sensitivity low|medium|high] [--baseline-dir <dir>]
 *   npm run replay -- preview <frames.json> [--sensitivity low|medium|high] [--baseline-dir <dir>]
 *
 * Frames file: [{ "timestamp": ms, "pose": Landmark[], "face"?: Landmark[] }, ...]
 */

import { readFileSync } from 'node:fs'
import { parseArgs } from 'node:util'
import { parseLandmarkFrames } from '@/services/pose-detection/landmark-parser'
import type { LandmarkFrame } from '@/services/pose-detection/pose-types'
import { extractMetrics } from '@/services/posture-analysis/metric-extractor'
import { createPostureMonitor, type MonitorPurpose } from '@/services/posture-analysis/posture-monitor'
import { isSensitivityLevel } from '@/services/posture-analysis/thresholds'
import { BaselineStore } from '@/services/calibration/baseline-store'
import { CalibrationService } from '@/services/calibration/calibration-service'
import { InsufficientDataError } from '@/services/calibration/calibration-types'
import { ReminderManager } from '@/services/reminder/reminder-manager'
import { formatAlertLine } from '@/services/reminder/alert-messages'
import { ConfigStore } from '@/store/config-store'
import type { EngineSettings } from '@/types/settings'

function loadFrames(file: string): LandmarkFrame[] {
  const raw: unknown = JSON.parse(readFileSync(file, 'utf-8'))
  return parseLandmarkFrames(raw)
}

function calibrate(frames: readonly LandmarkFrame[], settings: EngineSettings, store: BaselineStore): number {
  const service = new CalibrationService(settings.calibration)
  for (const frame of frames.slice(0, settings.calibration.totalSamples)) {
    service.addSample(extractMetrics(frame))
  }

  const progress = service.getProgress()
  try {
    const { baseline, sampleCount } = service.computeBaseline()
    if (!store.save(baseline)) {
      console.error(`Could not write baseline to ${store.path}`)
      return 1
    }
    console.log(`Calibrated from ${sampleCount} frames (${progress.rejectedCount} rejected) -> ${store.path}`)
    return 0
  } catch (error) {
    if (error instanceof InsufficientDataError) {
      console.error("Couldn't detect your pose. Make sure the camera can see your face and shoulders.")
      console.error(error.message)
      return 1
    }
    throw error
  }
}

function replay(
  frames: readonly LandmarkFrame[],
  settings: EngineSettings,
  store: BaselineStore,
  purpose: MonitorPurpose,
): number {
  const baseline = store.load()
  if (baseline === null) {
    console.error('Please calibrate first: npm run replay -- calibrate <frames.json>')
    return 1
  }

  const monitor = createPostureMonitor(settings, baseline, purpose)
  const reminders = new ReminderManager(settings.reminder, {
    onAlert: (alert) => {
      console.log(`  ALERT score ${alert.score}%: ${formatAlertLine(alert.content)}`)
    },
    onRecovered: () => {
      console.log('  recovered')
    },
  })

  for (const frame of frames) {
    const reading = monitor.evaluate(frame, frame.timestamp)
    if (reading.status !== 'ok' || reading.score === null || reading.smoothedScore === null) {
      console.log(`${frame.timestamp}\t${reading.status}`)
      continue
    }
    const worst = reading.issues.length > 0 ? reading.issues[0].message : 'Looking good!'
    console.log(`${frame.timestamp}\t${reading.smoothedScore}%\t${reading.zone ?? '-'}\t${worst}`)
    reminders.onPostureUpdate({
      score: reading.smoothedScore,
      issues: reading.issues,
      timestamp: frame.timestamp,
    })
  }
  reminders.dispose()
  return 0
}

function main(): number {
  const { positionals, values } = parseArgs({
    allowPositionals: true,
    options: {
      sensitivity: { type: 'string' },
      'baseline-dir': { type: 'string' },
    },
  })

  const [command, file] = positionals
  if (file === undefined || (command !== 'calibrate' && command !== 'monitor' && command !== 'preview')) {
    console.error('Usage: replay-landmarks <calibrate|monitor|preview> <frames.json> [--sensitivity level] [--baseline-dir dir]')
    return 2
  }

  let settings = new ConfigStore().getSettings()
  if (values.sensitivity !== undefined) {
    if (!isSensitivityLevel(values.sensitivity)) {
      console.error(`Unknown sensitivity: ${values.sensitivity}`)
      return 2
    }
    settings = { ...settings, detection: { ...settings.detection, sensitivity: values.sensitivity } }
  }

  const store = new BaselineStore({ cwd: values['baseline-dir'] })
  const frames = loadFrames(file)

  if (command === 'calibrate') {
    return calibrate(frames, settings, store)
  }
  return replay(frames, settings, store, command)
}

process.exitCode = main()

import { Chalk } from 'chalk'
import { describe, expect, it } from 'vitest'

import { formatPortTable, formatPortTestReport, formatStatusLine } from '../src/node/status-line'
import { formatRuntime, lastUpdateText, summarizeStatus } from '../src/stores/flow-monitor-common'
import type { FlowMonitorHealth, LivenessSnapshot, PortTestReport } from '../src/types/flow-monitor'

const plain = new Chalk({ level: 0 })

function health(overrides: Partial<FlowMonitorHealth> = {}, liveness: Partial<LivenessSnapshot> = {}): FlowMonitorHealth {
  const status = overrides.status ?? 'connected-fresh'
  return {
    port: '/dev/ttyACM0',
    sessionId: 'session-1',
    status,
    liveness: {
      transport: status === 'disconnected' ? 'disconnected' : status === 'connecting' ? 'connecting' : 'connected',
      freshness: status === 'connected-stale' ? 'stale' : 'fresh',
      status,
      connectedAt: 1000,
      lastSampleAt: 2000,
      awaitingFirstSample: false,
      disconnectReason: null,
      ...liveness,
    },
    recordingPaused: false,
    points: 2,
    capacity: 500,
    acceptedSamples: 2,
    rejectedLines: 0,
    rejectionsByReason: {},
    discontinuities: 0,
    maxFlowRateLpm: 2.5,
    latestFlowRateLpm: 2.48,
    latestVolumeL: 0.0834,
    latestStatusTag: 'CONNECTED',
    lastSampleAgeMs: 400,
    ...overrides,
  }
}

describe('summarizeStatus', () => {
  it('reports a healthy stream', () => {
    expect(summarizeStatus(health())).toEqual({
      connection: 'Connected (/dev/ttyACM0)',
      data: 'Receiving',
      sensor: 'CONNECTED',
      tone: 'ok',
    })
  })

  it('shows the silence duration when stale', () => {
    expect(summarizeStatus(health({ status: 'connected-stale', lastSampleAgeMs: 6200 }))).toMatchObject({
      data: 'Stale (6.2s)',
      tone: 'warn',
    })
  })

  it('waits for the first sample', () => {
    const waiting = health(
      { lastSampleAgeMs: null, latestStatusTag: null },
      { lastSampleAt: null, awaitingFirstSample: true }
    )
    expect(summarizeStatus(waiting)).toMatchObject({ data: 'Waiting...', sensor: '-' })
  })

  it('reports no connection', () => {
    expect(summarizeStatus(health({ status: 'disconnected', port: null }))).toEqual({
      connection: 'Disconnected',
      data: 'No connection',
      sensor: 'CONNECTED',
      tone: 'error',
    })
  })
})

describe('formatStatusLine', () => {
  it('joins the readings', () => {
    expect(formatStatusLine(health(), plain, 91_000)).toBe(
      'Connected (/dev/ttyACM0) | Data: Receiving | Sensor: CONNECTED | Flow: 2.48 L/min | Total: 0.083 L | ' +
        'Points: 2/500 | Last Update: 0.4s ago | Runtime: 1.5m'
    )
  })

  it('drops the runtime while disconnected', () => {
    const line = formatStatusLine(
      health({ status: 'disconnected', port: null, lastSampleAgeMs: null }, { connectedAt: null }),
      plain
    )
    expect(line.endsWith(' | Points: 2/500 | Last Update: n/a')).toBe(true)
  })

  it('adds rejected and paused markers', () => {
    const line = formatStatusLine(health({ rejectedLines: 3, recordingPaused: true }), plain)
    expect(line.endsWith(' | Points: 2/500 | Rejected: 3 | PAUSED')).toBe(true)
  })

  it('prints dashes before any reading', () => {
    const line = formatStatusLine(health({ latestFlowRateLpm: null, latestVolumeL: null }), plain)
    expect(line).toContain('Flow: - L/min | Total: - L')
  })
})

describe('lastUpdateText', () => {
  it('reports the sample age or n/a', () => {
    expect(lastUpdateText(health({ lastSampleAgeMs: 1240 }))).toBe('1.2s ago')
    expect(lastUpdateText(health({ lastSampleAgeMs: null }))).toBe('n/a')
  })
})

describe('formatRuntime', () => {
  it('scales from seconds to hours', () => {
    expect(formatRuntime(42_000)).toBe('42s')
    expect(formatRuntime(210_000)).toBe('3.5m')
    expect(formatRuntime(4_320_000)).toBe('1.2h')
  })
})

describe('formatPortTestReport', () => {
  const passed: PortTestReport = {
    port: '/dev/ttyACM0',
    baudRate: 9600,
    verdict: 'pass',
    acceptedSamples: 1,
    rejectedLines: 2,
    samples: [
      {
        hostTimestampMs: 1000,
        deviceTimeMs: 1000,
        rawFlowRateLpm: 2.5,
        smoothedFlowRateLpm: 2.5,
        cumulativeVolumeL: 0.0417,
        statusTag: 'CONNECTED',
      },
    ],
    error: null,
  }

  it('lists the frames, the counts and the verdict', () => {
    expect(formatPortTestReport(passed, plain).split('\n')).toEqual([
      'Port test: /dev/ttyACM0 @ 9600 baud',
      '  1000 ms | Flow: 2.500 L/min | Volume: 0.0417 L | Status: CONNECTED',
      'Valid frames: 1 | Noise: 2',
      'PASSED: the sensor is sending valid telemetry',
    ])
  })

  it('explains a partial result', () => {
    const partial: PortTestReport = { ...passed, verdict: 'partial', acceptedSamples: 0, samples: [] }
    expect(formatPortTestReport(partial, plain).split('\n').slice(1)).toEqual([
      'Valid frames: 0 | Noise: 2',
      'PARTIAL: the port sends data but no valid frames; check the firmware and sensor wiring',
    ])
  })

  it('shows why the port failed', () => {
    const failed: PortTestReport = {
      ...passed,
      verdict: 'fail',
      acceptedSamples: 0,
      rejectedLines: 0,
      samples: [],
      error: 'No data received from /dev/ttyACM0 within 10000 ms',
    }
    expect(formatPortTestReport(failed, plain)).toBe(
      'Port test: /dev/ttyACM0 @ 9600 baud\nFAILED: No data received from /dev/ttyACM0 within 10000 ms'
    )
  })
})

describe('formatPortTable', () => {
  it('numbers the ports', () => {
    expect(
      formatPortTable(
        [
          {
            path: '/dev/ttyACM0',
            description: 'Arduino',
            manufacturer: 'Arduino',
            serialNumber: null,
            vendorId: '2341',
            productId: null,
            kind: 'arduino',
            priority: 1,
          },
        ],
        plain
      )
    ).toBe('1. /dev/ttyACM0         | arduino    | Arduino')
  })

  it('says so when nothing is attached', () => {
    expect(formatPortTable([], plain)).toBe('No serial ports found')
  })
})

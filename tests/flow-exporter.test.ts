import { mkdtemp, readdir, readFile, rm } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

import {
  defaultExportFileName,
  EXPORT_HEADER,
  ExportError,
  exportSeriesCsv,
  formatSeriesCsv,
} from '../src/node/services/flow-exporter'
import type { SmoothedPoint } from '../src/types/flow-monitor'

const POINTS: SmoothedPoint[] = [
  {
    hostTimestampMs: 1_700_000_000_000,
    deviceTimeMs: 1000,
    rawFlowRateLpm: 2.5,
    smoothedFlowRateLpm: 2.5,
    cumulativeVolumeL: 0.0417,
    statusTag: 'CONNECTED',
  },
  {
    hostTimestampMs: 1_700_000_001_250,
    deviceTimeMs: 2000,
    rawFlowRateLpm: 2.48,
    smoothedFlowRateLpm: 2.49,
    cumulativeVolumeL: 0.0834,
    statusTag: '',
  },
]

describe('formatSeriesCsv', () => {
  it('writes the header and one row per point', () => {
    expect(formatSeriesCsv(POINTS)).toBe(
      'Time(s),FlowRate(L/min),TotalVolume(L),Status\n' +
        '0.000,2.500,0.0417,CONNECTED\n' +
        '1.250,2.480,0.0834,UNKNOWN\n'
    )
  })

  it('quotes status tags that would break the row', () => {
    const csv = formatSeriesCsv([{ ...POINTS[0], statusTag: 'A,"B"' }])
    expect(csv.split('\n')[1]).toBe('0.000,2.500,0.0417,"A,""B"""')
  })

  it('writes only the header for an empty series', () => {
    expect(formatSeriesCsv([])).toBe(`${EXPORT_HEADER}\n`)
  })
})

describe('exportSeriesCsv', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'flow-export-'))
    vi.spyOn(console, 'log').mockImplementation(() => undefined)
    vi.spyOn(console, 'error').mockImplementation(() => undefined)
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('writes the file and leaves no temporary behind', async () => {
    const target = join(dir, 'out.csv')
    const summary = await exportSeriesCsv(POINTS, target)

    const content = await readFile(target, 'utf-8')
    expect(content).toBe(formatSeriesCsv(POINTS))
    expect(summary).toEqual({ path: target, rows: 2, bytes: Buffer.byteLength(content) })
    expect(await readdir(dir)).toEqual(['out.csv'])
  })

  it('refuses an empty series', async () => {
    await expect(exportSeriesCsv([], join(dir, 'empty.csv'))).rejects.toMatchObject({
      name: 'ExportError',
      code: 'empty-series',
    })
    expect(await readdir(dir)).toEqual([])
  })

  it('reports filesystem failures as io-error', async () => {
    const target = join(dir, 'missing', 'out.csv')

    const error = await exportSeriesCsv(POINTS, target).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(ExportError)
    expect(error).toMatchObject({ code: 'io-error' })
    expect(await readdir(dir)).toEqual([])
  })
})

describe('defaultExportFileName', () => {
  it('uses whole unix seconds', () => {
    expect(defaultExportFileName(1_700_000_000_999)).toBe('flow_data_1700000000.csv')
  })
})

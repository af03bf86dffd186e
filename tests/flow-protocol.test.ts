/**
 * Unit tests for the flow sensor frame parser and line tokenizer
 */

import { describe, expect, it, vi } from 'vitest'

import {
  classifyStatusTag,
  FlowLineTokenizer,
  LINE_BUFFER_KEEP,
  MAX_LINE_BUFFER,
  parseFlowFrame,
} from '../src/node/services/flow-protocol'

describe('parseFlowFrame', () => {
  it('parses a four-field frame', () => {
    const result = parseFlowFrame('1000,2.500,0.0417,CONNECTED')

    expect(result).toEqual({
      ok: true,
      sample: {
        deviceTimeMs: 1000,
        flowRateLpm: 2.5,
        cumulativeVolumeL: 0.0417,
        statusTag: 'CONNECTED',
        status: 'active',
      },
    })
  })

  it('parses the optional pulse counters', () => {
    const result = parseFlowFrame('4721,1.2000,0.00020,CONNECTED,9,15')

    expect(result.ok).toBe(true)
    if (result.ok) {
      expect(result.sample.pulseCount).toBe(9)
      expect(result.sample.totalPulses).toBe(15)
      expect(result.sample.cumulativeVolumeL).toBe(0.0002)
    }
  })

  it('trims whitespace around fields and the line', () => {
    const result = parseFlowFrame('  2000 , 2.48 , 0.0834 , WAITING \r')

    expect(result.ok).toBe(true)
    if (result.ok) {
      expect(result.sample.deviceTimeMs).toBe(2000)
      expect(result.sample.statusTag).toBe('WAITING')
      expect(result.sample.status).toBe('awaiting-flow')
    }
  })

  it('ignores fields past the sixth', () => {
    const result = parseFlowFrame('3000,0.5,0.1,FLOWING,1,2,extra,stuff')

    expect(result.ok).toBe(true)
    if (result.ok) {
      expect(result.sample.totalPulses).toBe(2)
    }
  })

  it('rejects empty lines', () => {
    expect(parseFlowFrame('   ')).toEqual({ ok: false, reason: 'empty', detail: 'Empty line' })
  })

  it('rejects frames with too few fields', () => {
    expect(parseFlowFrame('1000,2.5,0.04')).toEqual({
      ok: false,
      reason: 'field-count',
      detail: 'Expected at least 4 fields, got 3',
    })
  })

  it('accepts three fields when the firmware omits the status tag', () => {
    const result = parseFlowFrame('1000,2.5,0.04', { minFieldCount: 3 })

    expect(result.ok).toBe(true)
    if (result.ok) {
      expect(result.sample.statusTag).toBe('')
      expect(result.sample.status).toBe('unknown')
    }
  })

  it('never requires fewer than the three numeric fields', () => {
    const result = parseFlowFrame('1000,2.5', { minFieldCount: 1 })

    expect(result).toEqual({ ok: false, reason: 'field-count', detail: 'Expected at least 3 fields, got 2' })
  })

  it('rejects banner text as a field-count error', () => {
    const result = parseFlowFrame('Flow sensor ready')
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.reason).toBe('field-count')
    }
  })

  it('rejects non-numeric values', () => {
    expect(parseFlowFrame('3000,bad,data,X')).toEqual({
      ok: false,
      reason: 'invalid-number',
      detail: "Invalid flow rate: 'bad'",
    })
    expect(parseFlowFrame('1.5,2.5,0.1,CONNECTED')).toEqual({
      ok: false,
      reason: 'invalid-number',
      detail: "Invalid device time: '1.5'",
    })
    expect(parseFlowFrame('1000,2.5,1e3,CONNECTED')).toEqual({
      ok: false,
      reason: 'invalid-number',
      detail: "Invalid cumulative volume: '1e3'",
    })
    expect(parseFlowFrame('1000,2.5,0.1,CONNECTED,x')).toEqual({
      ok: false,
      reason: 'invalid-number',
      detail: "Invalid pulse count: 'x'",
    })
  })

  it('rejects negative flow and volume', () => {
    expect(parseFlowFrame('1000,-0.1,0.1,CONNECTED')).toEqual({
      ok: false,
      reason: 'negative-flow',
      detail: 'Negative flow rate: -0.1 L/min',
    })
    expect(parseFlowFrame('1000,0.1,-2,CONNECTED')).toEqual({
      ok: false,
      reason: 'negative-volume',
      detail: 'Negative cumulative volume: -2 L',
    })
  })

  it('reports an invalid number before a negative one', () => {
    const result = parseFlowFrame('1000,-1,abc,CONNECTED')
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.reason).toBe('invalid-number')
    }
  })

  it('supports a custom delimiter', () => {
    const result = parseFlowFrame('1000;2.5;0.04;ACTIVE', { delimiter: ';' })
    expect(result.ok).toBe(true)
  })
})

describe('classifyStatusTag', () => {
  it('maps known tags case-insensitively', () => {
    expect(classifyStatusTag('connected')).toBe('active')
    expect(classifyStatusTag('NO_FLOW')).toBe('awaiting-flow')
    expect(classifyStatusTag('Sensor_Error')).toBe('disconnected')
  })

  it('keeps unknown tags as unknown', () => {
    expect(classifyStatusTag('CALIBRATING')).toBe('unknown')
  })
})

describe('FlowLineTokenizer', () => {
  it('splits chunks into lines and strips CR', () => {
    const tokenizer = new FlowLineTokenizer()

    expect(tokenizer.feed(Buffer.from('1000,2.5,0.04,CONNECTED\r\n2000,2.'))).toEqual(['1000,2.5,0.04,CONNECTED'])
    expect(tokenizer.getBufferSize()).toBe(7)
    expect(tokenizer.feed(Buffer.from('4,0.08,CONNECTED\r\n'))).toEqual(['2000,2.4,0.08,CONNECTED'])
    expect(tokenizer.getBufferSize()).toBe(0)
  })

  it('skips blank lines', () => {
    const tokenizer = new FlowLineTokenizer()
    expect(tokenizer.feed(Buffer.from('\r\n\r\nA\n\n'))).toEqual(['A'])
  })

  it('drops the partial line on clear()', () => {
    const tokenizer = new FlowLineTokenizer()
    tokenizer.feed(Buffer.from('partial'))
    tokenizer.clear()

    expect(tokenizer.feed(Buffer.from('next\n'))).toEqual(['next'])
  })

  it('trims the buffer when no terminator arrives', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined)
    const tokenizer = new FlowLineTokenizer()

    tokenizer.feed(Buffer.from('x'.repeat(MAX_LINE_BUFFER + 1)))

    expect(tokenizer.getBufferSize()).toBe(LINE_BUFFER_KEEP)
    expect(warn).toHaveBeenCalledTimes(1)
  })
})

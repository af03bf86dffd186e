/**
 * Flow Sensor Frame Protocol
 *
 * The flow sensor firmware prints one CSV-like line per measurement interval:
 *
 *   device_time_ms,flow_rate_Lpm,cumulative_volume_L,status_tag[,current_pulses,total_pulses]
 *
 * Example: "4721,1.2000,0.00020,CONNECTED,9,15"
 *
 * ARCHITECTURE:
 * - FlowLineTokenizer splits the raw byte stream into complete lines
 * - parseFlowFrame() validates one line and maps it to a typed sample
 * - Startup banner text ("System ready", headers, separators) is not a transport error;
 *   it simply fails validation and is counted as a rejected line
 *
 * parseFlowFrame() is pure and never throws: rejection is a value, not an exception.
 */

import type { SensorStatus } from '@/types/flow-monitor'

// ============================================================================
// Protocol Constants
// ============================================================================

/** Line terminator emitted by the firmware (println → CRLF); CR is stripped */
export const LINE_TERMINATOR = '\n'

/** Field separator */
export const FIELD_DELIMITER = ','

/** Required fields: time, flow, volume, status */
export const DEFAULT_MIN_FIELD_COUNT = 4

/** Time, flow and volume can never be optional */
export const NUMERIC_FIELD_COUNT = 3

/** Tokenizer garbage limit (chars without a terminator) */
export const MAX_LINE_BUFFER = 4096

/** Tokenizer keeps this tail after an overflow */
export const LINE_BUFFER_KEEP = 512

/** Status tag written to exports when the device sent an empty one */
export const UNKNOWN_STATUS_TAG = 'UNKNOWN'

/**
 * Known firmware status tags. Lookup is case-insensitive.
 */
export const KNOWN_STATUS_TAGS: Readonly<Record<string, SensorStatus>> = {
  WAITING: 'awaiting-flow',
  NO_FLOW: 'awaiting-flow',
  CONNECTED: 'active',
  FLOWING: 'active',
  ACTIVE: 'active',
  DISCONNECTED: 'disconnected',
  SENSOR_ERROR: 'disconnected',
}

// ============================================================================
// Regular Expressions for Parsing
// ============================================================================

/** Unsigned decimal integer (device time, pulse counters) */
export const RE_UNSIGNED_INT = /^\d+$/

/** Plain decimal number, optionally signed: "2.5", "-0.1", ".75", "12." */
export const RE_DECIMAL = /^[+-]?(?:\d+\.?\d*|\.\d+)$/

// ============================================================================
// Type Definitions
// ============================================================================

/**
 * Validated telemetry sample.
 */
export interface FlowSample {
  deviceTimeMs: number
  flowRateLpm: number
  cumulativeVolumeL: number
  statusTag: string
  status: SensorStatus
  pulseCount?: number
  totalPulses?: number
}

export type FrameRejectReason = 'empty' | 'field-count' | 'invalid-number' | 'negative-flow' | 'negative-volume'

/**
 * Rejection reasons assigned by the acquisition loop after parsing succeeded.
 */
export type SessionRejectReason = 'volume-regressed'

export type RejectReason = FrameRejectReason | SessionRejectReason

export type FrameParseResult =
  | {
      ok: true
      sample: FlowSample
    }
  | {
      ok: false
      reason: FrameRejectReason
      detail: string
    }

export interface FrameParseOptions {
  /** Minimum number of fields (firmware contract; older sketches omit pulse counts) */
  minFieldCount?: number
  delimiter?: string
}

// ============================================================================
// Frame Parsing
// ============================================================================

/**
 * Classify a raw status tag. Unknown tags are kept rather than rejected so newer
 * firmware can introduce states without breaking ingestion.
 * @param tag
 */
export function classifyStatusTag(tag: string): SensorStatus {
  return KNOWN_STATUS_TAGS[tag.toUpperCase()] ?? 'unknown'
}

function reject(reason: FrameRejectReason, detail: string): FrameParseResult {
  return { ok: false, reason, detail }
}

function parseUnsignedInt(field: string): number | null {
  if (!RE_UNSIGNED_INT.test(field)) return null
  const value = Number(field)
  return Number.isSafeInteger(value) ? value : null
}

function parseDecimal(field: string): number | null {
  if (!RE_DECIMAL.test(field)) return null
  const value = Number(field)
  return Number.isFinite(value) ? value : null
}

/**
 * Parse one line from the device.
 *
 * Expected format: <time_ms>,<flow>,<volume>,<status>[,<pulses>,<total_pulses>]
 * @param line - Complete line (terminator may or may not be present)
 * @param options - Field count / delimiter overrides
 * @returns Either the validated sample or the rejection reason
 */
export function parseFlowFrame(line: string, options: FrameParseOptions = {}): FrameParseResult {
  const minFieldCount = Math.max(options.minFieldCount ?? DEFAULT_MIN_FIELD_COUNT, NUMERIC_FIELD_COUNT)
  const delimiter = options.delimiter ?? FIELD_DELIMITER

  const trimmed = line.trim()
  if (!trimmed) {
    return reject('empty', 'Empty line')
  }

  const fields = trimmed.split(delimiter).map((field) => field.trim())
  if (fields.length < minFieldCount) {
    return reject('field-count', `Expected at least ${minFieldCount} fields, got ${fields.length}`)
  }

  const [timeField, flowField, volumeField, statusField = '', pulsesField, totalPulsesField] = fields

  const deviceTimeMs = parseUnsignedInt(timeField)
  if (deviceTimeMs === null) {
    return reject('invalid-number', `Invalid device time: '${timeField}'`)
  }

  const flowRateLpm = parseDecimal(flowField)
  if (flowRateLpm === null) {
    return reject('invalid-number', `Invalid flow rate: '${flowField}'`)
  }

  const cumulativeVolumeL = parseDecimal(volumeField)
  if (cumulativeVolumeL === null) {
    return reject('invalid-number', `Invalid cumulative volume: '${volumeField}'`)
  }

  if (flowRateLpm < 0) {
    return reject('negative-flow', `Negative flow rate: ${flowRateLpm} L/min`)
  }

  if (cumulativeVolumeL < 0) {
    return reject('negative-volume', `Negative cumulative volume: ${cumulativeVolumeL} L`)
  }

  const sample: FlowSample = {
    deviceTimeMs,
    flowRateLpm,
    cumulativeVolumeL,
    statusTag: statusField,
    status: classifyStatusTag(statusField),
  }

  // Diagnostic pulse counters (newer firmware only)
  if (pulsesField !== undefined && pulsesField !== '') {
    const pulseCount = parseUnsignedInt(pulsesField)
    if (pulseCount === null) {
      return reject('invalid-number', `Invalid pulse count: '${pulsesField}'`)
    }
    sample.pulseCount = pulseCount
  }

  if (totalPulsesField !== undefined && totalPulsesField !== '') {
    const totalPulses = parseUnsignedInt(totalPulsesField)
    if (totalPulses === null) {
      return reject('invalid-number', `Invalid total pulse count: '${totalPulsesField}'`)
    }
    sample.totalPulses = totalPulses
  }

  return { ok: true, sample }
}

// ============================================================================
// Line Tokenizer
// ============================================================================

/**
 * Splits the serial byte stream into lines.
 *
 * The firmware is ASCII-only; invalid bytes decode to replacement characters and
 * the resulting line is rejected by the parser like any other noise.
 */
export class FlowLineTokenizer {
  private buffer = ''

  /**
   * Feed raw bytes from the serial port.
   * @param data - Raw chunk from the port
   * @returns Complete, non-blank lines with CR/LF stripped
   */
  feed(data: Buffer): string[] {
    this.buffer += data.toString('utf8')

    const lines: string[] = []
    let endIdx = this.buffer.indexOf(LINE_TERMINATOR)
    while (endIdx !== -1) {
      const line = this.buffer.slice(0, endIdx).replace(/\r/g, '')
      this.buffer = this.buffer.slice(endIdx + LINE_TERMINATOR.length)

      if (line.trim()) {
        lines.push(line)
      }
      endIdx = this.buffer.indexOf(LINE_TERMINATOR)
    }

    if (this.buffer.length > MAX_LINE_BUFFER) {
      console.warn(`[FlowProtocol] Line buffer overflow: trimming ${this.buffer.length} -> ${LINE_BUFFER_KEEP} chars`)
      this.buffer = this.buffer.slice(-LINE_BUFFER_KEEP)
    }

    return lines
  }

  /**
   * Drop any partial line.
   */
  clear(): void {
    this.buffer = ''
  }

  /**
   * Pending partial-line length (diagnostics).
   */
  getBufferSize(): number {
    return this.buffer.length
  }
}

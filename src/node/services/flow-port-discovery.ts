// * Serial port discovery
// * Lists the host's serial ports and ranks them so the flow sensor board comes first.
// * Ranking: Arduino boards, then USB-serial bridges and other USB devices, then everything
// * else, with Bluetooth serial ports last. Ties are broken by path.

import { existsSync } from 'fs'
import { SerialPort } from 'serialport'

import type { RankedSerialPort } from '@/types/flow-monitor'

export type SerialPortInfo = Awaited<ReturnType<typeof SerialPort.list>>[number]

const ARDUINO_KEYWORDS = ['ARDUINO', 'UNO', 'NANO', 'MEGA']
const USB_SERIAL_KEYWORDS = ['CH340', 'CH341', 'FTDI', 'CP210']

/** USB vendor IDs of Arduino boards (arduino.cc, arduino.org) */
const ARDUINO_VENDOR_IDS = ['2341', '2a03']

/**
 * Build a human-readable description from what the OS reports.
 * @param port
 */
export function describePort(port: SerialPortInfo): string {
  const parts = [port.manufacturer, port.pnpId].filter((part): part is string => !!part)
  return parts.length > 0 ? parts.join(' ') : port.path
}

/**
 * Rank one port. Matching is done on the upper-cased description and path.
 * @param port
 */
export function rankPort(port: SerialPortInfo): RankedSerialPort {
  const description = describePort(port)
  const haystack = `${description} ${port.path}`.toUpperCase()
  const vendorId = port.vendorId?.toLowerCase() ?? null

  let kind: RankedSerialPort['kind'] = 'other'
  let priority = 3

  if ((vendorId && ARDUINO_VENDOR_IDS.includes(vendorId)) || ARDUINO_KEYWORDS.some((k) => haystack.includes(k))) {
    kind = 'arduino'
    priority = 1
  } else if (USB_SERIAL_KEYWORDS.some((k) => haystack.includes(k))) {
    kind = 'usb-serial'
    priority = 2
  } else if (haystack.includes('USB') || haystack.includes('TTYACM')) {
    kind = 'usb'
    priority = 2
  } else if (haystack.includes('BLUETOOTH')) {
    kind = 'bluetooth'
    priority = 4
  }

  return {
    path: port.path,
    description,
    manufacturer: port.manufacturer || null,
    serialNumber: port.serialNumber || null,
    vendorId: port.vendorId || null,
    productId: port.productId || null,
    kind,
    priority,
  }
}

/**
 * Rank and sort a port list (best candidate first).
 * @param ports
 */
export function rankPorts(ports: readonly SerialPortInfo[]): RankedSerialPort[] {
  return ports
    .map(rankPort)
    .sort((a, b) => a.priority - b.priority || (a.path < b.path ? -1 : a.path > b.path ? 1 : 0))
}

/**
 * Enumerate the host's serial ports.
 */
export async function listFlowPorts(): Promise<RankedSerialPort[]> {
  const ports = await SerialPort.list()
  console.log(`[FlowPorts] Found ${ports.length} serial ports`)
  return rankPorts(ports)
}

/**
 * Pick the port to use when none was given: the best Arduino-like or USB candidate.
 * Returns null when nothing plausible is attached.
 * @param ports - Ranked list from listFlowPorts()
 */
export function selectDefaultPort(ports: readonly RankedSerialPort[]): RankedSerialPort | null {
  const candidate = ports.find((port) => port.priority <= 2) ?? null
  if (candidate) {
    console.log(`[FlowPorts] Auto-selected ${candidate.path} (${candidate.kind})`)
  }
  return candidate
}

/**
 * On macOS prefer the /dev/tty.* node over its /dev/cu.* twin when it exists; other paths pass through.
 * @param path
 * @param platform
 * @param exists
 */
export function normalizePortPath(
  path: string,
  platform: NodeJS.Platform = process.platform,
  exists: (candidate: string) => boolean = existsSync
): string {
  if (platform !== 'darwin' || !path.startsWith('/dev/cu.')) {
    return path
  }

  const ttyVariant = `/dev/tty.${path.slice('/dev/cu.'.length)}`
  if (!exists(ttyVariant)) {
    return path
  }
  console.log(`[FlowPorts] Using ${ttyVariant} instead of ${path}`)
  return ttyVariant
}

import { describe, expect, it, vi } from 'vitest'

import {
  describePort,
  normalizePortPath,
  rankPort,
  rankPorts,
  selectDefaultPort,
  type SerialPortInfo,
} from '../src/node/services/flow-port-discovery'

function portInfo(path: string, fields: Partial<SerialPortInfo> = {}): SerialPortInfo {
  return {
    path,
    manufacturer: undefined,
    serialNumber: undefined,
    pnpId: undefined,
    locationId: undefined,
    productId: undefined,
    vendorId: undefined,
    ...fields,
  }
}

describe('rankPort', () => {
  it('recognises Arduino boards by vendor ID and by name', () => {
    expect(rankPort(portInfo('/dev/ttyACM0', { vendorId: '2341', manufacturer: 'Arduino (www.arduino.cc)' }))).toEqual({
      path: '/dev/ttyACM0',
      description: 'Arduino (www.arduino.cc)',
      manufacturer: 'Arduino (www.arduino.cc)',
      serialNumber: null,
      vendorId: '2341',
      productId: null,
      kind: 'arduino',
      priority: 1,
    })
    expect(rankPort(portInfo('COM4', { pnpId: 'USB\\VID_2A03&PID_0043', vendorId: '2A03' })).kind).toBe('arduino')
  })

  it('ranks USB-serial bridges and generic USB devices second', () => {
    expect(rankPort(portInfo('/dev/ttyUSB0', { manufacturer: 'QinHeng Electronics CH340' })).kind).toBe('usb-serial')
    expect(rankPort(portInfo('/dev/ttyUSB1', { manufacturer: 'FTDI' })).priority).toBe(2)
    expect(rankPort(portInfo('/dev/ttyUSB2'))).toMatchObject({ kind: 'usb', priority: 2 })
  })

  it('ranks Bluetooth serial ports last', () => {
    expect(rankPort(portInfo('/dev/tty.Bluetooth-Incoming-Port'))).toMatchObject({ kind: 'bluetooth', priority: 4 })
  })

  it('falls back to the path as description', () => {
    expect(describePort(portInfo('/dev/ttyS0'))).toBe('/dev/ttyS0')
    expect(rankPort(portInfo('/dev/ttyS0'))).toMatchObject({ kind: 'other', priority: 3 })
  })
})

describe('rankPorts', () => {
  it('sorts by priority, then path', () => {
    const ranked = rankPorts([
      portInfo('/dev/tty.Bluetooth'),
      portInfo('/dev/ttyS0'),
      portInfo('/dev/ttyUSB1'),
      portInfo('/dev/ttyUSB0', { manufacturer: 'CP2102 USB to UART' }),
      portInfo('/dev/ttyACM0', { vendorId: '2341' }),
    ])

    expect(ranked.map((p) => p.path)).toEqual([
      '/dev/ttyACM0',
      '/dev/ttyUSB0',
      '/dev/ttyUSB1',
      '/dev/ttyS0',
      '/dev/tty.Bluetooth',
    ])
  })
})

describe('selectDefaultPort', () => {
  it('picks the best USB candidate', () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined)
    const ranked = rankPorts([portInfo('/dev/ttyS0'), portInfo('/dev/ttyUSB3')])

    expect(selectDefaultPort(ranked)?.path).toBe('/dev/ttyUSB3')
  })

  it('returns null when only unlikely ports exist', () => {
    expect(selectDefaultPort(rankPorts([portInfo('/dev/ttyS0'), portInfo('/dev/tty.Bluetooth')]))).toBeNull()
  })
})

describe('normalizePortPath', () => {
  const exists = (candidate: string): boolean => candidate === '/dev/tty.usbmodem1101'

  it('prefers the tty node of a macOS call-out device', () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined)

    expect(normalizePortPath('/dev/cu.usbmodem1101', 'darwin', exists)).toBe('/dev/tty.usbmodem1101')
    expect(console.log).toHaveBeenCalledWith('[FlowPorts] Using /dev/tty.usbmodem1101 instead of /dev/cu.usbmodem1101')
  })

  it('keeps the path when there is no tty twin', () => {
    expect(normalizePortPath('/dev/cu.Bluetooth-Incoming-Port', 'darwin', exists)).toBe(
      '/dev/cu.Bluetooth-Incoming-Port'
    )
  })

  it('leaves other platforms alone', () => {
    expect(normalizePortPath('/dev/cu.usbmodem1101', 'linux', exists)).toBe('/dev/cu.usbmodem1101')
    expect(normalizePortPath('COM3', 'win32', exists)).toBe('COM3')
  })
})

// * Serial link adapter.
// * Wraps a `serialport` handle behind a small promise-based surface addressed by URI:
// *   serial:/dev/ttyUSB0?baudrate=9600   serial:COM3?baudrate=9600
// * Reads happen in the native binding off the main thread and arrive as 'data' events.
// * EVENTS: 'data' (Buffer), 'error' (Error), 'close' (emitted only when the port closes without close() being called).

import EventEmitter from 'events'
import { SerialPort } from 'serialport'

export const DEFAULT_BAUD_RATE = 9600

/**
 * What the acquisition loop needs from a link. Implemented by SerialLink and by in-process test doubles.
 */
export interface FlowLink {
  readonly isOpen: boolean
  open(): Promise<void>
  close(): Promise<void>
  /** Discard bytes received but not yet read */
  flush(): Promise<void>
  on(event: 'data', listener: (data: Buffer) => void): this
  on(event: 'error', listener: (error: Error) => void): this
  on(event: 'close', listener: () => void): this
  removeAllListeners(): this
}

/**
 * Build a serial link URI.
 * @param port
 * @param baudRate
 */
export function buildSerialUri(port: string, baudRate: number = DEFAULT_BAUD_RATE): URL {
  return new URL(`serial:${port}?baudrate=${baudRate}`)
}

/**
 *
 */
export class SerialLink extends EventEmitter implements FlowLink {
  readonly path: string
  readonly baudRate: number
  private port: SerialPort | null = null
  private closing = false

  /**
   * @param uri - serial:<path>?baudrate=<n>
   */
  constructor(readonly uri: URL) {
    super()
    if (uri.protocol !== 'serial:') {
      throw new Error(`Unsupported link protocol: ${uri.protocol}`)
    }
    this.path = decodeURIComponent(uri.pathname)
    if (!this.path) {
      throw new Error(`Serial link URI has no port path: ${uri.href}`)
    }
    const baud = Number(uri.searchParams.get('baudrate') ?? DEFAULT_BAUD_RATE)
    if (!Number.isInteger(baud) || baud <= 0) {
      throw new Error(`Invalid baud rate in ${uri.href}`)
    }
    this.baudRate = baud
  }

  get isOpen(): boolean {
    return this.port?.isOpen ?? false
  }

  async open(): Promise<void> {
    if (this.port) {
      throw new Error(`Serial link ${this.path} already open`)
    }

    const port = new SerialPort({
      path: this.path,
      baudRate: this.baudRate,
      autoOpen: false,
      dataBits: 8,
      parity: 'none',
      stopBits: 1,
    })

    await new Promise<void>((resolve, reject) => {
      port.open((error) => (error ? reject(error) : resolve()))
    })

    port.on('data', (chunk: Buffer) => this.emit('data', chunk))
    port.on('error', (error: Error) => {
      // An 'error' event without listeners would throw; released links have none
      if (this.listenerCount('error') > 0) {
        this.emit('error', error)
      } else {
        console.error(`[SerialLink] Error on released link ${this.path}:`, error)
      }
    })
    port.on('close', () => {
      this.port = null
      if (!this.closing) {
        this.emit('close')
      }
    })

    this.closing = false
    this.port = port
  }

  async close(): Promise<void> {
    const port = this.port
    if (!port) {
      return
    }

    this.closing = true
    this.port = null
    if (!port.isOpen) {
      return
    }

    await new Promise<void>((resolve, reject) => {
      port.close((error) => (error ? reject(error) : resolve()))
    })
  }

  async flush(): Promise<void> {
    const port = this.requirePort()
    await new Promise<void>((resolve, reject) => {
      port.flush((error) => (error ? reject(error) : resolve()))
    })
  }

  private requirePort(): SerialPort {
    if (!this.port || !this.port.isOpen) {
      throw new Error(`Serial link ${this.path} is not open`)
    }
    return this.port
  }
}

/**
 * In-process serial link double and a controller wired to it.
 */

import EventEmitter from 'events'
import { vi } from 'vitest'

import { FlowSerialController } from '../../src/node/services/flow-serial-controller'
import type { FlowLink } from '../../src/node/services/link/serial'

// ============================================================================
// Mock Serial Link
// ============================================================================

/**
 *
 */
export class MockSerialLink extends EventEmitter implements FlowLink {
  isOpen = false
  openError: Error | null = null
  closeCount = 0
  onOpen?: () => void
  onFlush?: () => void

  /**
   *
   */
  async open(): Promise<void> {
    if (this.openError) {
      throw this.openError
    }
    this.isOpen = true
    this.onOpen?.()
  }

  /**
   *
   */
  async close(): Promise<void> {
    this.isOpen = false
    this.closeCount++
  }

  /**
   *
   */
  async flush(): Promise<void> {
    this.onFlush?.()
  }

  // Test helper: simulate incoming lines (CRLF terminated, one chunk)
  /**
   *
   * @param lines
   */
  simulateLines(...lines: string[]): void {
    this.emit('data', Buffer.from(lines.map((line) => `${line}\r\n`).join(''), 'ascii'))
  }

  /**
   *
   * @param error
   */
  simulateError(error: Error): void {
    this.emit('error', error)
  }

  /**
   *
   */
  simulateClose(): void {
    this.isOpen = false
    this.emit('close')
  }
}

/**
 * Link that prints its startup banner while the port opens (before the input buffer is flushed)
 * and a bare line break once the buffer has been flushed.
 */
export function chattyLink(): MockSerialLink {
  const link = new MockSerialLink()
  link.onOpen = () => link.simulateLines('Flow sensor ready', 'time_ms,flow,volume,status')
  link.onFlush = () => link.emit('data', Buffer.from('\r\n', 'ascii'))
  return link
}

/**
 *
 */
export class TestFlowSerialController extends FlowSerialController {
  readonly links: MockSerialLink[] = []
  linkFactory: () => MockSerialLink = chattyLink

  /**
   *
   */
  protected createSerialLink(): FlowLink {
    const link = this.linkFactory()
    this.links.push(link)
    return link
  }

  get currentLink(): MockSerialLink {
    const link = this.links[this.links.length - 1]
    if (!link) {
      throw new Error('No link created yet')
    }
    return link
  }
}

/**
 *
 */
export function silenceConsole(): void {
  vi.spyOn(console, 'log').mockImplementation(() => undefined)
  vi.spyOn(console, 'debug').mockImplementation(() => undefined)
  vi.spyOn(console, 'warn').mockImplementation(() => undefined)
  vi.spyOn(console, 'error').mockImplementation(() => undefined)
}

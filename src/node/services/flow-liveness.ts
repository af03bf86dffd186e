// * Liveness tracking for the flow sensor link.
// * Two orthogonal state variables:
// *   transport: disconnected → connecting → connected (→ disconnected)
// *   freshness: fresh ⇄ stale, only meaningful while connected
// * A cable pulled out shows up on the transport axis (failed I/O); a hung firmware that keeps the
// * port open shows up on the freshness axis only.
// ! Never throws and never retries. Invalid transitions are ignored and reported as "no change".

import type {
  DisconnectReason,
  FlowLinkStatus,
  FreshnessState,
  LivenessSnapshot,
  TransportState,
} from '@/types/flow-monitor'

export const DEFAULT_STALE_TIMEOUT_MS = 5000

/**
 * Combine transport and freshness into the status shown to users.
 * @param transport
 * @param freshness
 */
export function combineStatus(transport: TransportState, freshness: FreshnessState): FlowLinkStatus {
  switch (transport) {
    case 'disconnected':
      return 'disconnected'
    case 'connecting':
      return 'connecting'
    case 'connected':
      return freshness === 'fresh' ? 'connected-fresh' : 'connected-stale'
  }
}

/**
 *
 */
export class LivenessTracker {
  private transport: TransportState = 'disconnected'
  private freshness: FreshnessState = 'fresh'
  private connectedAt: number | null = null
  private lastSampleAt: number | null = null
  private disconnectReason: DisconnectReason | null = null

  /**
   * @param staleTimeoutMs - Silence (ms) tolerated before data is considered stale
   */
  constructor(private readonly staleTimeoutMs: number = DEFAULT_STALE_TIMEOUT_MS) {}

  /**
   * disconnected → connecting
   */
  markConnecting(): boolean {
    if (this.transport !== 'disconnected') {
      return false
    }
    return this.transition(() => {
      this.transport = 'connecting'
      this.disconnectReason = null
    })
  }

  /**
   * connecting → connected. Freshness is measured from this moment until the first sample.
   * @param now
   */
  markConnected(now: number): boolean {
    if (this.transport !== 'connecting') {
      return false
    }
    return this.transition(() => {
      this.transport = 'connected'
      this.freshness = 'fresh'
      this.connectedAt = now
      this.lastSampleAt = null
    })
  }

  /**
   * connecting|connected → disconnected. Repeated calls keep the first reason.
   * @param reason
   */
  markDisconnected(reason: DisconnectReason): boolean {
    if (this.transport === 'disconnected') {
      return false
    }
    return this.transition(() => {
      this.transport = 'disconnected'
      this.freshness = 'fresh'
      this.connectedAt = null
      this.lastSampleAt = null
      this.disconnectReason = reason
    })
  }

  /**
   * A valid sample was accepted. Heals staleness immediately.
   * @param now
   */
  recordSample(now: number): boolean {
    if (this.transport !== 'connected') {
      return false
    }
    return this.transition(() => {
      this.lastSampleAt = now
      this.freshness = 'fresh'
    })
  }

  /**
   * Periodic check; flips to stale once the silence exceeds the timeout.
   * @param now
   */
  poll(now: number): boolean {
    if (this.transport !== 'connected' || this.freshness === 'stale') {
      return false
    }

    const reference = this.lastSampleAt ?? this.connectedAt
    if (reference === null || now - reference <= this.staleTimeoutMs) {
      return false
    }

    return this.transition(() => {
      this.freshness = 'stale'
    })
  }

  get status(): FlowLinkStatus {
    return combineStatus(this.transport, this.freshness)
  }

  get timeoutMs(): number {
    return this.staleTimeoutMs
  }

  snapshot(): LivenessSnapshot {
    return {
      transport: this.transport,
      freshness: this.freshness,
      status: this.status,
      connectedAt: this.connectedAt,
      lastSampleAt: this.lastSampleAt,
      awaitingFirstSample: this.transport === 'connected' && this.lastSampleAt === null,
      disconnectReason: this.disconnectReason,
    }
  }

  private transition(apply: () => void): boolean {
    const before = this.status
    apply()
    return this.status !== before
  }
}

import { EventEmitter } from 'eventemitter3'
import type { Address } from './address'

export type SlotState = 'dead' | 'connecting' | 'connected'

export interface DnetEvents {
  'channel:created': (event: { channelId: number; address: Address; session: string }) => void
  'channel:stopped': (event: { channelId: number; address: Address; reason?: string }) => void
  'channel:send': (event: { channelId: number; address: Address; command: string; size: number }) => void
  'channel:recv': (event: { channelId: number; address: Address; command: string; size: number }) => void
  'outbound:slot': (event: { slot: number; state: SlotState; address?: Address; channelId?: number }) => void
  'refinery:probe': (event: { address: Address; success: boolean }) => void
}

/**
 * Debug event stream. Producers check `enabled` before building an event.
 */
export class Dnet extends EventEmitter<DnetEvents> {
  private active = false

  get enabled(): boolean {
    return this.active
  }

  enable(): void {
    this.active = true
  }

  disable(): void {
    this.active = false
  }
}

/**
 * Lockstake — Singleton EventEmitter
 *
 * Central event bus for staking notifications. The host runtime
 * publishes committed events here and the WebSocket server subscribes
 * to forward them to connected clients.
 */

import { EventEmitter } from 'node:events';
import type { StakingEvent, StakingHubEvents } from './types.js';

export class StakingHubEmitter extends EventEmitter {
  /**
   * Type-safe listener wrapper.
   */
  onEvent<K extends keyof StakingHubEvents>(
    eventName: K,
    listener: (...args: StakingHubEvents[K]) => void,
  ): this {
    return this.on(eventName, listener as (...args: unknown[]) => void);
  }

  /** Emit any staking event under its own type */
  publish(event: StakingEvent): boolean {
    return this.emit(event.type, event);
  }
}

/** Singleton instance — import this everywhere */
export const stakingEmitter = new StakingHubEmitter();
stakingEmitter.setMaxListeners(50);

/**
 * Lockstake — Stake Ledger
 *
 * Pure store for positions, accrual cursors and the singleton pool.
 * Performs no validation; the lifecycle operations own every invariant.
 *
 * The ledger is journaled: `checkpoint()` captures the full state and
 * returns a closure that restores it, which the host runtime uses to
 * discard the writes of a failed call.
 */

import type { PoolParameters, PoolState, StakePosition } from './types.js';

// ---------------------------------------------------------------------------
// Journaling
// ---------------------------------------------------------------------------

export type Rollback = () => void;

/** A store whose writes can be discarded back to a checkpoint */
export interface Journaled {
  checkpoint(): Rollback;
}

export function isJournaled(value: unknown): value is Journaled {
  return typeof value === 'object'
    && value !== null
    && 'checkpoint' in value
    && typeof value.checkpoint === 'function';
}

// ---------------------------------------------------------------------------
// Ledger
// ---------------------------------------------------------------------------

export class StakeLedger implements Journaled {
  private readonly positions = new Map<string, StakePosition>();
  private readonly cursors = new Map<string, number>();
  readonly pool: PoolState;

  constructor(params: PoolParameters) {
    this.pool = {
      ...params,
      availablePeriods: [...params.availablePeriods],
      totalStaked: 0n,
      rewardsBalance: 0n,
    };
  }

  get(account: string): StakePosition | undefined {
    const position = this.positions.get(account);
    return position ? { ...position } : undefined;
  }

  set(account: string, position: StakePosition): void {
    this.positions.set(account, { ...position });
  }

  getCursor(account: string): number | undefined {
    return this.cursors.get(account);
  }

  setCursor(account: string, timestamp: number): void {
    this.cursors.set(account, timestamp);
  }

  /** Every account that ever held a position, zeroed ones included */
  accounts(): string[] {
    return Array.from(this.positions.keys());
  }

  checkpoint(): Rollback {
    const positions = new Map(this.positions);
    const cursors = new Map(this.cursors);
    const { totalStaked, rewardsBalance } = this.pool;

    return () => {
      this.positions.clear();
      for (const [account, position] of positions) this.positions.set(account, position);
      this.cursors.clear();
      for (const [account, cursor] of cursors) this.cursors.set(account, cursor);
      this.pool.totalStaked = totalStaked;
      this.pool.rewardsBalance = rewardsBalance;
    };
  }
}

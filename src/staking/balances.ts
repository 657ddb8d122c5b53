/**
 * Lockstake — In-Memory Balance Books
 *
 * Journaled balance stores that stand in for native custody and for
 * the reward token when no chain is configured (local dev, tests).
 * They take part in the host runtime's rollback, so a failed call
 * leaves no trace in them.
 */

import type { Journaled, Rollback } from './ledger.js';
import type { TransferAsset, TransferCapability } from './transfers.js';
import { NATIVE_ASSET, rewardTokenAsset } from './transfers.js';

// ---------------------------------------------------------------------------
// Base
// ---------------------------------------------------------------------------

export class InMemoryBalances implements Journaled {
  protected readonly balances = new Map<string, bigint>();

  constructor(readonly asset: TransferAsset) {}

  balanceOf(account: string): bigint {
    return this.balances.get(account) ?? 0n;
  }

  /**
   * Move `amount` from one account to another.
   * Returns false and changes nothing when the sender is short.
   */
  move(from: string, to: string, amount: bigint): boolean {
    if (amount < 0n) return false;
    const fromBalance = this.balanceOf(from);
    if (fromBalance < amount) return false;
    if (from === to || amount === 0n) return true;

    this.balances.set(from, fromBalance - amount);
    this.balances.set(to, this.balanceOf(to) + amount);
    return true;
  }

  /** A transfer capability that always sends from `holder` */
  capabilityFor(holder: string): TransferCapability {
    return {
      asset: this.asset,
      transfer: async (recipient, amount) => this.move(holder, recipient, amount),
    };
  }

  checkpoint(): Rollback {
    const saved = new Map(this.balances);
    return () => {
      this.balances.clear();
      for (const [account, balance] of saved) this.balances.set(account, balance);
    };
  }
}

// ---------------------------------------------------------------------------
// Native custody
// ---------------------------------------------------------------------------

export class InMemoryNativeBank extends InMemoryBalances {
  constructor() {
    super(NATIVE_ASSET);
  }

  /** Value entering from outside the system (faucet, genesis) */
  credit(account: string, amount: bigint): void {
    this.balances.set(account, this.balanceOf(account) + amount);
  }
}

// ---------------------------------------------------------------------------
// Reward token (fungible, mintable)
// ---------------------------------------------------------------------------

export class InMemoryRewardToken extends InMemoryBalances {
  private supply = 0n;

  constructor(address: string, symbol: string, decimals = 18) {
    super(rewardTokenAsset(address, symbol, decimals));
  }

  totalSupply(): bigint {
    return this.supply;
  }

  mint(to: string, amount: bigint): void {
    this.supply += amount;
    this.balances.set(to, this.balanceOf(to) + amount);
  }

  override checkpoint(): Rollback {
    const restoreBalances = super.checkpoint();
    const supply = this.supply;
    return () => {
      restoreBalances();
      this.supply = supply;
    };
  }
}

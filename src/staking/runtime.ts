/**
 * Lockstake — Host Runtime
 *
 * The execution environment around the contract:
 *   - supplies caller identity and the current timestamp
 *   - moves attached native value into custody before the call runs
 *   - runs one call at a time, in submission order
 *   - discards every journaled write of a failed call
 *   - publishes a call's notifications only once it has committed
 *
 * Out-of-process transfer collaborators (wallet, ERC-20) are not
 * journaled; their effects survive a rollback.
 */

import type { StakingHubEmitter } from '../events/emitter.js';
import type { StakingEvent } from '../events/types.js';
import type { InMemoryNativeBank } from './balances.js';
import type { CallContext, StakingContract, WithdrawalResult } from './contract.js';
import { StakingError, isStakingError, isStakingPanic } from './errors.js';
import type { Journaled, Rollback } from './ledger.js';
import { isJournaled } from './ledger.js';
import type { AccrualSnapshot, PoolState, StakeInfo } from './types.js';

// ---------------------------------------------------------------------------
// Clock
// ---------------------------------------------------------------------------

export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000),
};

/** Settable clock for tests and simulations */
export class ManualClock implements Clock {
  constructor(private current: number) {}

  now(): number {
    return this.current;
  }

  set(timestamp: number): void {
    this.current = timestamp;
  }

  advance(seconds: number): void {
    this.current += seconds;
  }
}

// ---------------------------------------------------------------------------
// Host
// ---------------------------------------------------------------------------

export interface StakingHostOptions {
  contract: StakingContract;
  /** Where attached value is taken from and held */
  bank: InMemoryNativeBank;
  /** Account that holds custody of staked and pooled value */
  custody: string;
  emitter: StakingHubEmitter;
  clock?: Clock;
  /** Extra stores rolled back with the ledger (e.g. the reward token) */
  journals?: unknown[];
  logCalls?: boolean;
}

type Operation<T> = (ctx: CallContext) => T | Promise<T>;

export class StakingHost {
  readonly contract: StakingContract;
  readonly clock: Clock;
  private readonly bank: InMemoryNativeBank;
  private readonly custody: string;
  private readonly emitter: StakingHubEmitter;
  private readonly journals: Journaled[];
  private readonly logCalls: boolean;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(options: StakingHostOptions) {
    this.contract = options.contract;
    this.bank = options.bank;
    this.custody = options.custody;
    this.emitter = options.emitter;
    this.clock = options.clock ?? systemClock;
    this.logCalls = options.logCalls ?? true;

    const extra = (options.journals ?? []).filter(isJournaled);
    this.journals = [options.contract.ledger, options.bank, ...extra];
  }

  // -------------------------------------------------------------------------
  // Mutating calls
  // -------------------------------------------------------------------------

  stake(caller: string, period: number, value: bigint): Promise<void> {
    return this.execute('stake', caller, value, (ctx) => this.contract.stake(ctx, period));
  }

  extend(caller: string, period: number): Promise<void> {
    return this.execute('extend', caller, 0n, (ctx) => this.contract.extend(ctx, period));
  }

  withdraw(caller: string): Promise<WithdrawalResult> {
    return this.execute('withdraw', caller, 0n, (ctx) => this.contract.withdraw(ctx));
  }

  emergencyWithdraw(caller: string): Promise<WithdrawalResult> {
    return this.execute('emergency_withdraw', caller, 0n, (ctx) => this.contract.emergencyWithdraw(ctx));
  }

  claim(caller: string): Promise<AccrualSnapshot> {
    return this.execute('claim', caller, 0n, (ctx) => this.contract.claim(ctx));
  }

  updateRewardsPool(caller: string, value: bigint): Promise<void> {
    return this.execute('update_rewards_pool', caller, value, (ctx) => this.contract.updateRewardsPool(ctx));
  }

  // -------------------------------------------------------------------------
  // Reads (queued so they never observe a call in flight)
  // -------------------------------------------------------------------------

  stakingPeriod(account: string): Promise<number> {
    return this.read(() => this.contract.getStakingPeriod(account));
  }

  availableRewards(account: string): Promise<bigint> {
    return this.read((now) => this.contract.availableRewards(account, now));
  }

  passedRewardPeriods(account: string): Promise<number> {
    return this.read((now) => this.contract.passedRewardPeriods(account, now));
  }

  rewardSnapshot(account: string): Promise<AccrualSnapshot> {
    return this.read((now) => this.contract.rewardSnapshot(account, now));
  }

  allStakeInfo(account: string): Promise<StakeInfo> {
    return this.read((now) => this.contract.allStakeInfo(account, now));
  }

  nextRewardDate(account: string): Promise<number> {
    return this.read((now) => this.contract.nextRewardDate(account, now));
  }

  poolInfo(): Promise<Readonly<PoolState>> {
    return this.read(() => this.contract.poolInfo());
  }

  // -------------------------------------------------------------------------
  // Execution
  // -------------------------------------------------------------------------

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const result = this.queue.then(task);
    this.queue = result.catch(() => undefined);
    return result;
  }

  private read<T>(view: (now: number) => T): Promise<T> {
    return this.enqueue(async () => view(this.clock.now()));
  }

  private execute<T>(name: string, caller: string, value: bigint, op: Operation<T>): Promise<T> {
    return this.enqueue(async () => {
      const rollbacks: Rollback[] = this.journals.map((j) => j.checkpoint());
      const pending: StakingEvent[] = [];
      const ctx: CallContext = {
        caller,
        now: this.clock.now(),
        value,
        emit: (event) => {
          pending.push(event);
        },
      };

      let result: T;
      try {
        if (value > 0n && !this.bank.move(caller, this.custody, value)) {
          throw new StakingError('InsufficientBalance', 'attached value exceeds balance');
        }
        result = await op(ctx);
      } catch (err) {
        for (const rollback of rollbacks.reverse()) rollback();
        if (this.logCalls) {
          const kind = isStakingPanic(err) ? 'panicked' : isStakingError(err) ? `failed [${err.code}]` : 'errored';
          console.error(`  [staking] ${name} by ${caller} ${kind}:`, err instanceof Error ? err.message : err);
        }
        throw err;
      }

      if (this.logCalls) {
        console.log(`  [staking] ${name} by ${caller} committed (${pending.length} event(s))`);
      }
      for (const event of pending) this.emitter.publish(event);
      return result;
    });
  }
}

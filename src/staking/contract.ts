/**
 * Lockstake — Lifecycle Operations
 *
 * The caller-facing transitions over a position:
 *   1. stake (deposit / top-up)
 *   2. extend
 *   3. withdraw
 *   4. emergencyWithdraw
 *   5. claim
 * plus the reward pool top-up and the read operations.
 *
 * Every operation receives its caller, timestamp, attached value and
 * notification sink through a CallContext supplied by the host runtime.
 * Operations never call each other; shared logic lives in stakeApply,
 * withdrawApply and collectRewards.
 */

import type { StakingEvent } from '../events/types.js';
import { elapsedPeriodsAndReward, nextAccrualBoundary, stakingPeriodDays } from './accrual.js';
import {
  ensure,
  invalidPeriod,
  noStake,
  notFound,
  stillActive,
  transferFailed,
} from './errors.js';
import { StakeLedger } from './ledger.js';
import type { NativeTransfer, RewardTokenTransfer } from './transfers.js';
import type { AccrualSnapshot, PoolState, StakeInfo, StakePosition } from './types.js';
import { EMPTY_POSITION, STAKING_CONSTANTS, lockDurationSeconds } from './types.js';

// ---------------------------------------------------------------------------
// Call context & construction
// ---------------------------------------------------------------------------

export interface CallContext {
  caller: string;
  now: number;
  /** Native value attached to the call, already in custody */
  value: bigint;
  emit(event: StakingEvent): void;
}

export interface StakingCollaborators {
  native: NativeTransfer;
  rewardToken: RewardTokenTransfer;
}

export interface StakingContractOptions {
  rewardToken: string;
  rewardConversionRate: bigint;
  availablePeriods?: number[];
  rewardRate?: bigint;
  earlyWithdrawFee?: bigint;
}

/** What a withdrawal paid out */
export interface WithdrawalResult {
  principal: bigint;
  /** Reward units collected on the way out (before conversion) */
  reward: bigint;
  periods: number;
}

const NOTHING_COLLECTED: AccrualSnapshot = { periods: 0, reward: 0n };

/** How reward collection treats a zero-period accrual */
enum CollectMode {
  /** claim(): zero periods is fatal */
  Direct,
  /** side effect of stake/extend/withdraw: zero periods is a no-op */
  Indirect,
}

// ---------------------------------------------------------------------------
// Contract
// ---------------------------------------------------------------------------

export class StakingContract {
  readonly ledger: StakeLedger;
  private readonly collaborators: StakingCollaborators;

  constructor(options: StakingContractOptions, collaborators: StakingCollaborators) {
    this.ledger = new StakeLedger({
      rewardToken: options.rewardToken,
      rewardRate: options.rewardRate ?? STAKING_CONSTANTS.REWARD_RATE,
      earlyWithdrawFee: options.earlyWithdrawFee ?? STAKING_CONSTANTS.EARLY_WITHDRAW_FEE,
      rewardConversionRate: options.rewardConversionRate,
      availablePeriods: options.availablePeriods ?? [...STAKING_CONSTANTS.DEFAULT_PERIODS],
    });
    this.collaborators = collaborators;
  }

  // -------------------------------------------------------------------------
  // Reads
  // -------------------------------------------------------------------------

  getStakingPeriod(account: string): number {
    const position = this.ledger.get(account);
    if (!position) throw notFound();
    return stakingPeriodDays(position);
  }

  availableRewards(account: string, now: number): bigint {
    return elapsedPeriodsAndReward(this.ledger, account, now).reward;
  }

  passedRewardPeriods(account: string, now: number): number {
    return elapsedPeriodsAndReward(this.ledger, account, now).periods;
  }

  rewardSnapshot(account: string, now: number): AccrualSnapshot {
    return elapsedPeriodsAndReward(this.ledger, account, now);
  }

  allStakeInfo(account: string, now: number): StakeInfo {
    const position = this.ledger.get(account);
    if (!position) throw notFound();

    let rewards = 0n;
    let nextRewardAt = 0;
    if (position.amount !== 0n) {
      rewards = this.availableRewards(account, now);
      nextRewardAt = this.nextRewardDate(account, now);
    }

    return { ...position, rewards, nextRewardAt };
  }

  nextRewardDate(account: string, now: number): number {
    return nextAccrualBoundary(this.ledger, account, now);
  }

  poolInfo(): Readonly<PoolState> {
    return { ...this.ledger.pool, availablePeriods: [...this.ledger.pool.availablePeriods] };
  }

  // -------------------------------------------------------------------------
  // Transitions
  // -------------------------------------------------------------------------

  /** Deposit or top up with the attached value */
  async stake(ctx: CallContext, period: number): Promise<void> {
    ensure(ctx.value > 0n, 'amount should be > 0');

    const previous = this.ledger.get(ctx.caller)?.amount ?? 0n;
    if (previous !== 0n) {
      await this.collectRewards(ctx, CollectMode.Indirect);
    }
    this.stakeApply(ctx, period, ctx.value);
  }

  /** Re-lock a matured position for a new period */
  async extend(ctx: CallContext, period: number): Promise<void> {
    const position = this.ledger.get(ctx.caller);
    if (!position || position.amount === 0n) throw notFound();
    if (position.activeUntil >= ctx.now) throw stillActive();

    await this.collectRewards(ctx, CollectMode.Indirect);
    this.stakeApply(ctx, period, 0n);
  }

  async withdraw(ctx: CallContext): Promise<WithdrawalResult> {
    this.requireStake(ctx.caller);
    const collected = await this.collectRewards(ctx, CollectMode.Indirect);

    const amount = this.requireStake(ctx.caller).amount;
    await this.withdrawApply(ctx, amount);
    return { principal: amount, ...collected };
  }

  /** Principal back immediately; unclaimed rewards are forfeited */
  async emergencyWithdraw(ctx: CallContext): Promise<WithdrawalResult> {
    const { amount } = this.requireStake(ctx.caller);
    await this.withdrawApply(ctx, amount);
    this.ledger.set(ctx.caller, EMPTY_POSITION);
    return { principal: amount, ...NOTHING_COLLECTED };
  }

  async claim(ctx: CallContext): Promise<AccrualSnapshot> {
    this.requireStake(ctx.caller);
    return this.collectRewards(ctx, CollectMode.Direct);
  }

  /** Fund the reward pool with the attached value */
  updateRewardsPool(ctx: CallContext): void {
    ensure(ctx.value > 0n, 'amount should be > 0');
    this.ledger.pool.rewardsBalance += ctx.value;
    ctx.emit({ type: 'staking:pool-updated', payload: { amount: ctx.value } });
  }

  // -------------------------------------------------------------------------
  // Shared helpers
  // -------------------------------------------------------------------------

  private requireStake(account: string): StakePosition {
    const position = this.ledger.get(account);
    if (!position || position.amount === 0n) throw noStake();
    return position;
  }

  private validatePeriod(period: number): void {
    if (!this.ledger.pool.availablePeriods.includes(period)) throw invalidPeriod(period);
  }

  /**
   * Apply a deposit of `amount` (0 for extend).
   * Top-ups keep the existing maturity and overwrite the period code.
   */
  private stakeApply(ctx: CallContext, period: number, amount: bigint): void {
    const existing = this.ledger.get(ctx.caller);
    const isFresh = !existing || existing.amount === 0n;
    const newAmount = (existing?.amount ?? 0n) + amount;

    this.validatePeriod(period);

    let activeUntil = ctx.now + lockDurationSeconds(period);
    if (existing && !isFresh && amount !== 0n) activeUntil = existing.activeUntil;

    this.ledger.set(ctx.caller, {
      amount: newAmount,
      startedAt: ctx.now,
      period,
      activeUntil,
    });
    if (isFresh) this.ledger.setCursor(ctx.caller, ctx.now);

    this.ledger.pool.totalStaked += amount;
    ctx.emit({
      type: 'staking:stake',
      payload: {
        account: ctx.caller,
        stakedAt: ctx.now,
        period,
        sum: amount,
        totalStaked: newAmount,
      },
    });
  }

  /**
   * Zero the position, then send the principal back. totalStaked is left as is.
   * The notification reports isEarly: false for emergency withdrawals too.
   */
  private async withdrawApply(ctx: CallContext, amount: bigint): Promise<void> {
    this.ledger.set(ctx.caller, EMPTY_POSITION);

    const ok = await this.collaborators.native.transfer(ctx.caller, amount);
    if (!ok) throw transferFailed('native');

    ctx.emit({
      type: 'staking:withdraw',
      payload: { account: ctx.caller, sum: amount, isEarly: false },
    });
  }

  private async collectRewards(ctx: CallContext, mode: CollectMode): Promise<AccrualSnapshot> {
    const position = this.ledger.get(ctx.caller);
    if (!position || position.amount === 0n) return { ...NOTHING_COLLECTED };

    const { periods, reward } = elapsedPeriodsAndReward(this.ledger, ctx.caller, ctx.now);
    if (mode === CollectMode.Indirect && periods === 0) return { ...NOTHING_COLLECTED };

    const pool = this.ledger.pool;
    ensure(pool.rewardsBalance >= reward, 'not enough rewards');
    ensure(periods > 0, 'too early');

    const lastClaim = this.ledger.getCursor(ctx.caller) ?? 0;
    this.ledger.setCursor(ctx.caller, lastClaim + periods * STAKING_CONSTANTS.ACCRUAL_PERIOD_SECONDS);
    pool.rewardsBalance -= reward;

    ctx.emit({
      type: 'staking:claim',
      payload: { account: ctx.caller, periods, amount: reward },
    });

    const ok = await this.collaborators.rewardToken.transfer(
      ctx.caller,
      reward * pool.rewardConversionRate,
    );
    if (!ok) throw transferFailed('reward token');
    return { periods, reward };
  }
}

/**
 * Lockstake — Staking Types
 *
 * State held by the stake ledger plus the read-model shapes returned
 * by the lifecycle operations and the HTTP API.
 *
 * Amounts are bigint (native base units). Timestamps are unix seconds.
 */

// ---------------------------------------------------------------------------
// Positions
// ---------------------------------------------------------------------------

/** An account's locked principal and its lock metadata */
export interface StakePosition {
  amount: bigint;
  startedAt: number;         // opened, topped up or extended at
  period: number;            // period code, e.g. 6 or 12
  activeUntil: number;       // lock matures at
}

export const EMPTY_POSITION: Readonly<StakePosition> = {
  amount: 0n,
  startedAt: 0,
  period: 0,
  activeUntil: 0,
};

/** Position lifecycle as seen from a given timestamp */
export enum PositionState {
  Empty = 'empty',
  Active = 'active',
  Matured = 'matured',
}

// ---------------------------------------------------------------------------
// Pool
// ---------------------------------------------------------------------------

export interface PoolParameters {
  rewardToken: string;
  rewardRate: bigint;
  /** Stored but never applied to any withdrawal */
  earlyWithdrawFee: bigint;
  rewardConversionRate: bigint;
  availablePeriods: number[];
}

export interface PoolState extends PoolParameters {
  totalStaked: bigint;
  rewardsBalance: bigint;
}

// ---------------------------------------------------------------------------
// Read models
// ---------------------------------------------------------------------------

export interface AccrualSnapshot {
  periods: number;
  reward: bigint;
}

export interface StakeInfo {
  amount: bigint;
  startedAt: number;
  period: number;
  activeUntil: number;
  rewards: bigint;
  nextRewardAt: number;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const STAKING_CONSTANTS = {
  ACCRUAL_PERIOD_SECONDS: 86_400,       // one day
  LOCK_BLOCK_PERIODS: 30,               // one period code unit = 30 days
  REWARD_RATE: 5n,
  EARLY_WITHDRAW_FEE: 10n,
  REWARD_SCALE_NUMERATOR: 100n,
  REWARD_SCALE_DENOMINATOR: 36_000n,
  DEFAULT_PERIODS: [6, 12],
} as const;

/** Seconds a lock of the given period code lasts */
export function lockDurationSeconds(period: number): number {
  return period * STAKING_CONSTANTS.LOCK_BLOCK_PERIODS * STAKING_CONSTANTS.ACCRUAL_PERIOD_SECONDS;
}

export function positionState(position: StakePosition | undefined, now: number): PositionState {
  if (!position || position.amount === 0n) return PositionState.Empty;
  return now >= position.activeUntil ? PositionState.Matured : PositionState.Active;
}

/**
 * Lockstake — Reward Accrual Engine
 *
 * Converts elapsed time into whole accrual periods and the reward owed
 * for them. Reads the ledger, never writes it.
 *
 * reward = floor(amount * rewardRate * periods * 100 / 36000)
 *
 * Multiply fully, then divide once.
 */

import type { StakeLedger } from './ledger.js';
import type { AccrualSnapshot, StakePosition } from './types.js';
import { STAKING_CONSTANTS } from './types.js';
import { notFound } from './errors.js';

const PERIOD = STAKING_CONSTANTS.ACCRUAL_PERIOD_SECONDS;

/**
 * Whole periods elapsed since the cursor and the reward owed for them.
 * Accrual stops at maturity: time is clamped to `activeUntil`.
 */
export function elapsedPeriodsAndReward(
  ledger: StakeLedger,
  account: string,
  now: number,
): AccrualSnapshot {
  const position = ledger.get(account);
  if (!position) throw notFound();

  const effectiveTime = Math.min(now, position.activeUntil);
  const lastClaim = ledger.getCursor(account) ?? 0;
  const periods = effectiveTime > lastClaim
    ? Math.floor((effectiveTime - lastClaim) / PERIOD)
    : 0;

  return {
    periods,
    reward: computeReward(position.amount, ledger.pool.rewardRate, periods),
  };
}

export function computeReward(amount: bigint, rewardRate: bigint, periods: number): bigint {
  return (amount * rewardRate * BigInt(periods) * STAKING_CONSTANTS.REWARD_SCALE_NUMERATOR)
    / STAKING_CONSTANTS.REWARD_SCALE_DENOMINATOR;
}

/**
 * Timestamp of the next period boundary, measured from `startedAt`.
 * Past maturity the final boundary is `activeUntil` itself.
 */
export function nextAccrualBoundary(ledger: StakeLedger, account: string, now: number): number {
  if (ledger.getCursor(account) === undefined) throw notFound('Last reward claim not found');
  const position = ledger.get(account);
  if (!position) throw notFound();

  if (now > position.activeUntil) return position.activeUntil;

  const passed = Math.floor((now - position.startedAt) / PERIOD);
  return (passed + 1) * PERIOD + position.startedAt;
}

/** Lock length in days; 0 for zeroed positions or matured top-ups */
export function stakingPeriodDays(position: StakePosition): number {
  const span = position.activeUntil - position.startedAt;
  return span > 0 ? Math.floor(span / PERIOD) : 0;
}

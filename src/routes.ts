/**
 * Lockstake — Express API
 *
 * REST surface over the staking host. The caller of a mutating call is
 * taken from the X-Caller-Address header (or body.account). Amounts are
 * decimal strings of base units; `*Eth` fields are display floats.
 *
 * Endpoints:
 *   GET  /api/health                        — Status, uptime, host clock
 *   GET  /api/staking/pool                  — Pool counters + parameters
 *   GET  /api/staking/:account              — Full stake info
 *   GET  /api/staking/:account/period       — Lock length in days
 *   GET  /api/staking/:account/rewards      — Claimable reward + periods passed
 *   GET  /api/staking/:account/next-reward  — Next accrual boundary
 *   POST /api/staking/stake                 — Deposit / top up { period, value }
 *   POST /api/staking/extend                — Re-lock matured stake { period }
 *   POST /api/staking/withdraw              — Withdraw principal (+ rewards)
 *   POST /api/staking/emergency-withdraw    — Withdraw principal, forfeit rewards
 *   POST /api/staking/claim                 — Claim accrued rewards
 *   POST /api/staking/pool/top-up           — Fund the reward pool { value }
 *   POST /api/dev/faucet                    — Credit native balance (dev only)
 */

import express from 'express';
import cors from 'cors';
import type { Request, Response } from 'express';
import { ethers } from 'ethers';
import { checkHealth } from './chain/client.js';
import type { StakingDeployment } from './staking/setup.js';
import type { WithdrawalResult } from './staking/contract.js';
import { isStakingError, isStakingPanic } from './staking/errors.js';
import type { StakingErrorCode } from './staking/errors.js';
import { positionState } from './staking/types.js';
import type { PoolState, StakeInfo } from './staking/types.js';
import { stakingPeriodDays } from './staking/accrual.js';

// ---------------------------------------------------------------------------
// Input parsing
// ---------------------------------------------------------------------------

export class BadRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BadRequestError';
  }
}

/** Checksummed address, or a BadRequestError */
export function parseAccount(raw: unknown): string {
  if (typeof raw !== 'string' || !ethers.isAddress(raw)) {
    throw new BadRequestError('Invalid or missing account address');
  }
  return ethers.getAddress(raw);
}

export function parsePeriod(raw: unknown): number {
  const period = typeof raw === 'string' ? Number(raw) : raw;
  if (typeof period !== 'number' || !Number.isInteger(period) || period < 0) {
    throw new BadRequestError('period must be a non-negative integer');
  }
  return period;
}

/** Base-unit amount from a decimal string or safe integer */
export function parseValue(raw: unknown): bigint {
  if (typeof raw === 'number' && Number.isSafeInteger(raw) && raw >= 0) return BigInt(raw);
  if (typeof raw === 'string' && /^\d+$/.test(raw)) return BigInt(raw);
  throw new BadRequestError('value must be a non-negative integer amount in base units');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function bodyField(req: Request, field: string): unknown {
  const body: unknown = req.body;
  return isRecord(body) ? body[field] : undefined;
}

function callerOf(req: Request): string {
  return parseAccount(req.get('x-caller-address') ?? bodyField(req, 'account'));
}

// ---------------------------------------------------------------------------
// Error mapping
// ---------------------------------------------------------------------------

const STATUS_BY_CODE: Record<StakingErrorCode, number> = {
  NotFound: 404,
  NoStake: 404,
  InvalidPeriod: 400,
  StillActive: 409,
  InsufficientBalance: 402,
  TransferFailed: 502,
};

export interface ErrorReply {
  status: number;
  body: { error: string; code?: string; fatal?: boolean };
}

export function errorReply(err: unknown): ErrorReply {
  if (err instanceof BadRequestError) {
    return { status: 400, body: { error: err.message } };
  }
  if (isStakingError(err)) {
    return { status: STATUS_BY_CODE[err.code], body: { error: err.message, code: err.code } };
  }
  if (isStakingPanic(err)) {
    return { status: 422, body: { error: err.message, fatal: true } };
  }
  console.error('  [api] Unexpected error:', err instanceof Error ? err.message : err);
  return { status: 500, body: { error: 'Internal server error' } };
}

function fail(res: Response, err: unknown): void {
  const { status, body } = errorReply(err);
  res.status(status).json(body);
}

// ---------------------------------------------------------------------------
// Serialization
// ---------------------------------------------------------------------------

const eth = (wei: bigint) => parseFloat(ethers.formatEther(wei));

export function serializeStakeInfo(account: string, info: StakeInfo, now: number) {
  return {
    account,
    amount: info.amount.toString(),
    amountEth: eth(info.amount),
    startedAt: info.startedAt,
    period: info.period,
    activeUntil: info.activeUntil,
    stakingPeriodDays: stakingPeriodDays(info),
    state: positionState(info, now),
    rewards: info.rewards.toString(),
    rewardsEth: eth(info.rewards),
    nextRewardAt: info.nextRewardAt,
  };
}

export function serializeWithdrawal(account: string, result: WithdrawalResult) {
  return {
    account,
    withdrawn: result.principal.toString(),
    withdrawnEth: eth(result.principal),
    periods: result.periods,
    reward: result.reward.toString(),
  };
}

export function serializePool(pool: Readonly<PoolState>) {
  return {
    rewardToken: pool.rewardToken,
    totalStaked: pool.totalStaked.toString(),
    totalStakedEth: eth(pool.totalStaked),
    rewardsBalance: pool.rewardsBalance.toString(),
    rewardsBalanceEth: eth(pool.rewardsBalance),
    rewardRate: pool.rewardRate.toString(),
    earlyWithdrawFee: pool.earlyWithdrawFee.toString(),
    rewardConversionRate: pool.rewardConversionRate.toString(),
    availablePeriods: pool.availablePeriods,
  };
}

// ---------------------------------------------------------------------------
// App
// ---------------------------------------------------------------------------

export interface AppOptions {
  faucetEnabled: boolean;
}

export function createApp(deployment: StakingDeployment, options: AppOptions): express.Express {
  const { host, bank, chain } = deployment;
  const app = express();
  app.use(cors());
  app.use(express.json());

  // GET /api/health — System health and mode check
  app.get('/api/health', async (_req, res) => {
    res.json({
      status: 'ok',
      version: '0.1.0',
      now: host.clock.now(),
      uptime: process.uptime(),
      chain: chain ? await checkHealth(chain) : null,
    });
  });

  // GET /api/staking/pool — Pool counters + parameters
  app.get('/api/staking/pool', async (_req, res) => {
    try {
      res.json(serializePool(await host.poolInfo()));
    } catch (err) {
      fail(res, err);
    }
  });

  // GET /api/staking/:account — Full stake info
  app.get('/api/staking/:account', async (req, res) => {
    try {
      const account = parseAccount(req.params.account);
      const info = await host.allStakeInfo(account);
      res.json(serializeStakeInfo(account, info, host.clock.now()));
    } catch (err) {
      fail(res, err);
    }
  });

  // GET /api/staking/:account/period — Lock length in days
  app.get('/api/staking/:account/period', async (req, res) => {
    try {
      const account = parseAccount(req.params.account);
      res.json({ account, days: await host.stakingPeriod(account) });
    } catch (err) {
      fail(res, err);
    }
  });

  // GET /api/staking/:account/rewards — Claimable reward + periods passed
  app.get('/api/staking/:account/rewards', async (req, res) => {
    try {
      const account = parseAccount(req.params.account);
      const { periods, reward } = await host.rewardSnapshot(account);
      res.json({ account, periods, reward: reward.toString(), rewardEth: eth(reward) });
    } catch (err) {
      fail(res, err);
    }
  });

  // GET /api/staking/:account/next-reward — Next accrual boundary
  app.get('/api/staking/:account/next-reward', async (req, res) => {
    try {
      const account = parseAccount(req.params.account);
      res.json({ account, nextRewardAt: await host.nextRewardDate(account) });
    } catch (err) {
      fail(res, err);
    }
  });

  // POST /api/staking/stake — Deposit / top up
  app.post('/api/staking/stake', async (req, res) => {
    try {
      const caller = callerOf(req);
      await host.stake(caller, parsePeriod(bodyField(req, 'period')), parseValue(bodyField(req, 'value')));
      const info = await host.allStakeInfo(caller);
      res.status(201).json(serializeStakeInfo(caller, info, host.clock.now()));
    } catch (err) {
      fail(res, err);
    }
  });

  // POST /api/staking/extend — Re-lock a matured stake
  app.post('/api/staking/extend', async (req, res) => {
    try {
      const caller = callerOf(req);
      await host.extend(caller, parsePeriod(bodyField(req, 'period')));
      const info = await host.allStakeInfo(caller);
      res.json(serializeStakeInfo(caller, info, host.clock.now()));
    } catch (err) {
      fail(res, err);
    }
  });

  // POST /api/staking/withdraw — Withdraw principal after forced collection
  app.post('/api/staking/withdraw', async (req, res) => {
    try {
      const caller = callerOf(req);
      res.json(serializeWithdrawal(caller, await host.withdraw(caller)));
    } catch (err) {
      fail(res, err);
    }
  });

  // POST /api/staking/emergency-withdraw — Principal only, rewards forfeited
  app.post('/api/staking/emergency-withdraw', async (req, res) => {
    try {
      const caller = callerOf(req);
      res.json(serializeWithdrawal(caller, await host.emergencyWithdraw(caller)));
    } catch (err) {
      fail(res, err);
    }
  });

  // POST /api/staking/claim — Claim accrued rewards
  app.post('/api/staking/claim', async (req, res) => {
    try {
      const caller = callerOf(req);
      const { periods, reward } = await host.claim(caller);
      res.json({ account: caller, periods, reward: reward.toString(), rewardEth: eth(reward) });
    } catch (err) {
      fail(res, err);
    }
  });

  // POST /api/staking/pool/top-up — Fund the reward pool
  app.post('/api/staking/pool/top-up', async (req, res) => {
    try {
      const caller = callerOf(req);
      await host.updateRewardsPool(caller, parseValue(bodyField(req, 'value')));
      res.json(serializePool(await host.poolInfo()));
    } catch (err) {
      fail(res, err);
    }
  });

  // POST /api/dev/faucet — Credit native balance for local testing
  if (options.faucetEnabled) {
    app.post('/api/dev/faucet', (req, res) => {
      try {
        const account = callerOf(req);
        const value = parseValue(bodyField(req, 'value'));
        bank.credit(account, value);
        res.json({ account, balance: bank.balanceOf(account).toString() });
      } catch (err) {
        fail(res, err);
      }
    });
  }

  return app;
}

import type { Server } from 'node:http';
import { afterAll, beforeAll, describe, it, expect, vi } from 'vitest';
import { ethers } from 'ethers';
import { config } from '../src/config.js';
import { StakingHubEmitter } from '../src/events/emitter.js';
import {
  BadRequestError,
  createApp,
  errorReply,
  parseAccount,
  parsePeriod,
  parseValue,
  serializeStakeInfo,
} from '../src/routes.js';
import { StakingError, StakingPanic } from '../src/staking/errors.js';
import { ManualClock } from '../src/staking/runtime.js';
import { deployStaking } from '../src/staking/setup.js';
import { DAY, T0 } from './helpers.js';

const ALICE = ethers.getAddress('0x00000000000000000000000000000000000a11ce');
const BOB = ethers.getAddress('0x000000000000000000000000000000000000b0b0');

// ---------------------------------------------------------------------------
// Parsing & mapping
// ---------------------------------------------------------------------------

describe('input parsing', () => {
  it('checksums valid addresses', () => {
    expect(parseAccount(ALICE.toLowerCase())).toBe(ALICE);
  });

  it('rejects malformed addresses', () => {
    expect(() => parseAccount('0x123')).toThrow(BadRequestError);
    expect(() => parseAccount(undefined)).toThrow('Invalid or missing account address');
  });

  it('accepts periods as numbers or numeric strings', () => {
    expect(parsePeriod(6)).toBe(6);
    expect(parsePeriod('12')).toBe(12);
    expect(() => parsePeriod(-1)).toThrow(BadRequestError);
    expect(() => parsePeriod(1.5)).toThrow(BadRequestError);
    expect(() => parsePeriod('six')).toThrow(BadRequestError);
  });

  it('parses base-unit amounts without losing precision', () => {
    expect(parseValue(10_000)).toBe(10_000n);
    expect(parseValue('1000000000000000000000')).toBe(10n ** 21n);
    expect(() => parseValue('1.5')).toThrow(BadRequestError);
    expect(() => parseValue(-3)).toThrow(BadRequestError);
    expect(() => parseValue(2 ** 60)).toThrow(BadRequestError);
  });
});

describe('errorReply', () => {
  it('maps recoverable errors by code', () => {
    expect(errorReply(new StakingError('StillActive', 'still active'))).toEqual({
      status: 409,
      body: { error: 'still active', code: 'StillActive' },
    });
    expect(errorReply(new StakingError('NoStake', 'no stake')).status).toBe(404);
    expect(errorReply(new StakingError('InvalidPeriod', 'period not exist: 7')).status).toBe(400);
    expect(errorReply(new StakingError('InsufficientBalance', 'x')).status).toBe(402);
    expect(errorReply(new StakingError('TransferFailed', 'x')).status).toBe(502);
  });

  it('marks fatal assertions', () => {
    expect(errorReply(new StakingPanic('too early'))).toEqual({
      status: 422,
      body: { error: 'too early', fatal: true },
    });
  });

  it('hides unexpected errors', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    expect(errorReply(new Error('boom'))).toEqual({ status: 500, body: { error: 'Internal server error' } });
    expect(spy).toHaveBeenCalledWith('  [api] Unexpected error:', 'boom');
    spy.mockRestore();
  });
});

describe('serializeStakeInfo', () => {
  it('renders amounts as strings plus display floats', () => {
    const info = {
      amount: 10n ** 18n,
      startedAt: T0,
      period: 6,
      activeUntil: T0 + 180 * DAY,
      rewards: 5n * 10n ** 17n,
      nextRewardAt: T0 + DAY,
    };
    expect(serializeStakeInfo(ALICE, info, T0 + 1)).toEqual({
      account: ALICE,
      amount: '1000000000000000000',
      amountEth: 1,
      startedAt: T0,
      period: 6,
      activeUntil: T0 + 180 * DAY,
      stakingPeriodDays: 180,
      state: 'active',
      rewards: '500000000000000000',
      rewardsEth: 0.5,
      nextRewardAt: T0 + DAY,
    });
  });
});

// ---------------------------------------------------------------------------
// HTTP round trip (in-process server on an ephemeral port)
// ---------------------------------------------------------------------------

describe('createApp', () => {
  const clock = new ManualClock(T0);
  let server: Server;
  let base: string;

  beforeAll(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const deployment = deployStaking(
      {
        ...config,
        logCalls: false,
        rewardToken: { ...config.rewardToken, address: '' },
        chain: { ...config.chain, operatorPrivateKey: '' },
      },
      { clock, emitter: new StakingHubEmitter() },
    );
    const app = createApp(deployment, { faucetEnabled: true });
    server = await new Promise<Server>((resolve) => {
      const s = app.listen(0, '127.0.0.1', () => resolve(s));
    });
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('server is not listening on a port');
    base = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    vi.restoreAllMocks();
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  });

  const post = (path: string, body: Record<string, unknown>, caller: string = ALICE) =>
    fetch(`${base}${path}`, {
      method: 'POST',
      headers: { 'content-type': 'application/json', 'x-caller-address': caller },
      body: JSON.stringify(body),
    });

  it('stakes through the API and reports the position', async () => {
    await post('/api/dev/faucet', { value: '50000' });
    await post('/api/staking/pool/top-up', { value: '20000' });

    const res = await post('/api/staking/stake', { period: 6, value: '10000' });
    expect(res.status).toBe(201);
    expect(await res.json()).toMatchObject({
      account: ALICE,
      amount: '10000',
      period: 6,
      activeUntil: T0 + 180 * DAY,
      state: 'active',
      rewards: '0',
      nextRewardAt: T0 + DAY,
    });

    const pool = await fetch(`${base}/api/staking/pool`);
    expect(await pool.json()).toMatchObject({ totalStaked: '10000', rewardsBalance: '20000' });
  });

  it('maps a premature claim to a fatal 422', async () => {
    const res = await post('/api/staking/claim', {});
    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({ error: 'too early', fatal: true });
  });

  it('claims once whole periods have elapsed', async () => {
    clock.advance(3 * DAY);
    const res = await post('/api/staking/claim', {});
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ account: ALICE, periods: 3, reward: '416' });
  });

  it('refuses to extend a running lock', async () => {
    const res = await post('/api/staking/extend', { period: 12 });
    expect(res.status).toBe(409);
    expect(await res.json()).toEqual({ error: 'still active', code: 'StillActive' });
  });

  it('reports NoStake when an account that never staked withdraws', async () => {
    const res = await post('/api/staking/withdraw', {}, BOB);
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'no stake', code: 'NoStake' });
  });

  it('reports exactly what an emergency withdrawal paid', async () => {
    const res = await post('/api/staking/emergency-withdraw', {});
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      account: ALICE,
      withdrawn: '10000',
      withdrawnEth: 1e-14,
      periods: 0,
      reward: '0',
    });
  });

  it('returns 404 for an account that never staked', async () => {
    const res = await fetch(`${base}/api/staking/0x000000000000000000000000000000000000b0b0`);
    expect(res.status).toBe(404);
  });

  it('returns 400 for a malformed account', async () => {
    const res = await fetch(`${base}/api/staking/not-an-address`);
    expect(res.status).toBe(400);
  });
});

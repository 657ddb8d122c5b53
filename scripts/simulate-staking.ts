#!/usr/bin/env tsx
/**
 * Lockstake — Lifecycle Simulation Script
 *
 * Runs a full stake lifecycle in-process against a manual clock
 * (no server, no chain) and prints the ledger after each step.
 *
 * Usage:
 *   npx tsx scripts/simulate-staking.ts
 *   npx tsx scripts/simulate-staking.ts --pool 500    # smaller reward pool
 */

import { ethers } from 'ethers';
import { config } from '../src/config.js';
import { StakingHubEmitter } from '../src/events/index.js';
import { ManualClock, STAKING_CONSTANTS, deployStaking } from '../src/staking/index.js';

const DAY = STAKING_CONSTANTS.ACCRUAL_PERIOD_SECONDS;

const alice = ethers.getAddress('0x00000000000000000000000000000000000a11ce');
const funder = ethers.getAddress('0x00000000000000000000000000000000000f00d0');

const poolArg = process.argv.indexOf('--pool');
const poolSize = poolArg !== -1 ? BigInt(process.argv[poolArg + 1] ?? '0') : 1_000_000n;

async function main() {
  const clock = new ManualClock(1_700_000_000);
  const emitter = new StakingHubEmitter();
  const { host, bank, rewardToken } = deployStaking(
    { ...config, rewardToken: { ...config.rewardToken, address: '' }, chain: { ...config.chain, operatorPrivateKey: '' } },
    { clock, emitter },
  );

  emitter.onEvent('staking:claim', (e) => {
    console.log(`    ↳ claim: ${e.payload.periods} period(s), ${e.payload.amount} reward`);
  });

  bank.credit(alice, 100_000n);
  bank.credit(funder, poolSize);

  const show = async (label: string) => {
    const info = await host.allStakeInfo(alice);
    console.log(`\n  ${label}`);
    console.log(`    amount=${info.amount} until=${info.activeUntil} rewards=${info.rewards} next=${info.nextRewardAt}`);
    console.log(`    reward token balance=${rewardToken?.balanceOf(alice) ?? 'n/a'}`);
  };

  await host.updateRewardsPool(funder, poolSize);
  await host.stake(alice, 6, 10_000n);
  await show('Staked 10000 for period 6');

  clock.advance(3 * DAY);
  await host.claim(alice);
  await show('Claimed after 3 days');

  clock.advance(200 * DAY);
  await host.extend(alice, 12);
  await show('Extended after maturity');

  clock.advance(400 * DAY);
  await host.withdraw(alice);
  console.log(`\n  Withdrawn. Native balance: ${bank.balanceOf(alice)}`);

  const pool = await host.poolInfo();
  console.log(`  Pool: totalStaked=${pool.totalStaked} rewardsBalance=${pool.rewardsBalance}\n`);
}

main().catch((err) => {
  console.error('Simulation failed:', err instanceof Error ? err.message : err);
  process.exit(1);
});

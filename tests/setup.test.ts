import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { ethers } from 'ethers';
import { closeClient } from '../src/chain/client.js';
import { config } from '../src/config.js';
import { StakingHubEmitter } from '../src/events/emitter.js';
import { deployStaking } from '../src/staking/setup.js';

const OPERATOR_KEY = '0x' + '01'.repeat(32);
const CHAIN = { rpcUrl: 'http://127.0.0.1:8545', operatorPrivateKey: OPERATOR_KEY };

function withChain(faucetEnabled: boolean, rewardTokenAddress = '') {
  return {
    ...config,
    logCalls: false,
    faucetEnabled,
    rewardToken: { ...config.rewardToken, address: rewardTokenAddress },
    chain: CHAIN,
  };
}

describe('deployStaking', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });
  afterEach(() => {
    closeClient();
    vi.restoreAllMocks();
  });

  it('refuses on-chain payouts while the faucet is enabled', () => {
    expect(() => deployStaking(withChain(true), { emitter: new StakingHubEmitter() })).toThrow(
      'FAUCET_ENABLED must be false when payouts or the reward token are on-chain',
    );
  });

  it('refuses an on-chain reward token while the faucet is enabled', () => {
    const cfg = { ...withChain(true, '0x0000000000000000000000000000000000000abc'), chain: { ...CHAIN, operatorPrivateKey: '' } };
    expect(() => deployStaking(cfg, { emitter: new StakingHubEmitter() })).toThrow(
      'FAUCET_ENABLED must be false when payouts or the reward token are on-chain',
    );
  });

  it('pays principal from the operator key it was given', () => {
    const deployment = deployStaking(withChain(false), { emitter: new StakingHubEmitter() });

    expect(deployment.operator).toBe(new ethers.Wallet(OPERATOR_KEY).address);
    expect(deployment.chain).toEqual(CHAIN);
    expect(deployment.rewardToken).not.toBeNull();
  });

  it('stays fully in memory without chain settings', () => {
    const deployment = deployStaking(
      { ...withChain(true), chain: { ...CHAIN, operatorPrivateKey: '' } },
      { emitter: new StakingHubEmitter() },
    );

    expect(deployment.operator).toBeNull();
    expect(deployment.chain).toBeNull();
  });
});

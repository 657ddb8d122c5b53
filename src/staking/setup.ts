/**
 * Lockstake — Host Assembly
 *
 * Builds a StakingHost from configuration:
 *   - in-memory native bank (always; attached value is taken from it)
 *   - native payouts from the operator wallet when a key is set,
 *     otherwise from the in-memory custody account
 *   - reward payouts via ERC-20 when a token address is set,
 *     otherwise from an in-memory token minted to custody
 *
 * Attached value is always taken from the in-memory bank. With on-chain
 * payouts that bank may only be credited by trusted operator code, so
 * the dev faucet must be off.
 */

import { getSigner } from '../chain/client.js';
import type { ChainSettings } from '../chain/client.js';
import { Erc20RewardTokenTransfer, WalletNativeTransfer, connectErc20 } from '../chain/transfers.js';
import type { AppConfig } from '../config.js';
import { stakingEmitter } from '../events/emitter.js';
import type { StakingHubEmitter } from '../events/emitter.js';
import { InMemoryNativeBank, InMemoryRewardToken } from './balances.js';
import { StakingContract } from './contract.js';
import type { Clock } from './runtime.js';
import { StakingHost } from './runtime.js';
import type { NativeTransfer, RewardTokenTransfer } from './transfers.js';

export interface StakingDeployment {
  host: StakingHost;
  bank: InMemoryNativeBank;
  /** Present when rewards are paid from the in-memory token */
  rewardToken: InMemoryRewardToken | null;
  custody: string;
  /** Chain settings when any payout goes on-chain */
  chain: ChainSettings | null;
  /** Operator wallet address when principal is paid on-chain */
  operator: string | null;
}

export interface DeployOverrides {
  clock?: Clock;
  emitter?: StakingHubEmitter;
}

const IN_MEMORY_TOKEN_ADDRESS = '0x0000000000000000000000000000000000000001';

export function deployStaking(cfg: AppConfig, overrides: DeployOverrides = {}): StakingDeployment {
  const onChain = cfg.chain.operatorPrivateKey !== '' || cfg.rewardToken.address !== '';
  if (onChain && cfg.faucetEnabled) {
    throw new Error('FAUCET_ENABLED must be false when payouts or the reward token are on-chain');
  }

  const custody = cfg.staking.custodyAccount;
  const bank = new InMemoryNativeBank();

  let native: NativeTransfer = bank.capabilityFor(custody);
  let operator: string | null = null;
  if (cfg.chain.operatorPrivateKey) {
    const signer = getSigner(cfg.chain);
    operator = signer.address;
    native = new WalletNativeTransfer(signer);
  }

  let rewardToken: InMemoryRewardToken | null = null;
  let rewards: RewardTokenTransfer;
  let rewardTokenAddress: string;
  if (cfg.rewardToken.address) {
    rewardTokenAddress = cfg.rewardToken.address;
    rewards = new Erc20RewardTokenTransfer(
      connectErc20(rewardTokenAddress, getSigner(cfg.chain)),
      rewardTokenAddress,
      cfg.rewardToken.symbol,
    );
  } else {
    rewardTokenAddress = IN_MEMORY_TOKEN_ADDRESS;
    rewardToken = new InMemoryRewardToken(rewardTokenAddress, cfg.rewardToken.symbol);
    rewardToken.mint(custody, cfg.rewardToken.initialSupply);
    rewards = rewardToken.capabilityFor(custody);
  }

  const contract = new StakingContract(
    {
      rewardToken: rewardTokenAddress,
      rewardConversionRate: cfg.staking.rewardConversionRate,
    },
    { native, rewardToken: rewards },
  );

  const host = new StakingHost({
    contract,
    bank,
    custody,
    emitter: overrides.emitter ?? stakingEmitter,
    clock: overrides.clock,
    journals: rewardToken ? [rewardToken] : [],
    logCalls: cfg.logCalls,
  });

  console.log(
    `  [staking] Deployed: native payouts ${cfg.chain.operatorPrivateKey ? 'on-chain' : 'in-memory'}, ` +
      `rewards ${rewardToken ? 'in-memory' : 'ERC-20'} (${cfg.rewardToken.symbol} @ ${rewardTokenAddress})`,
  );

  return { host, bank, rewardToken, custody, chain: onChain ? cfg.chain : null, operator };
}

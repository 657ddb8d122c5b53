/**
 * Lockstake — Chain Client
 *
 * Lazily created ethers.js provider and operator wallet, built from the
 * chain settings the deployment was given. The operator wallet is the
 * custody account when payouts go on-chain, so the health report
 * includes its address and native balance.
 */

import { ethers } from 'ethers';

export interface ChainSettings {
  rpcUrl: string;
  /** Empty when payouts stay in memory */
  operatorPrivateKey: string;
}

let provider: ethers.JsonRpcProvider | null = null;
let providerUrl: string | null = null;
let operator: ethers.Wallet | null = null;
let operatorKey: string | null = null;

export function getProvider(rpcUrl: string): ethers.JsonRpcProvider {
  if (!provider || providerUrl !== rpcUrl) {
    provider?.destroy();
    provider = new ethers.JsonRpcProvider(rpcUrl);
    providerUrl = rpcUrl;
    operator = null;
  }
  return provider;
}

/** Operator wallet that pays out principal and rewards */
export function getSigner(chain: ChainSettings): ethers.Wallet {
  if (!chain.operatorPrivateKey) {
    throw new Error('OPERATOR_PRIVATE_KEY is required when payouts or the reward token are on-chain');
  }
  const rpc = getProvider(chain.rpcUrl);
  if (!operator || operatorKey !== chain.operatorPrivateKey) {
    operator = new ethers.Wallet(chain.operatorPrivateKey, rpc);
    operatorKey = chain.operatorPrivateKey;
  }
  return operator;
}

export interface ChainHealth {
  rpcUrl: string;
  chainId: string;
  blockNumber: number;
  operator: string | null;
  operatorBalance: string | null;
}

/** Null when the node cannot be reached */
export async function checkHealth(chain: ChainSettings): Promise<ChainHealth | null> {
  const rpc = getProvider(chain.rpcUrl);
  try {
    const [network, blockNumber] = await Promise.all([rpc.getNetwork(), rpc.getBlockNumber()]);
    let operatorAddress: string | null = null;
    let operatorBalance: string | null = null;
    if (chain.operatorPrivateKey) {
      operatorAddress = getSigner(chain).address;
      operatorBalance = ethers.formatEther(await rpc.getBalance(operatorAddress));
    }
    return {
      rpcUrl: chain.rpcUrl,
      chainId: network.chainId.toString(),
      blockNumber,
      operator: operatorAddress,
      operatorBalance,
    };
  } catch (err) {
    console.error('  [chain] Health check failed:', err instanceof Error ? err.message : err);
    return null;
  }
}

export function closeClient(): void {
  provider?.destroy();
  provider = null;
  providerUrl = null;
  operator = null;
  operatorKey = null;
}

/**
 * Lockstake — Transfer Collaborators
 *
 * The engine never moves value itself. It calls two capabilities:
 *   1. Native value transfer (principal back to the staker)
 *   2. Reward token transfer (claimed rewards)
 *
 * Both either succeed or fail as a whole. What they do internally
 * (an in-memory balance book, a wallet, an ERC-20 contract) is
 * invisible to the lifecycle operations.
 */

import { ethers } from 'ethers';

// ---------------------------------------------------------------------------
// Asset descriptors
// ---------------------------------------------------------------------------

export enum TransferAssetType {
  Native = 'native',
  RewardToken = 'reward_token',
}

export interface TransferAsset {
  type: TransferAssetType;
  /** Contract address (zero address for the native unit) */
  address: string;
  symbol: string;
  decimals: number;
}

export const NATIVE_ASSET: TransferAsset = {
  type: TransferAssetType.Native,
  address: ethers.ZeroAddress,
  symbol: 'ETH',
  decimals: 18,
};

export function rewardTokenAsset(address: string, symbol: string, decimals = 18): TransferAsset {
  return { type: TransferAssetType.RewardToken, address, symbol, decimals };
}

// ---------------------------------------------------------------------------
// Capabilities
// ---------------------------------------------------------------------------

/** `transfer(recipient, amount) -> success|failure` */
export interface TransferCapability {
  readonly asset: TransferAsset;
  transfer(recipient: string, amount: bigint): Promise<boolean>;
}

export type NativeTransfer = TransferCapability;
export type RewardTokenTransfer = TransferCapability;

/** Format base units for logs and API display */
export function formatAmount(asset: TransferAsset, amount: bigint): string {
  return `${ethers.formatUnits(amount, asset.decimals)} ${asset.symbol}`;
}

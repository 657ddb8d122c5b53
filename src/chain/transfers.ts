/**
 * Lockstake — On-Chain Transfer Adapters
 *
 * Transfer capabilities backed by a real chain:
 *   1. WalletNativeTransfer — native value sent from the operator wallet
 *   2. Erc20RewardTokenTransfer — ERC-20 `transfer` on the reward token
 *
 * Both resolve to false on a reverted receipt or any RPC error.
 * Their effects cannot be rolled back by the host runtime.
 */

import { ethers } from 'ethers';
import type { TransferAsset, TransferCapability } from '../staking/transfers.js';
import { NATIVE_ASSET, formatAmount, rewardTokenAsset } from '../staking/transfers.js';

// ---------------------------------------------------------------------------
// ABI (minimal — only what the adapter calls)
// ---------------------------------------------------------------------------

const ERC20_ABI = [
  'function transfer(address to, uint256 amount) returns (bool)',
];

// ---------------------------------------------------------------------------
// Structural types (satisfied by ethers Wallet / Contract responses)
// ---------------------------------------------------------------------------

export interface PendingTx {
  wait(): Promise<{ status: number | null } | null>;
}

export interface ValueSender {
  sendTransaction(tx: { to: string; value: bigint }): Promise<PendingTx>;
}

export interface TokenTransferrer {
  transfer(to: string, amount: bigint): Promise<PendingTx>;
}

async function confirmed(tx: PendingTx): Promise<boolean> {
  const receipt = await tx.wait();
  return receipt !== null && receipt.status === 1;
}

// ---------------------------------------------------------------------------
// Native
// ---------------------------------------------------------------------------

export class WalletNativeTransfer implements TransferCapability {
  readonly asset: TransferAsset = NATIVE_ASSET;

  constructor(private readonly sender: ValueSender) {}

  async transfer(recipient: string, amount: bigint): Promise<boolean> {
    try {
      const tx = await this.sender.sendTransaction({ to: recipient, value: amount });
      return await confirmed(tx);
    } catch (err) {
      console.error(
        `  [chain] Native transfer of ${formatAmount(this.asset, amount)} to ${recipient} failed:`,
        err instanceof Error ? err.message : err,
      );
      return false;
    }
  }
}

// ---------------------------------------------------------------------------
// ERC-20 reward token
// ---------------------------------------------------------------------------

export class Erc20RewardTokenTransfer implements TransferCapability {
  readonly asset: TransferAsset;

  constructor(private readonly token: TokenTransferrer, address: string, symbol: string, decimals = 18) {
    this.asset = rewardTokenAsset(address, symbol, decimals);
  }

  async transfer(recipient: string, amount: bigint): Promise<boolean> {
    try {
      const tx = await this.token.transfer(recipient, amount);
      return await confirmed(tx);
    } catch (err) {
      console.error(
        `  [chain] Reward transfer of ${formatAmount(this.asset, amount)} to ${recipient} failed:`,
        err instanceof Error ? err.message : err,
      );
      return false;
    }
  }
}

/**
 * Bind an ERC-20 contract at `address` to the operator signer.
 */
export function connectErc20(address: string, runner: ethers.ContractRunner): TokenTransferrer {
  const contract = new ethers.Contract(address, ERC20_ABI, runner);
  const transfer = contract.getFunction('transfer');
  return {
    transfer: async (to, amount) => {
      const tx: ethers.ContractTransactionResponse = await transfer(to, amount);
      return tx;
    },
  };
}

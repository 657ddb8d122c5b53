/**
 * Staking module barrel exports.
 */
export * from './types.js';
export * from './errors.js';
export { StakeLedger, isJournaled } from './ledger.js';
export type { Journaled, Rollback } from './ledger.js';
export {
  elapsedPeriodsAndReward,
  computeReward,
  nextAccrualBoundary,
  stakingPeriodDays,
} from './accrual.js';
export { StakingContract } from './contract.js';
export type { CallContext, StakingCollaborators, StakingContractOptions, WithdrawalResult } from './contract.js';
export { InMemoryBalances, InMemoryNativeBank, InMemoryRewardToken } from './balances.js';
export { NATIVE_ASSET, TransferAssetType, formatAmount, rewardTokenAsset } from './transfers.js';
export type { NativeTransfer, RewardTokenTransfer, TransferAsset, TransferCapability } from './transfers.js';
export { StakingHost, ManualClock, systemClock } from './runtime.js';
export type { Clock, StakingHostOptions } from './runtime.js';
export { deployStaking } from './setup.js';
export type { StakingDeployment, DeployOverrides } from './setup.js';

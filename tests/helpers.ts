import { StakingHubEmitter } from '../src/events/emitter.js';
import type { StakingEvent } from '../src/events/types.js';
import { STAKING_EVENT_TYPES } from '../src/events/types.js';
import { InMemoryNativeBank, InMemoryRewardToken } from '../src/staking/balances.js';
import { StakingContract } from '../src/staking/contract.js';
import { isStakingError, isStakingPanic } from '../src/staking/errors.js';
import { ManualClock, StakingHost } from '../src/staking/runtime.js';
import type { NativeTransfer } from '../src/staking/transfers.js';
import { STAKING_CONSTANTS } from '../src/staking/types.js';

export const T0 = 1_700_000_000;
export const DAY = STAKING_CONSTANTS.ACCRUAL_PERIOD_SECONDS;
export const CUSTODY = 'custody';
export const TOKEN_ADDRESS = 'reward-token';

export interface FixtureOptions {
  conversionRate?: bigint;
  tokenSupply?: bigint;
  native?: NativeTransfer;
}

export function makeFixture(options: FixtureOptions = {}) {
  const clock = new ManualClock(T0);
  const bank = new InMemoryNativeBank();
  const token = new InMemoryRewardToken(TOKEN_ADDRESS, 'RWD');
  token.mint(CUSTODY, options.tokenSupply ?? 10_000_000n);

  const contract = new StakingContract(
    { rewardToken: TOKEN_ADDRESS, rewardConversionRate: options.conversionRate ?? 1n },
    {
      native: options.native ?? bank.capabilityFor(CUSTODY),
      rewardToken: token.capabilityFor(CUSTODY),
    },
  );

  const emitter = new StakingHubEmitter();
  const events: StakingEvent[] = [];
  for (const type of STAKING_EVENT_TYPES) {
    emitter.on(type, (event: StakingEvent) => events.push(event));
  }

  const host = new StakingHost({
    contract,
    bank,
    custody: CUSTODY,
    emitter,
    clock,
    journals: [token],
    logCalls: false,
  });

  return { clock, bank, token, contract, ledger: contract.ledger, emitter, events, host };
}

export interface Failure {
  kind: 'error' | 'panic' | 'other';
  code?: string;
  message: string;
}

/** Await a call that must fail and describe how it failed */
export async function failureOf(promise: Promise<unknown>): Promise<Failure> {
  try {
    await promise;
  } catch (err) {
    if (isStakingError(err)) return { kind: 'error', code: err.code, message: err.message };
    if (isStakingPanic(err)) return { kind: 'panic', message: err.message };
    return { kind: 'other', message: err instanceof Error ? err.message : String(err) };
  }
  throw new Error('expected the call to fail');
}

/** Run a synchronous call that must fail and describe how it failed */
export function syncFailureOf(fn: () => unknown): Failure | undefined {
  try {
    fn();
  } catch (err) {
    if (isStakingError(err)) return { kind: 'error', code: err.code, message: err.message };
    if (isStakingPanic(err)) return { kind: 'panic', message: err.message };
    return { kind: 'other', message: err instanceof Error ? err.message : String(err) };
  }
  return undefined;
}

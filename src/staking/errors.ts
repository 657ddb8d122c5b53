/**
 * Lockstake — Error Taxonomy
 *
 * Two tiers:
 *   - StakingError: recoverable, returned to the caller with a code
 *   - StakingPanic: fatal assertion, aborts the whole call
 *
 * The host runtime rolls back every write of a call on either tier.
 */

export type StakingErrorCode =
  | 'NotFound'
  | 'NoStake'
  | 'InvalidPeriod'
  | 'StillActive'
  | 'TransferFailed'
  | 'InsufficientBalance';

export class StakingError extends Error {
  readonly code: StakingErrorCode;

  constructor(code: StakingErrorCode, message: string) {
    super(message);
    this.name = 'StakingError';
    this.code = code;
  }
}

export class StakingPanic extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StakingPanic';
  }
}

export function isStakingError(err: unknown): err is StakingError {
  return err instanceof StakingError;
}

export function isStakingPanic(err: unknown): err is StakingPanic {
  return err instanceof StakingPanic;
}

/** Fatal assertion; mirrors a contract `assert!` */
export function ensure(condition: boolean, message: string): asserts condition {
  if (!condition) throw new StakingPanic(message);
}

export const notFound = (message = 'Stake info not found') => new StakingError('NotFound', message);
export const noStake = () => new StakingError('NoStake', 'no stake');
export const invalidPeriod = (period: number) =>
  new StakingError('InvalidPeriod', `period not exist: ${period}`);
export const stillActive = () => new StakingError('StillActive', 'still active');
export const transferFailed = (what: string) => new StakingError('TransferFailed', `${what} transfer failed`);

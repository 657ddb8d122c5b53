/**
 * Lockstake — Notification Types
 *
 * Events emitted by the lifecycle operations. They flow through the
 * internal EventEmitter and are broadcast to WebSocket clients.
 * Notifications never affect state or control flow.
 */

// ---------------------------------------------------------------------------
// Event type discriminators
// ---------------------------------------------------------------------------

export type StakingEventType =
  | 'staking:stake'
  | 'staking:withdraw'
  | 'staking:claim'
  | 'staking:pool-updated';

export type WSEventType = StakingEventType | 'connection:init';

// ---------------------------------------------------------------------------
// Event payloads
// ---------------------------------------------------------------------------

export interface StakeEvent {
  type: 'staking:stake';
  payload: {
    account: string;
    stakedAt: number;
    period: number;
    sum: bigint;
    totalStaked: bigint;      // the account's principal after this deposit
  };
}

export interface WithdrawEvent {
  type: 'staking:withdraw';
  payload: {
    account: string;
    sum: bigint;
    isEarly: boolean;
  };
}

export interface ClaimEvent {
  type: 'staking:claim';
  payload: {
    account: string;
    periods: number;
    amount: bigint;
  };
}

export interface PoolUpdatedEvent {
  type: 'staking:pool-updated';
  payload: {
    amount: bigint;
  };
}

export interface ConnectionInitEvent {
  type: 'connection:init';
  payload: {
    serverTime: number;
    connectedClients: number;
  };
}

// ---------------------------------------------------------------------------
// Unions
// ---------------------------------------------------------------------------

export type StakingEvent = StakeEvent | WithdrawEvent | ClaimEvent | PoolUpdatedEvent;

export type WSEvent = StakingEvent | ConnectionInitEvent;

// ---------------------------------------------------------------------------
// Internal emitter event map
// ---------------------------------------------------------------------------

export interface StakingHubEvents {
  'staking:stake': [StakeEvent];
  'staking:withdraw': [WithdrawEvent];
  'staking:claim': [ClaimEvent];
  'staking:pool-updated': [PoolUpdatedEvent];
}

export const STAKING_EVENT_TYPES: StakingEventType[] = [
  'staking:stake',
  'staking:withdraw',
  'staking:claim',
  'staking:pool-updated',
];

/** JSON encoding for events: bigints become decimal strings */
export function serializeEvent(event: WSEvent): string {
  return JSON.stringify(event, (_key, value: unknown) =>
    typeof value === 'bigint' ? value.toString() : value,
  );
}

export { stakingEmitter, StakingHubEmitter } from './emitter.js';
export {
  initWebSocketServer,
  broadcast,
  closeWebSocketServer,
  eventAccount,
  shouldDeliver,
} from './ws-server.js';
export { STAKING_EVENT_TYPES, serializeEvent } from './types.js';
export type { WSEvent, WSEventType, StakingEvent, StakingEventType, StakingHubEvents } from './types.js';

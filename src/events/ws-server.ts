/**
 * Lockstake — Notification Stream
 *
 * WebSocket endpoint on /ws sharing the HTTP server. Every client gets
 * pool notifications; position notifications go to clients that follow
 * no account (firehose) or follow the event's account.
 *
 * Following an account:
 *   ws://host/ws?account=0xabc...           at connect time
 *   {"follow": "0xabc..."} / {"follow": null} at any time after
 */

import { WebSocketServer, WebSocket } from 'ws';
import type { IncomingMessage, Server as HttpServer } from 'node:http';
import { ethers } from 'ethers';
import type { StakingHubEmitter } from './emitter.js';
import { stakingEmitter } from './emitter.js';
import type { StakingEvent, WSEvent } from './types.js';
import { STAKING_EVENT_TYPES, serializeEvent } from './types.js';

const KEEPALIVE_MS = 30_000;

interface ClientState {
  alive: boolean;
  /** Checksummed account, or null for every account */
  follows: string | null;
}

let wss: WebSocketServer | null = null;
let detach: (() => void) | null = null;
const clients = new Map<WebSocket, ClientState>();

// ---------------------------------------------------------------------------
// Routing
// ---------------------------------------------------------------------------

/** Account a notification is about; null for pool-wide events */
export function eventAccount(event: StakingEvent): string | null {
  return event.type === 'staking:pool-updated' ? null : event.payload.account;
}

export function shouldDeliver(follows: string | null, event: StakingEvent): boolean {
  const account = eventAccount(event);
  if (follows === null || account === null) return true;
  return ethers.isAddress(account) && ethers.getAddress(account) === follows;
}

function normalizeFollow(raw: unknown): string | null | undefined {
  if (raw === null || raw === '') return null;
  if (typeof raw === 'string' && ethers.isAddress(raw)) return ethers.getAddress(raw);
  return undefined;
}

function followFromUrl(req: IncomingMessage): string | null {
  const url = new URL(req.url ?? '/ws', 'http://localhost');
  return normalizeFollow(url.searchParams.get('account')) ?? null;
}

function handleMessage(state: ClientState, data: WebSocket.RawData): void {
  let message: unknown;
  try {
    message = JSON.parse(data.toString());
  } catch {
    console.error('[WS] Ignoring non-JSON message');
    return;
  }
  if (typeof message !== 'object' || message === null || !('follow' in message)) return;

  const follows = normalizeFollow(message.follow);
  if (follows === undefined) {
    console.error('[WS] Ignoring follow request with an invalid address');
    return;
  }
  state.follows = follows;
}

// ---------------------------------------------------------------------------
// Server
// ---------------------------------------------------------------------------

/**
 * Attach the stream to `server` and start forwarding committed
 * notifications from `emitter`.
 */
export function initWebSocketServer(
  server: HttpServer,
  emitter: StakingHubEmitter = stakingEmitter,
): WebSocketServer {
  const socketServer = new WebSocketServer({ server, path: '/ws' });
  wss = socketServer;

  socketServer.on('connection', (ws, req) => {
    const state: ClientState = { alive: true, follows: followFromUrl(req) };
    clients.set(ws, state);
    console.log(`[WS] Client connected (${clients.size} total, following ${state.follows ?? 'all'})`);

    const hello: WSEvent = {
      type: 'connection:init',
      payload: { serverTime: Date.now(), connectedClients: clients.size },
    };
    ws.send(serializeEvent(hello));

    ws.on('pong', () => {
      state.alive = true;
    });
    ws.on('message', (data) => handleMessage(state, data));
    ws.on('close', () => {
      clients.delete(ws);
      console.log(`[WS] Client disconnected (${clients.size} remaining)`);
    });
    ws.on('error', (err) => {
      console.error('[WS] Client error:', err.message);
    });
  });

  const keepalive = setInterval(() => {
    for (const [ws, state] of clients) {
      if (!state.alive) {
        ws.terminate();
        continue;
      }
      state.alive = false;
      ws.ping();
    }
  }, KEEPALIVE_MS);
  socketServer.on('close', () => clearInterval(keepalive));

  const forward = (event: StakingEvent) => broadcast(event);
  for (const type of STAKING_EVENT_TYPES) emitter.on(type, forward);
  detach = () => {
    for (const type of STAKING_EVENT_TYPES) emitter.off(type, forward);
  };

  console.log('[WS] Notification stream on /ws');
  return socketServer;
}

/** Send a notification to every open client that should see it */
export function broadcast(event: StakingEvent): void {
  if (!wss) return;
  const data = serializeEvent(event);
  for (const [ws, state] of clients) {
    if (ws.readyState === WebSocket.OPEN && shouldDeliver(state.follows, event)) {
      ws.send(data);
    }
  }
}

export function closeWebSocketServer(): Promise<void> {
  detach?.();
  detach = null;
  const socketServer = wss;
  if (!socketServer) return Promise.resolve();

  return new Promise((resolve) => {
    socketServer.close(() => {
      wss = null;
      clients.clear();
      resolve();
    });
  });
}
